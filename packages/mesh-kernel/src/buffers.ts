/**
 * GPU-ready buffers for the rendering side.
 *
 * Layout per vertex: position xyz, normal xyz (float32), 24-byte stride.
 * Normals are passed through unnormalized; the shader normalizes.
 * Rebuild after load and after every subdivision.
 */

import type { GeometryRecord } from './mesh.js';

export interface RenderBuffers {
  vertices: Float32Array;
  indices: Uint32Array;
  /** Bytes per vertex. */
  stride: number;
  /** Byte offset of the normal within a vertex. */
  normalOffset: number;
}

export const FLOATS_PER_VERTEX = 6;

export function toRenderBuffers(record: GeometryRecord): RenderBuffers {
  record.assertValid();
  const vertices = new Float32Array(record.vertexCount * FLOATS_PER_VERTEX);
  let o = 0;
  for (const v of record.vertices) {
    vertices[o++] = v.position[0];
    vertices[o++] = v.position[1];
    vertices[o++] = v.position[2];
    vertices[o++] = v.normal[0];
    vertices[o++] = v.normal[1];
    vertices[o++] = v.normal[2];
  }
  return {
    vertices,
    indices: Uint32Array.from(record.indices),
    stride: FLOATS_PER_VERTEX * Float32Array.BYTES_PER_ELEMENT,
    normalOffset: 3 * Float32Array.BYTES_PER_ELEMENT,
  };
}
