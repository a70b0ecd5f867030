/**
 * Geometry record — the mesh's vertex and index buffers.
 *
 * Triangles are never stored. A TriangleView holds three vertex indices
 * and reads positions from the record when asked, so views stay valid
 * while the vertex array grows (subdivision appends mid-iteration).
 *
 * Winding is counter-clockwise; every three consecutive indices form
 * one triangle.
 */

import type { Vec3, BoundingBox } from './vec3.js';
import { min3, max3 } from './vec3.js';
import { MeshBusyError, MeshInvariantError } from './errors.js';

export interface Vertex {
  position: Vec3;
  /** Unnormalized sum of adjacent face normals. Direction only. */
  normal: Vec3;
}

export interface MeshReadback {
  vertex_count: number;
  triangle_count: number;
  index_count: number;
  bounds: BoundingBox;
}

/** Flat copies of the record's buffers, safe to hand to another thread. */
export interface MeshSnapshot {
  /** xyz per vertex. */
  positions: Float64Array;
  indices: Int32Array;
  triangleCount: number;
}

export class TriangleView {
  constructor(
    readonly a: number,
    readonly b: number,
    readonly c: number,
  ) {}

  positions(vertices: readonly Vertex[]): [Vec3, Vec3, Vec3] {
    return [vertices[this.a].position, vertices[this.b].position, vertices[this.c].position];
  }
}

export function makeVertex(position: Vec3): Vertex {
  return { position, normal: [0, 0, 0] };
}

export class GeometryRecord {
  vertices: Vertex[];
  indices: number[];
  private readers = 0;

  constructor(vertices: Vertex[] = [], indices: number[] = []) {
    this.vertices = vertices;
    this.indices = indices;
  }

  get vertexCount(): number {
    return this.vertices.length;
  }

  get triangleCount(): number {
    return Math.floor(this.indices.length / 3);
  }

  triangle(t: number): TriangleView {
    if (!Number.isInteger(t) || t < 0 || t >= this.triangleCount) {
      throw new MeshInvariantError(
        `Triangle ${t} out of range (mesh has ${this.triangleCount} triangles)`
      );
    }
    const i = t * 3;
    return new TriangleView(this.indices[i], this.indices[i + 1], this.indices[i + 2]);
  }

  /** Fail fast if the index buffer can dangle. */
  assertValid(): void {
    if (this.indices.length % 3 !== 0) {
      throw new MeshInvariantError(
        `Index count ${this.indices.length} is not a multiple of 3`
      );
    }
    const n = this.vertices.length;
    for (let i = 0; i < this.indices.length; i++) {
      const idx = this.indices[i];
      if (!Number.isInteger(idx) || idx < 0 || idx >= n) {
        throw new MeshInvariantError(
          `Index ${idx} at position ${i} does not reference a vertex (vertex count ${n})`
        );
      }
    }
  }

  bounds(): BoundingBox {
    if (this.vertices.length === 0) {
      return { min: [0, 0, 0], max: [0, 0, 0] };
    }
    let min: Vec3 = [Infinity, Infinity, Infinity];
    let max: Vec3 = [-Infinity, -Infinity, -Infinity];
    for (const v of this.vertices) {
      min = min3(min, v.position);
      max = max3(max, v.position);
    }
    return { min, max };
  }

  readback(): MeshReadback {
    return {
      vertex_count: this.vertexCount,
      triangle_count: this.triangleCount,
      index_count: this.indices.length,
      bounds: this.bounds(),
    };
  }

  snapshot(shared = false): MeshSnapshot {
    const positionBytes = this.vertices.length * 3 * Float64Array.BYTES_PER_ELEMENT;
    const indexBytes = this.indices.length * Int32Array.BYTES_PER_ELEMENT;
    const positions = shared
      ? new Float64Array(new SharedArrayBuffer(positionBytes))
      : new Float64Array(this.vertices.length * 3);
    const indices = shared
      ? new Int32Array(new SharedArrayBuffer(indexBytes))
      : new Int32Array(this.indices.length);

    for (let i = 0; i < this.vertices.length; i++) {
      const p = this.vertices[i].position;
      positions[i * 3] = p[0];
      positions[i * 3 + 1] = p[1];
      positions[i * 3 + 2] = p[2];
    }
    indices.set(this.indices);
    return { positions, indices, triangleCount: this.triangleCount };
  }

  // ─── Read leases ──────────────────────────────────────────────

  get busy(): boolean {
    return this.readers > 0;
  }

  /** Hold the record read-only. Call the returned function exactly once. */
  acquireRead(): () => void {
    this.readers++;
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.readers--;
    };
  }

  assertWritable(operation: string): void {
    if (this.readers > 0) {
      throw new MeshBusyError(operation, this.readers);
    }
  }
}
