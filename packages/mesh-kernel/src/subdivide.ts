/**
 * Midpoint subdivision — each triangle becomes four.
 *
 *            C
 *           / \
 *        mAC───mBC
 *         / \ / \
 *        A───mAB──B
 *
 * Each undirected edge gets exactly one midpoint vertex, shared by both
 * triangles on that edge, so the refined surface stays crack-free.
 * Vertex count grows by the number of unique edges; index count x4.
 */

import { midpoint } from './vec3.js';
import { GeometryRecord, makeVertex } from './mesh.js';
import { recalculateNormals } from './normals.js';

/**
 * Order-independent edge key, collision-free for indices below vertexCount.
 */
export function edgeKey(a: number, b: number, vertexCount: number): number {
  return a < b ? a * vertexCount + b : b * vertexCount + a;
}

/** Count unique undirected edges. */
export function countEdges(record: GeometryRecord): number {
  const n = record.vertexCount;
  const seen = new Set<number>();
  for (let t = 0; t < record.triangleCount; t++) {
    const { a, b, c } = record.triangle(t);
    seen.add(edgeKey(a, b, n));
    seen.add(edgeKey(b, c, n));
    seen.add(edgeKey(c, a, n));
  }
  return seen.size;
}

function subdivideOnce(record: GeometryRecord): void {
  const { vertices, indices } = record;
  const n = vertices.length;
  if (n * n > Number.MAX_SAFE_INTEGER) {
    throw new Error(`Mesh too large to subdivide: ${n} vertices exceeds edge key range`);
  }

  for (const i of indices) {
    vertices[i].normal = [0, 0, 0];
  }

  const midpoints = new Map<number, number>();
  const midpointOf = (a: number, b: number): number => {
    const key = edgeKey(a, b, n);
    const cached = midpoints.get(key);
    if (cached !== undefined) return cached;
    const index = vertices.length;
    vertices.push(makeVertex(midpoint(vertices[a].position, vertices[b].position)));
    midpoints.set(key, index);
    return index;
  };

  const next: number[] = new Array<number>(record.triangleCount * 12);
  let w = 0;
  for (let t = 0; t < record.triangleCount; t++) {
    const { a, b, c } = record.triangle(t);
    const mAC = midpointOf(a, c);
    const mAB = midpointOf(a, b);
    const mBC = midpointOf(b, c);

    next[w++] = a;   next[w++] = mAB; next[w++] = mAC;
    next[w++] = mAC; next[w++] = mAB; next[w++] = mBC;
    next[w++] = mAC; next[w++] = mBC; next[w++] = c;
    next[w++] = mAB; next[w++] = b;   next[w++] = mBC;
  }

  record.indices = next;
}

/** Refine the record in place by `levels` rounds of midpoint subdivision. */
export function subdivide(record: GeometryRecord, levels = 1): void {
  if (!Number.isInteger(levels) || levels < 0) {
    throw new Error(`levels must be a non-negative integer, got ${levels}`);
  }
  record.assertWritable('subdivide');
  record.assertValid();

  for (let l = 0; l < levels; l++) {
    subdivideOnce(record);
  }
  recalculateNormals(record);
}
