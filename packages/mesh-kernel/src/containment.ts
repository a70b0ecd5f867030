/**
 * Point containment by ray-casting parity.
 *
 * One ray from the query point along a fixed direction; the point is
 * inside iff the ray crosses the surface an odd number of times.
 * Assumes a closed (watertight) mesh. A ray that passes exactly
 * through an edge or vertex can miscount; no jitter or voting is done.
 */

import type { Vec3 } from './vec3.js';
import { sub, cross, dot } from './vec3.js';
import type { GeometryRecord } from './mesh.js';

/** Machine epsilon for float64. */
export const EPSILON = Number.EPSILON;

/**
 * Fixed cast direction. Diagonal, but skewed off every coordinate axis
 * and plane so rays from axis-aligned query points miss box edges.
 */
export const RAY_DIRECTION: Vec3 = [0.8, 0.52, 0.3];

/**
 * Möller–Trumbore ray/triangle test.
 * Returns the ray parameter t of the hit, or null. Hits at or behind
 * the origin (t ≤ EPSILON) don't count.
 */
export function intersectRayTriangle(
  origin: Vec3,
  dir: Vec3,
  a: Vec3,
  b: Vec3,
  c: Vec3,
): number | null {
  const e1 = sub(b, a);
  const e2 = sub(c, a);
  const h = cross(dir, e2);
  const det = dot(e1, h);
  if (det > -EPSILON && det < EPSILON) return null; // parallel

  const inv = 1 / det;
  const s = sub(origin, a);
  const u = inv * dot(s, h);
  if (u < 0 || u > 1) return null;

  const q = cross(s, e1);
  const v = inv * dot(dir, q);
  if (v < 0 || v > 1 || u + v > 1) return null;

  const t = inv * dot(e2, q);
  return t > EPSILON ? t : null;
}

export function countRayHits(record: GeometryRecord, origin: Vec3, dir: Vec3 = RAY_DIRECTION): number {
  let hits = 0;
  for (let t = 0; t < record.triangleCount; t++) {
    const [a, b, c] = record.triangle(t).positions(record.vertices);
    if (intersectRayTriangle(origin, dir, a, b, c) !== null) hits++;
  }
  return hits;
}

export function isPointInside(record: GeometryRecord, point: Vec3, dir: Vec3 = RAY_DIRECTION): boolean {
  return countRayHits(record, point, dir) % 2 === 1;
}
