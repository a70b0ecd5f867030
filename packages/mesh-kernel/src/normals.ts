/**
 * Smooth vertex normals (non-normalized).
 *
 * Face normal = (vA − vB) × (vC − vB). This is the negation of the usual
 * (vB − vA) × (vC − vA); keep the ordering, consumers depend on its sign.
 */

import type { Vec3 } from './vec3.js';
import { sub, cross, addInPlace } from './vec3.js';
import type { GeometryRecord } from './mesh.js';

export function faceNormal(a: Vec3, b: Vec3, c: Vec3): Vec3 {
  return cross(sub(a, b), sub(c, b));
}

/** Recompute every vertex normal from scratch. */
export function recalculateNormals(record: GeometryRecord): void {
  const { vertices } = record;

  for (const v of vertices) {
    v.normal = [0, 0, 0];
  }

  for (let t = 0; t < record.triangleCount; t++) {
    const tri = record.triangle(t);
    const vA = vertices[tri.a];
    const vB = vertices[tri.b];
    const vC = vertices[tri.c];
    const n = faceNormal(vA.position, vB.position, vC.position);
    addInPlace(vA.normal, n);
    addInPlace(vB.normal, n);
    addInPlace(vC.normal, n);
  }
}
