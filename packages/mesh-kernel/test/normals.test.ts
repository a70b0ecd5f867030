import { describe, it, expect } from 'vitest';
import { faceNormal, recalculateNormals } from '../src/normals.js';
import { triangleAreaAt } from '../src/area.js';
import { loadFixture, nearVec3, rightTriangle } from './helpers.js';

describe('faceNormal', () => {
  it('uses (A − B) × (C − B)', () => {
    // CCW in XY — the usual formula would give +Z
    nearVec3(faceNormal([0, 0, 0], [1, 0, 0], [0, 1, 0]), [0, 0, -1]);
  });

  it('is not normalized', () => {
    nearVec3(faceNormal([0, 0, 0], [2, 0, 0], [0, 3, 0]), [0, 0, -6]);
  });

  it('has twice the triangle area as its length', () => {
    const positions = new Float64Array([0, 0, 0, 2, 0, 0, 0, 3, 0]);
    const indices = new Int32Array([0, 1, 2]);
    expect(triangleAreaAt(positions, indices, 0)).toBe(3);
  });
});

describe('recalculateNormals', () => {
  it('gives each vertex of a lone triangle its face normal', () => {
    const tri = rightTriangle();
    for (const v of tri.vertices) nearVec3(v.normal, [0, 0, -1]);
  });

  it('sums face normals over shared vertices', () => {
    const quad = loadFixture('quad.json');
    nearVec3(quad.vertices[0].normal, [0, 0, -2]);
    nearVec3(quad.vertices[1].normal, [0, 0, -1]);
    nearVec3(quad.vertices[2].normal, [0, 0, -2]);
    nearVec3(quad.vertices[3].normal, [0, 0, -1]);
  });

  it('recomputes from scratch instead of accumulating', () => {
    const quad = loadFixture('quad.json');
    quad.vertices[0].normal = [5, 5, 5];
    recalculateNormals(quad);
    recalculateNormals(quad);
    nearVec3(quad.vertices[0].normal, [0, 0, -2]);
  });

  it('follows moved positions', () => {
    const tri = rightTriangle();
    tri.vertices[2].position = [0, 0, 1];
    recalculateNormals(tri);
    // (A − B) × (C − B) = (-1,0,0) × (-1,0,1)
    nearVec3(tri.vertices[0].normal, [0, 1, 0]);
  });
});
