import { expect } from 'vitest';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { parseMesh } from '../src/loader.js';
import type { GeometryRecord } from '../src/mesh.js';
import type { Vec3 } from '../src/vec3.js';

export const FIXTURES_DIR = fileURLToPath(new URL('./fixtures', import.meta.url));

export function fixturePath(name: string): string {
  return fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));
}

export function loadFixture(name: string): GeometryRecord {
  return parseMesh(readFileSync(fixturePath(name), 'utf-8'));
}

export function meshFrom(vertices: number[], triangles: number[]): GeometryRecord {
  return parseMesh(JSON.stringify({ geometry_object: { vertices, triangles } }));
}

/** Single CCW right triangle in the XY plane, area 0.5. */
export function rightTriangle(): GeometryRecord {
  return meshFrom([0, 0, 0, 1, 0, 0, 0, 1, 0], [0, 1, 2]);
}

/** n×n height-field grid with uneven triangle areas. */
export function bumpyGrid(n: number): GeometryRecord {
  const vertices: number[] = [];
  const triangles: number[] = [];
  for (let j = 0; j <= n; j++) {
    for (let i = 0; i <= n; i++) {
      vertices.push(i + 0.3 * Math.sin(j), j * (1 + i * 0.01), Math.sin(i * 0.7) * Math.cos(j * 0.4));
    }
  }
  const row = n + 1;
  for (let j = 0; j < n; j++) {
    for (let i = 0; i < n; i++) {
      const v = j * row + i;
      triangles.push(v, v + 1, v + row + 1, v, v + row + 1, v + row);
    }
  }
  return meshFrom(vertices, triangles);
}

const EPSILON = 1e-9;

export function nearVec3(actual: Vec3, expected: Vec3, tol = EPSILON) {
  expect(Math.abs(actual[0] - expected[0])).toBeLessThan(tol);
  expect(Math.abs(actual[1] - expected[1])).toBeLessThan(tol);
  expect(Math.abs(actual[2] - expected[2])).toBeLessThan(tol);
}
