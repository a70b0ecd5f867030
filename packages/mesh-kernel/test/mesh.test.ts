import { describe, it, expect } from 'vitest';
import { GeometryRecord, makeVertex } from '../src/mesh.js';
import { MeshBusyError, MeshInvariantError } from '../src/errors.js';
import { loadFixture } from './helpers.js';

describe('GeometryRecord', () => {
  it('exposes triangles as index views', () => {
    const quad = loadFixture('quad.json');
    const t = quad.triangle(1);
    expect([t.a, t.b, t.c]).toEqual([0, 2, 3]);
    expect(t.positions(quad.vertices)).toEqual([[0, 0, 0], [1, 1, 0], [0, 1, 0]]);
  });

  it('views read the current vertex array', () => {
    const quad = loadFixture('quad.json');
    const t = quad.triangle(0);
    quad.vertices[1] = makeVertex([7, 0, 0]);
    expect(t.positions(quad.vertices)[1]).toEqual([7, 0, 0]);
  });

  it('rejects out-of-range triangle numbers', () => {
    const quad = loadFixture('quad.json');
    expect(() => quad.triangle(2)).toThrow(MeshInvariantError);
    expect(() => quad.triangle(-1)).toThrow(MeshInvariantError);
  });

  it('assertValid catches dangling and ragged index buffers', () => {
    const quad = loadFixture('quad.json');
    expect(() => quad.assertValid()).not.toThrow();

    quad.indices.push(4, 0, 1);
    expect(() => quad.assertValid()).toThrow(/Index 4 at position 6/);

    quad.indices.length = 7;
    expect(() => quad.assertValid()).toThrow(/not a multiple of 3/);
  });

  it('computes bounds and readback', () => {
    const cube = loadFixture('cube.json');
    expect(cube.readback()).toEqual({
      vertex_count: 8,
      triangle_count: 12,
      index_count: 36,
      bounds: { min: [-0.5, -0.5, -0.5], max: [0.5, 0.5, 0.5] },
    });
    expect(new GeometryRecord().bounds()).toEqual({ min: [0, 0, 0], max: [0, 0, 0] });
  });

  it('snapshots flat buffers, optionally shared', () => {
    const quad = loadFixture('quad.json');
    const snap = quad.snapshot();
    expect(Array.from(snap.positions)).toEqual([0, 0, 0, 1, 0, 0, 1, 1, 0, 0, 1, 0]);
    expect(Array.from(snap.indices)).toEqual([0, 1, 2, 0, 2, 3]);
    expect(snap.triangleCount).toBe(2);

    const shared = quad.snapshot(true);
    expect(shared.positions.buffer).toBeInstanceOf(SharedArrayBuffer);
    expect(Array.from(shared.positions)).toEqual(Array.from(snap.positions));

    quad.vertices[0].position[0] = 9;
    expect(snap.positions[0]).toBe(0);
  });

  it('blocks writers while a read lease is held', () => {
    const quad = loadFixture('quad.json');
    const release = quad.acquireRead();
    expect(quad.busy).toBe(true);
    expect(() => quad.assertWritable('subdivide')).toThrow(MeshBusyError);

    release();
    release(); // second call is a no-op
    expect(quad.busy).toBe(false);
    expect(() => quad.assertWritable('subdivide')).not.toThrow();
  });
});
