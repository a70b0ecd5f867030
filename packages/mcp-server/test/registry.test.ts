import { describe, it, expect, beforeEach } from 'vitest';
import { parseMesh, MeshBusyError, subdivide } from '@meshwork/mesh-kernel';
import * as registry from '../src/registry.js';

const TRIANGLE = '{"geometry_object": {"vertices": [0,0,0, 1,0,0, 0,1,0], "triangles": [0,1,2]}}';

function triangle() {
  return parseMesh(TRIANGLE);
}

describe('mesh registry', () => {
  beforeEach(() => registry.clear());

  it('assigns sequential IDs', () => {
    expect(registry.create(triangle(), 'a.json').mesh_id).toBe('mesh_1');
    expect(registry.create(triangle(), 'b.json').mesh_id).toBe('mesh_2');
  });

  it('skips auto IDs already taken by a name', () => {
    registry.create(triangle(), 'a.json', 'mesh_1');
    expect(registry.create(triangle(), 'b.json').mesh_id).toBe('mesh_2');
  });

  it('replaces a mesh loaded under the same name', () => {
    registry.create(triangle(), 'a.json', 'part');
    registry.create(triangle(), 'b.json', 'part');
    expect(registry.list()).toHaveLength(1);
    expect(registry.get('part').source).toBe('b.json');
  });

  it('rejects invalid names', () => {
    expect(() => registry.create(triangle(), 'a.json', 'bad name')).toThrow(/Invalid mesh name/);
  });

  it('lists available meshes when a lookup fails', () => {
    registry.create(triangle(), 'a.json', 'part');
    expect(() => registry.get('other')).toThrow('Mesh "other" not found. Available meshes: [part]');
    expect(() => registry.remove('other')).toThrow(/cannot delete/);
  });

  it('remembers the latest statistics handle', async () => {
    registry.create(triangle(), 'a.json', 'part');
    expect(() => registry.getStatistics('part')).toThrow(/start_statistics/);

    const handle = registry.startStatistics('part', { executor: 'inline' });
    expect(registry.getStatistics('part')).toBe(handle);
    expect(() => subdivide(registry.get('part').record)).toThrow(MeshBusyError);
    await handle.done;
  });
});
