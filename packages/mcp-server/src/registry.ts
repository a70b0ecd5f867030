/**
 * Mesh Registry — in-memory named mesh store.
 *
 * Every loaded mesh lives here until deleted or replaced by a load under
 * the same name. The latest statistics handle is kept beside each mesh so
 * get_statistics can poll it across tool calls.
 */

import {
  beginStatistics,
  type GeometryRecord, type MeshReadback,
  type StatisticsHandle, type StatisticsOptions,
} from '@meshwork/mesh-kernel';

export interface MeshEntry {
  id: string;
  record: GeometryRecord;
  /** Path the mesh was loaded from. */
  source: string;
  statistics: StatisticsHandle | null;
}

export interface MeshResult {
  mesh_id: string;
  source: string;
  readback: MeshReadback;
}

let nextId = 1;

const meshes = new Map<string, MeshEntry>();

/** Store a mesh and return its ID + readback. Loading under an existing name replaces it. */
export function create(record: GeometryRecord, source: string, name?: string): MeshResult {
  if (name !== undefined && !/^[a-zA-Z0-9_-]+$/.test(name)) {
    throw new Error(
      `Invalid mesh name "${name}". Use only letters, digits, hyphens, underscores.`
    );
  }
  const id = name ?? `mesh_${nextId++}`;
  if (meshes.has(id) && !name) {
    // Auto-generated collision — bump
    return create(record, source);
  }
  meshes.set(id, { id, record, source, statistics: null });
  return { mesh_id: id, source, readback: record.readback() };
}

/** Retrieve a mesh or throw a clear error. */
export function get(id: string): MeshEntry {
  const entry = meshes.get(id);
  if (!entry) {
    const available = [...meshes.keys()];
    throw new Error(
      `Mesh "${id}" not found. Available meshes: [${available.join(', ')}]`
    );
  }
  return entry;
}

export function has(id: string): boolean {
  return meshes.has(id);
}

export function remove(id: string): void {
  if (!meshes.has(id)) {
    throw new Error(`Mesh "${id}" not found — cannot delete.`);
  }
  meshes.delete(id);
}

export function list(): MeshResult[] {
  return [...meshes.values()].map((entry) => ({
    mesh_id: entry.id,
    source: entry.source,
    readback: entry.record.readback(),
  }));
}

/** Start statistics for a mesh and remember the handle. */
export function startStatistics(id: string, options: StatisticsOptions): StatisticsHandle {
  const entry = get(id);
  const handle = beginStatistics(entry.record, options);
  entry.statistics = handle;
  return handle;
}

/** Latest statistics handle for a mesh, or throw if none was started. */
export function getStatistics(id: string): StatisticsHandle {
  const entry = get(id);
  if (!entry.statistics) {
    throw new Error(`No statistics requested for mesh "${id}". Call start_statistics first.`);
  }
  return entry.statistics;
}

/** Clear all meshes (for testing). */
export function clear(): void {
  meshes.clear();
  nextId = 1;
}
