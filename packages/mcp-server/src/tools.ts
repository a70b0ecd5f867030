/**
 * MCP Tool Registrations — 9 tools wrapping the mesh kernel.
 *
 * Mutating tools return { mesh_id, readback } so the caller always
 * knows the current mesh size after every operation.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import {
  loadMesh, listMeshFiles, subdivide, countRayHits, toRenderBuffers,
  isPointInside, pollStatistics, RAY_DIRECTION,
  type StatisticsHandle, type StatisticsStatus, type Vec3,
} from '@meshwork/mesh-kernel';
import * as path from 'node:path';
import * as registry from './registry.js';
import type { ServerConfig } from './config.js';

function json(value: unknown) {
  return { content: [{ type: 'text' as const, text: JSON.stringify(value) }] };
}

/** Statistics status as the tools report it. The min sentinel becomes null. */
export function statisticsReadback(meshId: string, handle: StatisticsHandle, status: StatisticsStatus) {
  const base = {
    mesh_id: meshId,
    state: status.state,
    triangle_count: handle.triangleCount,
    worker_count: handle.workerCount,
  };
  if (status.state === 'ready') {
    const { minArea, maxArea, avgArea } = status.statistics;
    return {
      ...base,
      min_area: Number.isFinite(minArea) ? minArea : null,
      max_area: maxArea,
      avg_area: avgArea,
    };
  }
  if (status.state === 'failed') {
    return { ...base, error: status.error.message };
  }
  return base;
}

export function registerTools(server: McpServer, config: ServerConfig): void {

  const resolvePath = (p: string) => path.resolve(config.meshDir, p);

  // ─── Library (2) ───────────────────────────────────────────

  server.tool(
    'list_mesh_files',
    'List the .json mesh documents available to load.',
    {
      directory: z.string().optional().describe('Directory to list (default: configured mesh directory)'),
    },
    async ({ directory }) => {
      const dir = directory !== undefined ? resolvePath(directory) : config.meshDir;
      const files = await listMeshFiles(dir);
      return json({ directory: dir, count: files.length, files });
    }
  );

  server.tool(
    'load_mesh',
    'Load a JSON mesh document { geometry_object: { vertices, triangles } }. Smooth normals are computed on load.',
    {
      path: z.string().min(1).describe('Path to the .json file (relative paths resolve against the mesh directory)'),
      name: z.string().optional().describe('Optional name for the mesh (letters, digits, hyphens, underscores only). Reusing a name replaces that mesh.'),
    },
    async ({ path: file, name }) => {
      const source = resolvePath(file);
      const record = await loadMesh(source);
      const result = registry.create(record, source, name);
      return json(result);
    }
  );

  // ─── Mesh Management (2) ───────────────────────────────────

  server.tool(
    'list_meshes',
    'List all loaded meshes with their vertex/triangle counts and bounds.',
    {},
    async () => {
      const meshes = registry.list();
      return json({ count: meshes.length, meshes });
    }
  );

  server.tool(
    'delete_mesh',
    'Remove a mesh from the registry.',
    {
      mesh: z.string().describe('ID of mesh to delete'),
    },
    async ({ mesh }) => {
      registry.remove(mesh);
      return json({ deleted: mesh, remaining: registry.list().length });
    }
  );

  // ─── Statistics (2) ────────────────────────────────────────

  server.tool(
    'start_statistics',
    'Start computing triangle area statistics (min/max/average) in the background. Returns immediately; poll with get_statistics. The mesh cannot be subdivided until the result is ready.',
    {
      mesh: z.string().describe('ID of mesh'),
      workers: z.number().int().positive().max(256).optional().describe('Max parallel batches (default: server setting or CPU count)'),
    },
    async ({ mesh, workers }) => {
      const handle = registry.startStatistics(mesh, {
        workers: workers ?? config.statsWorkers,
        executor: config.statsExecutor,
      });
      return json(statisticsReadback(mesh, handle, pollStatistics(handle)));
    }
  );

  server.tool(
    'get_statistics',
    'Poll the latest statistics computation for a mesh. min_area is null when no triangle has positive area.',
    {
      mesh: z.string().describe('ID of mesh'),
      wait: z.boolean().default(false).describe('Wait for the computation to finish instead of returning "pending"'),
    },
    async ({ mesh, wait }) => {
      const handle = registry.getStatistics(mesh);
      const status = wait ? await handle.done : pollStatistics(handle);
      return json(statisticsReadback(mesh, handle, status));
    }
  );

  // ─── Geometry (3) ──────────────────────────────────────────

  server.tool(
    'subdivide',
    'Split every triangle into four at its edge midpoints (shared edges share one midpoint). Normals are recomputed.',
    {
      mesh: z.string().describe('ID of mesh to refine in place'),
      levels: z.number().int().min(1).max(5).default(1).describe('Subdivision rounds (each multiplies triangles by 4)'),
    },
    async ({ mesh, levels }) => {
      const entry = registry.get(mesh);
      subdivide(entry.record, levels);
      return json({ mesh_id: mesh, levels, readback: entry.record.readback() });
    }
  );

  server.tool(
    'is_inside',
    'Test whether a point is enclosed by a closed mesh (ray-casting parity along a fixed direction).',
    {
      mesh: z.string().describe('ID of mesh'),
      x: z.number().finite().describe('Point X'),
      y: z.number().finite().describe('Point Y'),
      z: z.number().finite().describe('Point Z'),
    },
    async ({ mesh, x, y, z: pz }) => {
      const entry = registry.get(mesh);
      const point: Vec3 = [x, y, pz];
      const inside = isPointInside(entry.record, point);
      const hits = countRayHits(entry.record, point);
      return json({ mesh_id: mesh, point, inside, hits, direction: RAY_DIRECTION });
    }
  );

  server.tool(
    'get_buffers',
    'Get render buffers: interleaved float32 [px, py, pz, nx, ny, nz] per vertex and uint32 indices, base64 little-endian.',
    {
      mesh: z.string().describe('ID of mesh'),
    },
    async ({ mesh }) => {
      const entry = registry.get(mesh);
      const buffers = toRenderBuffers(entry.record);
      return json({
        mesh_id: mesh,
        vertex_count: entry.record.vertexCount,
        index_count: buffers.indices.length,
        stride: buffers.stride,
        normal_offset: buffers.normalOffset,
        vertices_base64: Buffer.from(buffers.vertices.buffer).toString('base64'),
        indices_base64: Buffer.from(buffers.indices.buffer).toString('base64'),
      });
    }
  );
}
