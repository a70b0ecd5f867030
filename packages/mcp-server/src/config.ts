/**
 * Server configuration from environment variables.
 *
 *   MESHWORK_MESH_DIR        input directory for list_mesh_files and relative paths (default ./meshes)
 *   MESHWORK_STATS_WORKERS   cap on statistics batches (default: hardware parallelism)
 *   MESHWORK_STATS_EXECUTOR  'thread' (default) or 'inline'
 */

import * as path from 'node:path';
import { z } from 'zod';
import type { StatisticsExecutor } from '@meshwork/mesh-kernel';

const blankAsUnset = (v: unknown) => (v === '' ? undefined : v);

const envSchema = z.object({
  MESHWORK_MESH_DIR: z.preprocess(blankAsUnset, z.string().default('meshes')),
  MESHWORK_STATS_WORKERS: z.preprocess(blankAsUnset, z.coerce.number().int().positive().optional()),
  MESHWORK_STATS_EXECUTOR: z.preprocess(blankAsUnset, z.enum(['thread', 'inline']).default('thread')),
});

export interface ServerConfig {
  /** Absolute. */
  meshDir: string;
  statsWorkers?: number;
  statsExecutor: StatisticsExecutor;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd = process.cwd()): ServerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new Error(`Invalid configuration — ${problems.join('; ')}`);
  }
  const { MESHWORK_MESH_DIR, MESHWORK_STATS_WORKERS, MESHWORK_STATS_EXECUTOR } = parsed.data;
  return {
    meshDir: path.resolve(cwd, MESHWORK_MESH_DIR),
    statsWorkers: MESHWORK_STATS_WORKERS,
    statsExecutor: MESHWORK_STATS_EXECUTOR,
  };
}
