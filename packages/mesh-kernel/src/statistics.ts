/**
 * Triangle area statistics — parallel, non-blocking.
 *
 *   const handle = beginStatistics(record);   // returns immediately
 *   pollStatistics(handle);                   // { state: 'pending' } ... { state: 'ready', statistics }
 *   await handle.done;                        // or wait for the settled status
 *
 * The triangle range is split into W = min(T, workers) contiguous batches,
 * batch i = [⌊i·T/W⌋, ⌊(i+1)·T/W⌋). Each batch reduces to min/max/sum;
 * the aggregator waits for all of them before publishing.
 *
 * Work runs on a snapshot of the buffers, and the record holds a read
 * lease until the result is published, so mutators fail fast meanwhile.
 * One computation per record at a time; a second request throws.
 */

import { availableParallelism } from 'node:os';
import { Worker } from 'node:worker_threads';
import type { GeometryRecord } from './mesh.js';
import type { AreaAggregate, TriangleStatistics } from './area.js';
import { aggregateAreas, emptyAggregate, finalizeStatistics, mergeAggregates } from './area.js';
import { StatisticsInFlightError } from './errors.js';

// ─── Types ──────────────────────────────────────────────────────

export type StatisticsExecutor = 'thread' | 'inline';

export interface StatisticsOptions {
  /** Upper bound on parallel batches. Default: hardware parallelism. */
  workers?: number;
  /** 'thread' runs each batch in a worker thread; 'inline' on the event loop. */
  executor?: StatisticsExecutor;
  /** Custom batch runner. Takes precedence over `executor`. */
  runner?: BatchRunner;
}

/** Triangle range [start, end). */
export interface BatchRange {
  start: number;
  end: number;
}

export interface BatchRequest extends BatchRange {
  positions: Float64Array;
  indices: Int32Array;
}

export type BatchResponse =
  | { ok: true; aggregate: AreaAggregate }
  | { ok: false; error: string; stack?: string };

export type SettledStatistics =
  | { state: 'ready'; statistics: TriangleStatistics }
  | { state: 'failed'; error: Error };

export type StatisticsStatus = { state: 'pending' } | SettledStatistics;

// ─── Partitioning ───────────────────────────────────────────────

/** Balanced split: batch sizes differ by at most one triangle. */
export function partitionTriangles(triangleCount: number, batchCount: number): BatchRange[] {
  if (triangleCount <= 0 || batchCount <= 0) return [];
  const w = Math.min(triangleCount, batchCount);
  const batches: BatchRange[] = [];
  for (let i = 0; i < w; i++) {
    batches.push({
      start: Math.floor((i * triangleCount) / w),
      end: Math.floor(((i + 1) * triangleCount) / w),
    });
  }
  return batches;
}

// ─── Executors ──────────────────────────────────────────────────

export type BatchRunner = (request: BatchRequest) => Promise<AreaAggregate>;

export const runInline: BatchRunner = (request) =>
  new Promise((resolve, reject) => {
    setImmediate(() => {
      try {
        resolve(aggregateAreas(request.positions, request.indices, request.start, request.end));
      } catch (err) {
        reject(err);
      }
    });
  });

// From source (tests, tsx) the worker starts through a bootstrap that registers tsx.
const fromSource = import.meta.url.endsWith('.ts');
const defaultWorkerEntry = new URL(
  fromSource ? './stats-worker-bootstrap.mjs' : './stats-worker.js',
  import.meta.url,
);

/** Run each batch in its own worker thread started from `entry`. */
export function threadRunner(entry: URL = defaultWorkerEntry): BatchRunner {
  return (request) =>
    new Promise((resolve, reject) => {
      const worker = new Worker(entry, { workerData: request });
      let settled = false;

      worker.once('message', (message: BatchResponse) => {
        settled = true;
        if (message.ok) {
          resolve(message.aggregate);
          return;
        }
        const err = new Error(message.error);
        if (message.stack) err.stack = message.stack;
        reject(err);
      });
      worker.once('error', (err) => {
        if (settled) return;
        settled = true;
        reject(err);
      });
      worker.once('exit', (code) => {
        if (settled) return;
        settled = true;
        reject(new Error(`Statistics worker exited with code ${code} before reporting`));
      });
    });
}

const runInThread = threadRunner();

// ─── Handle ─────────────────────────────────────────────────────

const inFlight = new WeakMap<GeometryRecord, StatisticsHandle>();

export class StatisticsHandle {
  readonly triangleCount: number;
  readonly workerCount: number;
  /** Resolves once the result is published. Never rejects. */
  readonly done: Promise<SettledStatistics>;
  private current: StatisticsStatus = { state: 'pending' };

  constructor(
    triangleCount: number,
    workerCount: number,
    work: Promise<TriangleStatistics>,
    onSettled: () => void,
  ) {
    this.triangleCount = triangleCount;
    this.workerCount = workerCount;
    this.done = work
      .then(
        (statistics): SettledStatistics => ({ state: 'ready', statistics }),
        (err: unknown): SettledStatistics => ({
          state: 'failed',
          error: err instanceof Error ? err : new Error(String(err)),
        }),
      )
      .then((status) => {
        this.current = status;
        onSettled();
        return status;
      });
  }

  get status(): StatisticsStatus {
    return this.current;
  }
}

// ─── Public API ─────────────────────────────────────────────────

export function beginStatistics(record: GeometryRecord, options: StatisticsOptions = {}): StatisticsHandle {
  if (inFlight.has(record)) {
    throw new StatisticsInFlightError();
  }
  record.assertValid();

  const limit = options.workers ?? availableParallelism();
  if (!Number.isInteger(limit) || limit < 1) {
    throw new Error(`workers must be a positive integer, got ${limit}`);
  }

  const triangleCount = record.triangleCount;
  const batches = partitionTriangles(triangleCount, limit);
  const run = options.runner ?? ((options.executor ?? 'thread') === 'thread' ? runInThread : runInline);
  const { positions, indices } = record.snapshot(run !== runInline);

  const release = record.acquireRead();
  const work = Promise.all(
    batches.map((batch) => run({ positions, indices, start: batch.start, end: batch.end })),
  ).then((parts) => finalizeStatistics(parts.reduce(mergeAggregates, emptyAggregate()), triangleCount));

  const handle = new StatisticsHandle(triangleCount, batches.length, work, () => {
    release();
    inFlight.delete(record);
  });
  inFlight.set(record, handle);
  return handle;
}

export function pollStatistics(handle: StatisticsHandle): StatisticsStatus {
  return handle.status;
}

export function isStatisticsPending(record: GeometryRecord): boolean {
  return inFlight.has(record);
}
