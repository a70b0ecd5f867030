/**
 * Worker thread entry: aggregate one batch of triangle areas.
 * Reads its BatchRequest from workerData, posts one BatchResponse, exits.
 */

import { parentPort, workerData } from 'node:worker_threads';
import { aggregateAreas } from './area.js';
import type { BatchRequest, BatchResponse } from './statistics.js';

function isBatchRequest(value: unknown): value is BatchRequest {
  if (typeof value !== 'object' || value === null) return false;
  return 'positions' in value && value.positions instanceof Float64Array
    && 'indices' in value && value.indices instanceof Int32Array
    && 'start' in value && typeof value.start === 'number'
    && 'end' in value && typeof value.end === 'number';
}

const port = parentPort;
if (!port) {
  throw new Error('Statistics worker started without parentPort');
}

const request: unknown = workerData;
let response: BatchResponse;
try {
  if (!isBatchRequest(request)) {
    throw new Error('Statistics worker received a malformed batch request');
  }
  const aggregate = aggregateAreas(request.positions, request.indices, request.start, request.end);
  response = { ok: true, aggregate };
} catch (err) {
  response = {
    ok: false,
    error: err instanceof Error ? err.message : String(err),
    stack: err instanceof Error ? err.stack : undefined,
  };
}
port.postMessage(response);
