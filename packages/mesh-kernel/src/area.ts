/**
 * Triangle area aggregation over flat buffers.
 *
 * Shared by the inline executor and the worker thread entry, so both
 * compute bit-identical batch results.
 */

export interface TriangleStatistics {
  /** Smallest strictly positive area, or NO_MIN_AREA when none exists. */
  minArea: number;
  maxArea: number;
  avgArea: number;
}

/** Per-batch partial result. Reduction is commutative and associative. */
export interface AreaAggregate {
  min: number;
  max: number;
  sum: number;
  count: number;
}

/**
 * Sentinel reported as `minArea` when no triangle has positive area
 * (empty or fully degenerate mesh). Not a measurement — don't render it.
 */
export const NO_MIN_AREA = Number.POSITIVE_INFINITY;

export function emptyAggregate(): AreaAggregate {
  return { min: NO_MIN_AREA, max: 0, sum: 0, count: 0 };
}

/**
 * Area of triangle t: 0.5 × |(vA − vB) × (vC − vB)|.
 * Same face normal as the normal calculator, recomputed from positions.
 */
export function triangleAreaAt(positions: Float64Array, indices: Int32Array, t: number): number {
  const a = indices[t * 3] * 3;
  const b = indices[t * 3 + 1] * 3;
  const c = indices[t * 3 + 2] * 3;

  const e1x = positions[a] - positions[b];
  const e1y = positions[a + 1] - positions[b + 1];
  const e1z = positions[a + 2] - positions[b + 2];
  const e2x = positions[c] - positions[b];
  const e2y = positions[c + 1] - positions[b + 1];
  const e2z = positions[c + 2] - positions[b + 2];

  const nx = e1y * e2z - e1z * e2y;
  const ny = e1z * e2x - e1x * e2z;
  const nz = e1x * e2y - e1y * e2x;
  return Math.sqrt(nx * nx + ny * ny + nz * nz) * 0.5;
}

/** Aggregate areas of triangles [start, end). */
export function aggregateAreas(
  positions: Float64Array,
  indices: Int32Array,
  start: number,
  end: number,
): AreaAggregate {
  const agg = emptyAggregate();
  for (let t = start; t < end; t++) {
    const area = triangleAreaAt(positions, indices, t);
    if (area > 0 && area < agg.min) agg.min = area;
    if (area > agg.max) agg.max = area;
    agg.sum += area;
    agg.count++;
  }
  return agg;
}

export function mergeAggregates(a: AreaAggregate, b: AreaAggregate): AreaAggregate {
  return {
    min: Math.min(a.min, b.min),
    max: Math.max(a.max, b.max),
    sum: a.sum + b.sum,
    count: a.count + b.count,
  };
}

export function finalizeStatistics(agg: AreaAggregate, triangleCount: number): TriangleStatistics {
  return {
    minArea: agg.min,
    maxArea: agg.max,
    avgArea: triangleCount > 0 ? agg.sum / triangleCount : 0,
  };
}
