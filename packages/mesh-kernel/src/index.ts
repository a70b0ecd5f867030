// Public API
export type { Vec3, BoundingBox } from './vec3.js';

// Geometry record
export { GeometryRecord, TriangleView, makeVertex } from './mesh.js';
export type { Vertex, MeshReadback, MeshSnapshot } from './mesh.js';

// Errors
export { MeshLoadError, MeshInvariantError, MeshBusyError, StatisticsInFlightError } from './errors.js';
export type { MeshLoadErrorKind } from './errors.js';

// Loading
export { parseMesh, loadMesh, buildRecord, meshDocumentSchema } from './loader.js';
export type { MeshDocument } from './loader.js';
export { listMeshFiles } from './library.js';
export type { MeshFileEntry } from './library.js';

// Normals
export { recalculateNormals, faceNormal } from './normals.js';

// Statistics
export { NO_MIN_AREA, triangleAreaAt, aggregateAreas, mergeAggregates, finalizeStatistics } from './area.js';
export type { TriangleStatistics, AreaAggregate } from './area.js';
export {
  beginStatistics, pollStatistics, isStatisticsPending,
  partitionTriangles, StatisticsHandle, runInline, threadRunner,
} from './statistics.js';
export type {
  StatisticsOptions, StatisticsExecutor, StatisticsStatus, SettledStatistics,
  BatchRange, BatchRequest, BatchResponse, BatchRunner,
} from './statistics.js';

// Subdivision
export { subdivide, countEdges, edgeKey } from './subdivide.js';

// Containment
export { isPointInside, countRayHits, intersectRayTriangle, RAY_DIRECTION, EPSILON } from './containment.js';

// Render buffers
export { toRenderBuffers, FLOATS_PER_VERTEX } from './buffers.js';
export type { RenderBuffers } from './buffers.js';
