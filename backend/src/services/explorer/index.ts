/**
 * Explored Area Engine
 *
 * Turns a stream of position fixes into one ever-growing explored region
 * (Web Mercator meters), persists it as WKB and exports it as a fog polygon.
 *
 * Pipeline per fix:
 * 1. Project lon/lat to planar meters
 * 2. Classify the gap to the previous fix (connect, isolated blob, or tunnel)
 * 3. Buffer a corridor or a disc by the fix's radius
 * 4. Union it into the region under the accumulator's lock
 */

// Types and constants
export type {
  TrackPoint,
  Fix,
  PlanarPoint,
  TrackCursor,
  TunnelSegment,
  ExploredRegion,
  GapThresholds,
  AddFixResult,
  RebuildResult,
  RegionSnapshot,
  LoadResult,
  SaveResult,
  ExplorationStats,
} from './types.js';
export {
  DEFAULT_GAP_THRESHOLDS,
  DEFAULT_BUFFER_METERS,
  EARTH_SURFACE_AREA_M2,
  EARTH_LAND_AREA_M2,
  emptyRegion,
} from './types.js';

// Public API
export { AreaAccumulator, downsampleByStride, type AccumulatorOptions } from './areaAccumulator.js';
export {
  ExplorerService,
  type ExplorerServiceOptions,
  type LocationReading,
  type IngestResult,
  type StartResult,
} from './explorerService.js';
export { SnapshotStore } from './snapshotStore.js';
export { PgFixLog, ensureFixLogSchema, type FixLog, type LoggedFix } from './fixLog.js';

// Lower-level building blocks
export { toPlanar, toGeographic } from './projection.js';
export { classifyGap, isTeleportGap, shouldConnect, planarDistance, type TrackSample, type GapDecision } from './gapClassifier.js';
export { bufferPoint, bufferSegment, unionIntoRegion, ringSignedArea, planarArea } from './geometry.js';
export { encodeRegion, decodeRegion } from './persistenceCodec.js';
export { toRenderablePolygon, toFogFeature, toTunnelLines, WORLD_RING } from './polygonExporter.js';
export { exploredAreaMeters, percentOfEarthSurface, percentOfLand, computeStatistics, formatPercent } from './statistics.js';
export { bufferRadiusForSpeed, resolveBufferRadius } from './bufferRadius.js';
