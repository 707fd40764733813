/**
 * Types and constants for the explored-area engine
 */

import { z } from 'zod';

/** A raw fix as kept in the fix log */
export interface TrackPoint {
  longitude: number;
  latitude: number;
  timestampMs: number;
}

/** A fix ready for the accumulator: position, time and the radius to inflate it by */
export interface Fix extends TrackPoint {
  bufferRadiusMeters: number;
}

/** Position in Web Mercator meters */
export interface PlanarPoint {
  x: number;
  y: number;
}

export interface TrackCursor {
  lastPoint: PlanarPoint | null;
  lastTimestampMs: number | null;
}

/** Classified discontinuity between two fixes, kept for visualization only */
export interface TunnelSegment {
  from: PlanarPoint;
  to: PlanarPoint;
}

/**
 * Accumulated explored area. Coordinates are Web Mercator meters, not lon/lat.
 * Values are never mutated in place; every change produces a new object.
 */
export type ExploredRegion = GeoJSON.MultiPolygon;

export interface GapThresholds {
  maxConnectDistanceMeters: number;
  maxNoFixIntervalSeconds: number;   // elapsed time at or above which a jump may be a tunnel
  minTeleportDistanceMeters: number;
}

export const DEFAULT_GAP_THRESHOLDS: GapThresholds = {
  maxConnectDistanceMeters: 10_000,
  maxNoFixIntervalSeconds: 30,
  minTeleportDistanceMeters: 100,
};

export const DEFAULT_BUFFER_METERS = 15;
export const REBUILD_BATCH_SIZE = 200;
export const REBUILD_MAX_FIXES = 20_000;

export const EARTH_SURFACE_AREA_M2 = 5.10072e14;
export const EARTH_LAND_AREA_M2 = 1.4894e14;

export const fixSchema = z.object({
  longitude: z.number().finite(),
  latitude: z.number().gt(-90).lt(90),
  timestampMs: z.number().finite(),
  bufferRadiusMeters: z.number().finite().positive(),
});

/** Why a fix cannot enter the engine, or null when it can. */
export function fixValidationError(fix: Fix): string | null {
  const parsed = fixSchema.safeParse(fix);
  return parsed.success
    ? null
    : parsed.error.errors.map(e => `${e.path.join('.')}: ${e.message}`).join('; ');
}

export type AddFixResult =
  | { accepted: true; connected: boolean; tunnel: boolean }
  | { accepted: false; reason: 'invalid-fix' | 'union-failed'; error: string };

export interface RebuildResult {
  inputCount: number;
  replayedCount: number;
  acceptedCount: number;
  rejectedCount: number;
}

export interface RegionSnapshot {
  region: ExploredRegion;
  cursor: Readonly<TrackCursor>;
  tunnelSegments: readonly TunnelSegment[];
  revision: number;
}

export interface LoadResult {
  region: ExploredRegion;
  needsRebuild: boolean;
  error?: string;
}

export interface SaveResult {
  saved: boolean;
  bytes?: number;
  error?: string;
}

export interface ExplorationStats {
  areaSquareMeters: number;
  percentOfEarth: number;
  percentOfLand: number;
  componentCount: number;
  tunnelCount: number;
}

export function emptyRegion(): ExploredRegion {
  return { type: 'MultiPolygon', coordinates: [] };
}
