/**
 * Gap classification between consecutive fixes.
 *
 * A jump that is both slow (no fix for a while) and long is treated as
 * unobserved transit, e.g. a subway ride, and is never bridged by a corridor.
 * Jumps beyond the connect distance are not bridged either, so noisy fixes
 * cannot paint long spurious corridors.
 */

import type { GapThresholds, PlanarPoint } from './types.js';
import { DEFAULT_GAP_THRESHOLDS } from './types.js';

export interface TrackSample {
  point: PlanarPoint;
  timestampMs: number;
}

export interface GapDecision {
  distanceMeters: number;
  elapsedSeconds: number;
  teleport: boolean;
  connect: boolean;
}

export function planarDistance(a: PlanarPoint, b: PlanarPoint): number {
  return Math.hypot(b.x - a.x, b.y - a.y);
}

export function isTeleportGap(
  previous: TrackSample,
  current: TrackSample,
  thresholds: GapThresholds = DEFAULT_GAP_THRESHOLDS
): boolean {
  const elapsedSeconds = (current.timestampMs - previous.timestampMs) / 1000;
  return elapsedSeconds >= thresholds.maxNoFixIntervalSeconds &&
    planarDistance(previous.point, current.point) >= thresholds.minTeleportDistanceMeters;
}

export function shouldConnect(
  previous: TrackSample | null,
  current: TrackSample,
  thresholds: GapThresholds = DEFAULT_GAP_THRESHOLDS
): boolean {
  if (!previous) return false;
  const withinRange = planarDistance(previous.point, current.point) <= thresholds.maxConnectDistanceMeters;
  return withinRange && !isTeleportGap(previous, current, thresholds);
}

/** Both decisions at once; with no previous sample nothing connects and nothing is a gap. */
export function classifyGap(
  previous: TrackSample | null,
  current: TrackSample,
  thresholds: GapThresholds = DEFAULT_GAP_THRESHOLDS
): GapDecision {
  if (!previous) {
    return { distanceMeters: 0, elapsedSeconds: 0, teleport: false, connect: false };
  }
  return {
    distanceMeters: planarDistance(previous.point, current.point),
    elapsedSeconds: (current.timestampMs - previous.timestampMs) / 1000,
    teleport: isTeleportGap(previous, current, thresholds),
    connect: shouldConnect(previous, current, thresholds),
  };
}
