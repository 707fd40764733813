/**
 * Buffer radius from measured speed.
 *
 * Bucketed, not continuous: slow movement paints a wide swath, fast
 * movement a narrow one.
 */

import { DEFAULT_BUFFER_METERS } from './types.js';

export const MIN_BUFFER_METERS = 3;

const SPEED_BUCKETS: ReadonlyArray<{ maxKmh: number; radiusMeters: number }> = [
  { maxKmh: 6, radiusMeters: 40 },    // walking / stopped
  { maxKmh: 25, radiusMeters: 28 },   // bike
  { maxKmh: 70, radiusMeters: 18 },   // road
  { maxKmh: 130, radiusMeters: 12 },  // highway
];
const FASTEST_RADIUS_METERS = 8;      // train

export function bufferRadiusForSpeed(speedMetersPerSecond: number): number {
  const safeSpeed = Number.isFinite(speedMetersPerSecond) && speedMetersPerSecond >= 0 ? speedMetersPerSecond : 0;
  const kmh = safeSpeed * 3.6;
  const bucket = SPEED_BUCKETS.find(b => kmh < b.maxKmh);
  return Math.max(MIN_BUFFER_METERS, bucket ? bucket.radiusMeters : FASTEST_RADIUS_METERS);
}

/** Explicit radius wins, then speed, then the default. */
export function resolveBufferRadius(reading: { bufferRadiusMeters?: number; speedMetersPerSecond?: number }): number {
  if (reading.bufferRadiusMeters !== undefined) return reading.bufferRadiusMeters;
  if (reading.speedMetersPerSecond !== undefined) return bufferRadiusForSpeed(reading.speedMetersPerSecond);
  return DEFAULT_BUFFER_METERS;
}
