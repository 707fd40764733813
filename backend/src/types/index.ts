import { z } from 'zod';

/**
 * Request/response types for the explored-area API
 *
 * Terminology:
 * - Reading: a raw location report from a client (may carry accuracy and speed)
 * - Fix: a reading accepted for the engine, with its buffer radius resolved
 * - Fog: the world minus the explored region, ready for rendering
 */

// =============================================================================
// Readings
// =============================================================================

export const locationReadingSchema = z.object({
  longitude: z.number().finite().min(-180).max(180),
  latitude: z.number().gt(-90).lt(90),
  timestampMs: z.number().int().nonnegative().optional(),
  accuracyMeters: z.number().finite().nonnegative().optional(),
  speedMetersPerSecond: z.number().finite().optional(),
  bufferRadiusMeters: z.number().finite().positive().max(1000).optional(),
});

export const ingestBodySchema = z.object({
  readings: z.array(locationReadingSchema).min(1).max(1000),
});

export type IngestBody = z.infer<typeof ingestBodySchema>;

export interface IngestSummary {
  received: number;
  accepted: number;
  rejected: number;
  skipped: number;
  tunnels: number;
  errors: string[];
}

// =============================================================================
// Maintenance
// =============================================================================

export const resetBodySchema = z.object({
  clearLog: z.boolean().default(false),
});

export type ResetBody = z.infer<typeof resetBodySchema>;

// =============================================================================
// Statistics
// =============================================================================

export interface StatsResponse {
  areaSquareMeters: number;
  percentOfEarth: number;
  percentOfLand: number;
  percentOfLandLabel: string;
  componentCount: number;
  tunnelCount: number;
}
