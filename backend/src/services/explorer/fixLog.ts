/**
 * Raw fix log
 *
 * Every accepted reading is appended here before it reaches the engine, so
 * the explored region can be rebuilt when no usable snapshot exists.
 */

import { asc } from 'drizzle-orm';
import type { Pool } from 'pg';
import type { Database } from '../../db/index.js';
import { locationFixes } from '../../db/schema.js';
import type { TrackPoint } from './types.js';

export interface LoggedFix extends TrackPoint {
  accuracyMeters?: number;
}

export interface FixLog {
  append(fix: LoggedFix): Promise<void>;
  /** All fixes, oldest first (insertion order breaks ties). */
  all(): Promise<TrackPoint[]>;
  clear(): Promise<void>;
}

export class PgFixLog implements FixLog {
  constructor(private readonly db: Database) {}

  async append(fix: LoggedFix): Promise<void> {
    await this.db.insert(locationFixes).values({
      latitude: fix.latitude,
      longitude: fix.longitude,
      timestampMs: fix.timestampMs,
      accuracyMeters: fix.accuracyMeters ?? null,
    });
  }

  async all(): Promise<TrackPoint[]> {
    const rows = await this.db
      .select({
        latitude: locationFixes.latitude,
        longitude: locationFixes.longitude,
        timestampMs: locationFixes.timestampMs,
      })
      .from(locationFixes)
      .orderBy(asc(locationFixes.timestampMs), asc(locationFixes.id));
    return rows;
  }

  async clear(): Promise<void> {
    await this.db.delete(locationFixes);
  }
}

/** Create the fix log table if it does not exist yet. */
export async function ensureFixLogSchema(pool: Pool): Promise<void> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS location_fixes (
      id BIGSERIAL PRIMARY KEY,
      latitude DOUBLE PRECISION NOT NULL,
      longitude DOUBLE PRECISION NOT NULL,
      timestamp_ms BIGINT NOT NULL,
      accuracy_meters REAL,
      recorded_at TIMESTAMPTZ DEFAULT NOW()
    )
  `);
  await pool.query('CREATE INDEX IF NOT EXISTS idx_location_fixes_timestamp ON location_fixes (timestamp_ms)');
}
