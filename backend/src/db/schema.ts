import { pgTable, bigserial, doublePrecision, bigint, real, timestamp, index } from 'drizzle-orm/pg-core';

/**
 * Database Schema for the explored-area service
 *
 * Only the raw fix log lives in the database. The explored region itself is
 * kept in a binary snapshot file and can always be rebuilt from this log.
 */

// =============================================================================
// Location Fixes (raw fix log)
// =============================================================================

export const locationFixes = pgTable('location_fixes', {
  id: bigserial('id', { mode: 'number' }).primaryKey(),
  latitude: doublePrecision('latitude').notNull(),
  longitude: doublePrecision('longitude').notNull(),
  timestampMs: bigint('timestamp_ms', { mode: 'number' }).notNull(),
  accuracyMeters: real('accuracy_meters'),
  recordedAt: timestamp('recorded_at', { withTimezone: true }).defaultNow(),
}, (table) => ({
  timestampIdx: index('idx_location_fixes_timestamp').on(table.timestampMs),
}));

export type LocationFixRow = typeof locationFixes.$inferSelect;
export type NewLocationFixRow = typeof locationFixes.$inferInsert;
