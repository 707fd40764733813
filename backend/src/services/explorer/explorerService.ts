/**
 * Explorer Service
 *
 * One instance per process. Wires the accumulator to its collaborators:
 * restores the snapshot (or rebuilds from the fix log) on start, filters and
 * sizes incoming readings, autosaves while running and saves once more on
 * shutdown.
 */

import { AreaAccumulator, type AccumulatorOptions } from './areaAccumulator.js';
import { resolveBufferRadius } from './bufferRadius.js';
import { errorMessage } from './errors.js';
import type { FixLog } from './fixLog.js';
import { toFogFeature, toTunnelLines } from './polygonExporter.js';
import type { SnapshotStore } from './snapshotStore.js';
import { computeStatistics } from './statistics.js';
import type { AddFixResult, ExplorationStats, Fix, RebuildResult, SaveResult, TrackPoint } from './types.js';
import { DEFAULT_BUFFER_METERS, fixValidationError } from './types.js';

export const DEFAULT_AUTOSAVE_INTERVAL_MS = 30_000;
export const DEFAULT_MAX_ACCURACY_METERS = 40;

export interface LocationReading {
  longitude: number;
  latitude: number;
  timestampMs?: number;
  accuracyMeters?: number;
  speedMetersPerSecond?: number;
  bufferRadiusMeters?: number;
}

export type IngestResult =
  | { status: 'skipped'; reason: string }
  | ({ status: 'accepted' } & Extract<AddFixResult, { accepted: true }>)
  | ({ status: 'rejected' } & Extract<AddFixResult, { accepted: false }>);

export interface StartResult {
  restored: boolean;
  rebuild: RebuildResult | null;
  error?: string;
}

export interface ExplorerServiceOptions {
  store: SnapshotStore;
  fixLog?: FixLog;
  autosaveIntervalMs?: number;
  maxAccuracyMeters?: number;
  accumulator?: AccumulatorOptions;
}

export class ExplorerService {
  readonly accumulator: AreaAccumulator;
  private readonly store: SnapshotStore;
  private readonly fixLog: FixLog | null;
  private readonly autosaveIntervalMs: number;
  private readonly maxAccuracyMeters: number;
  private autosaveTimer: NodeJS.Timeout | null = null;
  private savedRevision: number | null = null;

  constructor(options: ExplorerServiceOptions) {
    this.store = options.store;
    this.fixLog = options.fixLog ?? null;
    this.autosaveIntervalMs = options.autosaveIntervalMs ?? DEFAULT_AUTOSAVE_INTERVAL_MS;
    this.maxAccuracyMeters = options.maxAccuracyMeters ?? DEFAULT_MAX_ACCURACY_METERS;
    this.accumulator = new AreaAccumulator(options.accumulator);
  }

  /**
   * Restore the snapshot; rebuild from the fix log only when the file is
   * missing or unreadable. A saved empty region (e.g. after a reset) stays
   * empty. Then start autosaving.
   */
  async start(): Promise<StartResult> {
    const loaded = this.store.load();
    await this.accumulator.restore(loaded.region);
    this.savedRevision = loaded.needsRebuild ? null : this.accumulator.snapshot().revision;

    const rebuild = loaded.needsRebuild ? await this.rebuildFromLog() : null;

    this.startAutosave();
    return { restored: !loaded.needsRebuild, rebuild, ...(loaded.error ? { error: loaded.error } : {}) };
  }

  /** Filter, size, log and add one reading. */
  async ingest(reading: LocationReading): Promise<IngestResult> {
    if (reading.accuracyMeters !== undefined && reading.accuracyMeters > this.maxAccuracyMeters) {
      return { status: 'skipped', reason: `accuracy ${reading.accuracyMeters}m exceeds ${this.maxAccuracyMeters}m` };
    }

    const fix: Fix = {
      longitude: reading.longitude,
      latitude: reading.latitude,
      timestampMs: reading.timestampMs ?? Date.now(),
      bufferRadiusMeters: resolveBufferRadius(reading),
    };
    // Invalid fixes never reach the log
    const invalid = fixValidationError(fix);
    if (invalid !== null) {
      return { status: 'rejected', accepted: false, reason: 'invalid-fix', error: invalid };
    }

    if (this.fixLog) {
      try {
        await this.fixLog.append({
          longitude: fix.longitude,
          latitude: fix.latitude,
          timestampMs: fix.timestampMs,
          accuracyMeters: reading.accuracyMeters,
        });
      } catch (err) {
        console.warn('[FixLog] Failed to record fix:', errorMessage(err));
      }
    }

    const result = await this.accumulator.addFix(fix);
    return result.accepted ? { status: 'accepted', ...result } : { status: 'rejected', ...result };
  }

  /** Replay the whole fix log with the default radius. Null when there is no usable log. */
  async rebuildFromLog(): Promise<RebuildResult | null> {
    if (!this.fixLog) return null;
    let fixes: TrackPoint[];
    try {
      fixes = await this.fixLog.all();
    } catch (err) {
      console.warn('[FixLog] Failed to read fix log, skipping rebuild:', errorMessage(err));
      return null;
    }
    if (fixes.length === 0) return null;
    return this.accumulator.rebuildFromFixes(fixes, () => DEFAULT_BUFFER_METERS);
  }

  async reset(options: { clearLog?: boolean } = {}): Promise<SaveResult> {
    await this.accumulator.reset();
    if (options.clearLog && this.fixLog) {
      await this.fixLog.clear();
    }
    return this.save();
  }

  fogPolygon(): GeoJSON.Feature<GeoJSON.Polygon> {
    return toFogFeature(this.accumulator.snapshot().region);
  }

  tunnelLines(): GeoJSON.Feature<GeoJSON.MultiLineString> {
    return toTunnelLines(this.accumulator.snapshot().tunnelSegments);
  }

  statistics(): ExplorationStats {
    const { region, tunnelSegments } = this.accumulator.snapshot();
    return computeStatistics(region, tunnelSegments.length);
  }

  /** Write the snapshot unless nothing changed since the last successful save. */
  save(): SaveResult {
    const { region, revision } = this.accumulator.snapshot();
    if (revision === this.savedRevision) {
      return { saved: false };
    }
    const result = this.store.save(region);
    if (result.saved) {
      this.savedRevision = revision;
    }
    return result;
  }

  /** Stop autosaving and make one last save attempt. */
  shutdown(): SaveResult {
    this.stopAutosave();
    const result = this.save();
    console.log(`[Explorer] Shutdown save: ${result.saved ? `${result.bytes} bytes written` : result.error ?? 'nothing to save'}`);
    return result;
  }

  private stopAutosave(): void {
    if (this.autosaveTimer) {
      clearInterval(this.autosaveTimer);
      this.autosaveTimer = null;
    }
  }

  private startAutosave(): void {
    if (this.autosaveTimer || this.autosaveIntervalMs <= 0) return;
    this.autosaveTimer = setInterval(() => {
      try {
        const result = this.save();
        if (result.saved && process.env.NODE_ENV !== 'production') {
          console.log(`[Explorer] Autosaved snapshot (${result.bytes} bytes)`);
        }
      } catch (err) {
        // save() only throws on storage exhaustion
        console.error('[Explorer] Autosave stopped:', err);
        this.stopAutosave();
      }
    }, this.autosaveIntervalMs);
    this.autosaveTimer.unref();
  }
}
