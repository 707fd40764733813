/**
 * Area Accumulator
 *
 * Owns the explored region, the track cursor and the tunnel history, and is
 * the only place they change. Every mutation runs under one mutex, so the
 * cursor read, the union and the cursor write of a fix form one critical
 * section, and a rebuild excludes ingest for its whole duration.
 */

import { Mutex } from 'async-mutex';
import { setImmediate as yieldToEventLoop } from 'timers/promises';
import { errorMessage, isFatalError } from './errors.js';
import { bufferPoint, bufferSegment, CIRCLE_SEGMENTS, unionIntoRegion } from './geometry.js';
import { classifyGap, type TrackSample } from './gapClassifier.js';
import { toPlanar } from './projection.js';
import type {
  AddFixResult,
  ExploredRegion,
  Fix,
  GapThresholds,
  RebuildResult,
  RegionSnapshot,
  TrackCursor,
  TrackPoint,
  TunnelSegment,
} from './types.js';
import {
  DEFAULT_BUFFER_METERS,
  DEFAULT_GAP_THRESHOLDS,
  emptyRegion,
  fixValidationError,
  REBUILD_BATCH_SIZE,
  REBUILD_MAX_FIXES,
} from './types.js';

export interface AccumulatorOptions {
  thresholds?: GapThresholds;
  circleSegments?: number;
}

/**
 * Fixed-stride reduction for very large histories: keeps every step-th fix
 * by index, step = floor(n / maxFixes). Deterministic, order preserving.
 */
export function downsampleByStride<T>(fixes: readonly T[], maxFixes: number = REBUILD_MAX_FIXES): T[] {
  if (fixes.length <= maxFixes) return [...fixes];
  const step = Math.floor(fixes.length / maxFixes);
  return fixes.filter((_, index) => index % step === 0);
}

/** Everything a replay rebuilds; swapped into the accumulator in one assignment. */
interface TrackState {
  region: ExploredRegion;
  cursor: TrackCursor;
  tunnels: TunnelSegment[];
}

function emptyTrackState(): TrackState {
  return { region: emptyRegion(), cursor: { lastPoint: null, lastTimestampMs: null }, tunnels: [] };
}

type FixOutcome =
  | { result: Extract<AddFixResult, { accepted: true }>; next: TrackState }
  | { result: Extract<AddFixResult, { accepted: false }>; next: null };

export class AreaAccumulator {
  private state: TrackState = emptyTrackState();
  private revision = 0;
  private readonly mutex = new Mutex();
  private readonly thresholds: GapThresholds;
  private readonly circleSegments: number;

  constructor(options: AccumulatorOptions = {}) {
    this.thresholds = options.thresholds ?? DEFAULT_GAP_THRESHOLDS;
    this.circleSegments = options.circleSegments ?? CIRCLE_SEGMENTS;
  }

  /** Add one fix; resolves once its shape is part of the region (or was rejected). */
  addFix(fix: Fix): Promise<AddFixResult> {
    return this.mutex.runExclusive(() => {
      const { result, next } = this.applyFix(this.state, fix);
      if (next) this.commit(next);
      return result;
    });
  }

  /** Clear region, cursor and tunnel history. */
  reset(): Promise<void> {
    return this.mutex.runExclusive(() => this.commit(emptyTrackState()));
  }

  /** Replace the region wholesale, e.g. with a loaded snapshot. The cursor starts over. */
  restore(region: ExploredRegion): Promise<void> {
    return this.mutex.runExclusive(() => this.commit({ ...emptyTrackState(), region }));
  }

  /**
   * Replay historical fixes in their recorded order into a fresh track and
   * swap it in at the end. Until then readers keep seeing the previous
   * region; if the replay throws, nothing changes.
   * Holds the lock throughout; concurrent addFix calls wait until the replay ends.
   */
  rebuildFromFixes<T extends TrackPoint>(
    fixes: readonly T[],
    bufferRadiusFn: (fix: T) => number = () => DEFAULT_BUFFER_METERS,
    batchSize: number = REBUILD_BATCH_SIZE
  ): Promise<RebuildResult> {
    return this.mutex.runExclusive(async () => {
      const sampled = downsampleByStride(fixes);
      const size = Math.max(1, Math.floor(batchSize));
      const result: RebuildResult = {
        inputCount: fixes.length,
        replayedCount: sampled.length,
        acceptedCount: 0,
        rejectedCount: 0,
      };

      let replay = emptyTrackState();
      for (let start = 0; start < sampled.length; start += size) {
        for (const fix of sampled.slice(start, start + size)) {
          const outcome = this.applyFix(replay, {
            longitude: fix.longitude,
            latitude: fix.latitude,
            timestampMs: fix.timestampMs,
            bufferRadiusMeters: bufferRadiusFn(fix),
          });
          if (outcome.next) {
            replay = outcome.next;
            result.acceptedCount++;
          } else {
            result.rejectedCount++;
          }
        }
        await yieldToEventLoop();
      }

      this.commit(replay);
      console.log(`[Explorer] Rebuilt region from ${result.replayedCount}/${result.inputCount} fixes (${result.rejectedCount} rejected)`);
      return result;
    });
  }

  /** Consistent view of the current state, taken without waiting for the lock. */
  snapshot(): RegionSnapshot {
    const { region, cursor, tunnels } = this.state;
    return { region, cursor, tunnelSegments: tunnels, revision: this.revision };
  }

  private commit(next: TrackState): void {
    this.state = next;
    this.revision++;
  }

  /** Pure with respect to the accumulator: returns the next state instead of writing it. */
  private applyFix(state: TrackState, fix: Fix): FixOutcome {
    const invalid = fixValidationError(fix);
    if (invalid !== null) {
      return { result: { accepted: false, reason: 'invalid-fix', error: invalid }, next: null };
    }

    const current: TrackSample = {
      point: toPlanar(fix.longitude, fix.latitude),
      timestampMs: fix.timestampMs,
    };
    const { lastPoint, lastTimestampMs } = state.cursor;
    const previous: TrackSample | null = lastPoint && lastTimestampMs !== null
      ? { point: lastPoint, timestampMs: lastTimestampMs }
      : null;

    const gap = classifyGap(previous, current, this.thresholds);
    const shape = gap.connect && previous
      ? bufferSegment(previous.point, current.point, fix.bufferRadiusMeters, this.circleSegments)
      : bufferPoint(current.point, fix.bufferRadiusMeters, this.circleSegments);
    const tunnel = !gap.connect && gap.teleport;

    let region: ExploredRegion;
    try {
      region = unionIntoRegion(state.region, shape);
    } catch (err) {
      if (isFatalError(err)) throw err;
      const error = errorMessage(err);
      console.warn(`[Explorer] Rejected fix at ${fix.longitude},${fix.latitude}: union failed:`, error);
      return { result: { accepted: false, reason: 'union-failed', error }, next: null };
    }

    return {
      result: { accepted: true, connected: gap.connect, tunnel },
      next: {
        region,
        cursor: { lastPoint: current.point, lastTimestampMs: current.timestampMs },
        tunnels: tunnel && previous ? [...state.tunnels, { from: previous.point, to: current.point }] : state.tunnels,
      },
    };
  }
}
