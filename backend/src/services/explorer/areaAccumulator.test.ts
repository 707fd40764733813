/**
 * Tests for the area accumulator: incremental union, gap handling,
 * failure atomicity, lock discipline and rebuild.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { AreaAccumulator, downsampleByStride } from './areaAccumulator.js';
import { toRenderablePolygon } from './polygonExporter.js';
import { exploredAreaMeters } from './statistics.js';
import type { Fix } from './types.js';

// Wrap the real union so single calls can be made to fail
vi.mock('./geometry.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('./geometry.js')>();
  return { ...actual, unionIntoRegion: vi.fn(actual.unionIntoRegion) };
});

import { unionIntoRegion } from './geometry.js';

function fix(longitude: number, latitude: number, seconds: number, bufferRadiusMeters = 15): Fix {
  return { longitude, latitude, timestampMs: seconds * 1000, bufferRadiusMeters };
}

function area(accumulator: AreaAccumulator): number {
  return exploredAreaMeters(accumulator.snapshot().region);
}

describe('AreaAccumulator.addFix', () => {
  let accumulator: AreaAccumulator;

  beforeEach(() => {
    accumulator = new AreaAccumulator();
    vi.restoreAllMocks();
  });

  it('builds one connected corridor from a short walk', async () => {
    await accumulator.addFix(fix(0, 0, 0));
    await accumulator.addFix(fix(0, 0.001, 2));
    await accumulator.addFix(fix(0, 0.002, 4));

    const { region, tunnelSegments } = accumulator.snapshot();
    expect(region.coordinates).toHaveLength(1);
    expect(tunnelSegments).toHaveLength(0);
    // 30 m wide strip over 222.64 m plus two 16-segment end caps
    expect(area(accumulator)).toBeGreaterThan(7380);
    expect(area(accumulator)).toBeLessThan(7383);
    expect(toRenderablePolygon(region).coordinates).toHaveLength(2);
  });

  it('reports connection and tunnel flags', async () => {
    expect(await accumulator.addFix(fix(0, 0, 0))).toEqual({ accepted: true, connected: false, tunnel: false });
    expect(await accumulator.addFix(fix(0, 0.001, 2))).toEqual({ accepted: true, connected: true, tunnel: false });
  });

  it('adds almost nothing for a repeated fix', async () => {
    await accumulator.addFix(fix(10, 10, 0));
    const first = area(accumulator);
    await accumulator.addFix(fix(10, 10, 1));
    const repeated = area(accumulator) - first;
    // > 10 km away: an isolated disc
    await accumulator.addFix(fix(10.5, 10, 2));
    const disjoint = area(accumulator) - first - repeated;

    expect(repeated).toBeLessThan(disjoint);
    expect(repeated).toBeCloseTo(0, 3);
  });

  it('never shrinks the region', async () => {
    const walk = [
      fix(2.35, 48.85, 0),
      fix(2.351, 48.85, 5),
      fix(2.351, 48.851, 10),
      fix(2.35, 48.851, 15),
      fix(2.35, 48.85, 20),
      fix(2.3505, 48.8505, 25),
      fix(2.36, 48.86, 100),
      fix(2.5, 48.9, 110),
    ];
    let previous = 0;
    for (const step of walk) {
      await accumulator.addFix(step);
      const current = area(accumulator);
      expect(current).toBeGreaterThanOrEqual(previous - 1e-6);
      previous = current;
    }
  });

  it('records a tunnel for a slow long jump and does not bridge it', async () => {
    await accumulator.addFix(fix(0, 0, 0));
    const result = await accumulator.addFix(fix(0, 0.002, 60));

    expect(result).toEqual({ accepted: true, connected: false, tunnel: true });
    const { region, tunnelSegments } = accumulator.snapshot();
    expect(region.coordinates).toHaveLength(2);
    expect(tunnelSegments).toHaveLength(1);
    expect(tunnelSegments[0].from.y).toBeCloseTo(0, 6);
    expect(tunnelSegments[0].to.y).toBeCloseTo(222.639, 3);
  });

  it('leaves a fast jump beyond the connect distance unbridged without a tunnel', async () => {
    await accumulator.addFix(fix(0, 0, 0));
    const result = await accumulator.addFix(fix(0.2, 0, 5));

    expect(result).toEqual({ accepted: true, connected: false, tunnel: false });
    expect(accumulator.snapshot().region.coordinates).toHaveLength(2);
    expect(accumulator.snapshot().tunnelSegments).toHaveLength(0);
  });

  it('rejects an out-of-range latitude without touching state', async () => {
    const result = await accumulator.addFix(fix(0, 95, 0));

    expect(result.accepted).toBe(false);
    if (!result.accepted) {
      expect(result.reason).toBe('invalid-fix');
      expect(result.error).toContain('latitude');
    }
    const snapshot = accumulator.snapshot();
    expect(snapshot.region.coordinates).toEqual([]);
    expect(snapshot.cursor).toEqual({ lastPoint: null, lastTimestampMs: null });
    expect(snapshot.revision).toBe(0);
  });

  it('rejects a non-positive buffer radius', async () => {
    const result = await accumulator.addFix(fix(0, 0, 0, 0));
    expect(result).toMatchObject({ accepted: false, reason: 'invalid-fix' });
  });

  it('keeps region and cursor unchanged when the union fails', async () => {
    await accumulator.addFix(fix(0, 0, 0));
    const before = accumulator.snapshot();
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.mocked(unionIntoRegion).mockImplementationOnce(() => {
      throw new Error('self-intersection');
    });

    const result = await accumulator.addFix(fix(0, 0.001, 2));

    expect(result).toEqual({ accepted: false, reason: 'union-failed', error: 'self-intersection' });
    const after = accumulator.snapshot();
    expect(after.region).toBe(before.region);
    expect(after.cursor).toBe(before.cursor);
    expect(after.revision).toBe(before.revision);
    expect(warn).toHaveBeenCalledOnce();
  });

  it('propagates storage or memory exhaustion', async () => {
    vi.mocked(unionIntoRegion).mockImplementationOnce(() => {
      throw Object.assign(new Error('no memory'), { code: 'ENOMEM' });
    });
    await expect(accumulator.addFix(fix(0, 0, 0))).rejects.toThrow('no memory');
  });

  it('serializes concurrent producers', async () => {
    const fixes = Array.from({ length: 10 }, (_, i) => fix(0, i * 0.0002, i));
    await Promise.all(fixes.map(f => accumulator.addFix(f)));

    const { region, cursor } = accumulator.snapshot();
    expect(region.coordinates).toHaveLength(1);
    expect(cursor.lastTimestampMs).toBe(9000);
  });
});

describe('AreaAccumulator.reset', () => {
  it('clears region, cursor and tunnels', async () => {
    const accumulator = new AreaAccumulator();
    await accumulator.addFix(fix(0, 0, 0));
    await accumulator.addFix(fix(0, 0.002, 60));

    await accumulator.reset();

    const snapshot = accumulator.snapshot();
    expect(snapshot.region.coordinates).toEqual([]);
    expect(snapshot.cursor).toEqual({ lastPoint: null, lastTimestampMs: null });
    expect(snapshot.tunnelSegments).toEqual([]);
  });
});

describe('AreaAccumulator.restore', () => {
  it('replaces the region and starts a fresh track', async () => {
    const source = new AreaAccumulator();
    await source.addFix(fix(5, 5, 0));
    const accumulator = new AreaAccumulator();
    await accumulator.addFix(fix(0, 0, 0));

    await accumulator.restore(source.snapshot().region);

    expect(accumulator.snapshot().region).toBe(source.snapshot().region);
    expect(accumulator.snapshot().cursor.lastPoint).toBeNull();
  });
});

describe('AreaAccumulator.rebuildFromFixes', () => {
  const history: Fix[] = [
    fix(0, 0, 0, 15),
    fix(0, 0.0005, 3, 15),
    fix(0.0005, 0.0005, 6, 20),
    fix(0.0005, 0.003, 90, 20),   // tunnel
    fix(0.0006, 0.0031, 92, 10),
    fix(0.2, 0.0031, 95, 10),     // too far to connect
    fix(0.2, 0.0035, 99, 40),
  ];

  it('matches adding the same fixes one by one', async () => {
    const sequential = new AreaAccumulator();
    for (const f of history) {
      await sequential.addFix(f);
    }

    const rebuilt = new AreaAccumulator();
    const result = await rebuilt.rebuildFromFixes(history, f => f.bufferRadiusMeters, 3);

    expect(result).toEqual({ inputCount: 7, replayedCount: 7, acceptedCount: 7, rejectedCount: 0 });
    expect(toRenderablePolygon(rebuilt.snapshot().region)).toEqual(toRenderablePolygon(sequential.snapshot().region));
    expect(rebuilt.snapshot().tunnelSegments).toEqual(sequential.snapshot().tunnelSegments);
    expect(rebuilt.snapshot().cursor).toEqual(sequential.snapshot().cursor);
  });

  it('discards earlier state', async () => {
    const accumulator = new AreaAccumulator();
    await accumulator.addFix(fix(50, 50, 0));

    await accumulator.rebuildFromFixes([fix(0, 0, 0)]);

    expect(accumulator.snapshot().region.coordinates).toHaveLength(1);
    expect(accumulator.snapshot().cursor.lastTimestampMs).toBe(0);
  });

  it('uses the default radius when none is given', async () => {
    const accumulator = new AreaAccumulator();
    await accumulator.rebuildFromFixes([{ longitude: 0, latitude: 0, timestampMs: 0 }]);
    expect(area(accumulator)).toBeCloseTo(16 * 225 * Math.sin(Math.PI / 16), 6);
  });

  it('counts rejected fixes', async () => {
    const accumulator = new AreaAccumulator();
    const result = await accumulator.rebuildFromFixes([fix(0, 0, 0), fix(0, 91, 1)]);
    expect(result).toMatchObject({ acceptedCount: 1, rejectedCount: 1 });
  });

  it('keeps showing the previous region until the replay is complete', async () => {
    const accumulator = new AreaAccumulator();
    for (const f of history) {
      await accumulator.addFix(f);
    }
    const before = accumulator.snapshot();
    const seenDuringReplay: ReturnType<AreaAccumulator['snapshot']>[] = [];

    await accumulator.rebuildFromFixes(history, (f) => {
      seenDuringReplay.push(accumulator.snapshot());
      return f.bufferRadiusMeters;
    }, 2);

    expect(seenDuringReplay).toHaveLength(history.length);
    for (const seen of seenDuringReplay) {
      expect(seen.region).toBe(before.region);
      expect(seen.cursor).toBe(before.cursor);
      expect(seen.revision).toBe(before.revision);
    }
    expect(accumulator.snapshot().revision).toBe(before.revision + 1);
  });

  it('leaves the region untouched when the replay throws', async () => {
    const accumulator = new AreaAccumulator();
    await accumulator.addFix(fix(0, 0, 0));
    const before = accumulator.snapshot();

    await expect(accumulator.rebuildFromFixes(history, (f) => {
      if (f.timestampMs === 90_000) throw new Error('no radius for fix');
      return f.bufferRadiusMeters;
    }, 2)).rejects.toThrow('no radius for fix');

    expect(accumulator.snapshot()).toEqual(before);
    expect(accumulator.snapshot().region).toBe(before.region);
    // lock released
    expect(await accumulator.addFix(fix(0, 0.0001, 1))).toMatchObject({ accepted: true });
  });

  it('holds back concurrent fixes until the replay is finished', async () => {
    const accumulator = new AreaAccumulator();
    const replay = Array.from({ length: 30 }, (_, i) => fix(0, i * 0.0002, i));

    const rebuilding = accumulator.rebuildFromFixes(replay, undefined, 5);
    const late = accumulator.addFix(fix(0, 0.0062, 31));
    await Promise.all([rebuilding, late]);

    expect(accumulator.snapshot().cursor.lastTimestampMs).toBe(31_000);
  });
});

describe('downsampleByStride', () => {
  const indices = (n: number) => Array.from({ length: n }, (_, i) => i);

  it('keeps small inputs as they are', () => {
    expect(downsampleByStride(indices(20_000))).toHaveLength(20_000);
  });

  it('keeps every second fix of 40 000', () => {
    const sampled = downsampleByStride(indices(40_000));
    expect(sampled).toHaveLength(20_000);
    expect(sampled.slice(0, 3)).toEqual([0, 2, 4]);
  });

  it('uses a floored stride', () => {
    // step = floor(60 001 / 20 000) = 3
    const sampled = downsampleByStride(indices(60_001));
    expect(sampled).toHaveLength(20_001);
    expect(sampled[sampled.length - 1]).toBe(60_000);
  });

  it('keeps everything when the stride floors to one', () => {
    expect(downsampleByStride(indices(20_001))).toHaveLength(20_001);
  });

  it('accepts a custom ceiling', () => {
    expect(downsampleByStride(indices(10), 4)).toEqual([0, 2, 4, 6, 8]);
  });
});
