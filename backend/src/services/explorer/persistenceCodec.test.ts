import { describe, it, expect } from 'vitest';
import { Point, Polygon } from 'wkx';
import { decodeRegion, encodeRegion } from './persistenceCodec.js';
import type { ExploredRegion } from './types.js';
import { emptyRegion } from './types.js';

const square = (x: number, y: number, size: number) => [
  [x, y], [x + size, y], [x + size, y + size], [x, y + size], [x, y],
];

const region: ExploredRegion = {
  type: 'MultiPolygon',
  coordinates: [
    [square(0, 0, 100), square(25, 25, 10).reverse()],
    [square(1000.5, -2000.25, 12.125)],
  ],
};

describe('encodeRegion', () => {
  it('encodes the empty region as an empty little-endian multipolygon', () => {
    expect(encodeRegion(emptyRegion()).toString('hex')).toBe('010600000000000000');
  });

  it('writes one polygon record per component', () => {
    const bytes = encodeRegion(region);
    // byte order + type + polygon count
    expect(bytes.readUInt8(0)).toBe(1);
    expect(bytes.readUInt32LE(1)).toBe(6);
    expect(bytes.readUInt32LE(5)).toBe(2);
  });
});

describe('decodeRegion', () => {
  it('reads back what was written, holes included', () => {
    expect(decodeRegion(encodeRegion(region))).toEqual(region);
  });

  it('re-encodes to identical bytes', () => {
    const bytes = encodeRegion(region);
    expect(encodeRegion(decodeRegion(bytes)).equals(bytes)).toBe(true);
  });

  it('accepts a bare polygon', () => {
    const polygon = new Polygon(square(0, 0, 5).map(([x, y]) => new Point(x, y)));
    expect(decodeRegion(polygon.toWkb())).toEqual({
      type: 'MultiPolygon',
      coordinates: [[square(0, 0, 5)]],
    });
  });

  it('rejects other geometry types', () => {
    expect(() => decodeRegion(new Point(1, 2).toWkb())).toThrow('Unexpected snapshot geometry: Point');
  });

  it('rejects a degenerate exterior ring', () => {
    const polygon = new Polygon([new Point(0, 0), new Point(1, 0), new Point(0, 0)]);
    expect(() => decodeRegion(polygon.toWkb())).toThrow('Snapshot polygon has 3 exterior positions');
  });

  it('rejects non-finite coordinates', () => {
    const ring = [[0, 0], [Number.NaN, 0], [1, 1], [0, 1], [0, 0]].map(([x, y]) => new Point(x, y));
    expect(() => decodeRegion(new Polygon(ring).toWkb())).toThrow('non-finite');
  });

  it('rejects bytes that are not WKB', () => {
    expect(() => decodeRegion(Buffer.from('not a snapshot'))).toThrow();
  });
});
