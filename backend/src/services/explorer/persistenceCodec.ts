/**
 * Binary snapshot codec: explored region <-> OGC WKB (little-endian, 2D).
 * Coordinates stay in Web Mercator meters; the bytes carry no SRID.
 */

import { Geometry, MultiPolygon, Point, Polygon } from 'wkx';
import type { ExploredRegion } from './types.js';

function toWkxRing(ring: GeoJSON.Position[]): Point[] {
  return ring.map(([x, y]) => new Point(x, y));
}

function fromWkxRing(ring: Point[]): GeoJSON.Position[] {
  return ring.map((point) => {
    if (!Number.isFinite(point.x) || !Number.isFinite(point.y)) {
      throw new Error('Snapshot contains non-finite coordinates');
    }
    return [point.x, point.y];
  });
}

function fromWkxPolygon(polygon: Polygon): GeoJSON.Position[][] {
  if (polygon.exteriorRing.length < 4) {
    throw new Error(`Snapshot polygon has ${polygon.exteriorRing.length} exterior positions`);
  }
  return [fromWkxRing(polygon.exteriorRing), ...polygon.interiorRings.map(fromWkxRing)];
}

export function encodeRegion(region: ExploredRegion): Buffer {
  const polygons = region.coordinates.map(([exterior, ...holes]) =>
    new Polygon(toWkxRing(exterior), holes.map(toWkxRing))
  );
  return new MultiPolygon(polygons).toWkb();
}

/** Decode snapshot bytes. Throws on anything that is not a (multi)polygon with finite coordinates. */
export function decodeRegion(bytes: Buffer): ExploredRegion {
  const geometry = Geometry.parse(bytes);

  if (geometry instanceof MultiPolygon) {
    return { type: 'MultiPolygon', coordinates: geometry.polygons.map(fromWkxPolygon) };
  }
  if (geometry instanceof Polygon) {
    return { type: 'MultiPolygon', coordinates: [fromWkxPolygon(geometry)] };
  }
  throw new Error(`Unexpected snapshot geometry: ${geometry.constructor.name}`);
}
