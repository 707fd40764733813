/**
 * Planar geometry on Web Mercator meters.
 *
 * turf's buffer and area are geodesic and expect lon/lat, so buffered shapes
 * and areas are computed directly in meters here. Polygon union is delegated
 * to turf, which clips in whatever plane the coordinates live in.
 */

import * as turf from '@turf/turf';
import type { ExploredRegion, PlanarPoint } from './types.js';

/** Segments per full circle; matches the usual 8 segments per quadrant */
export const CIRCLE_SEGMENTS = 32;

const MIN_CORRIDOR_LENGTH = 1e-9;

/** Shoelace signed area of a closed ring; positive when counter-clockwise. */
export function ringSignedArea(ring: GeoJSON.Position[]): number {
  if (ring.length < 4) return 0;
  let sum = 0;
  for (let i = 0; i < ring.length - 1; i++) {
    const [ax, ay] = ring[i];
    const [bx, by] = ring[i + 1];
    sum += ax * by - bx * ay;
  }
  return sum / 2;
}

export function polygonArea(rings: GeoJSON.Position[][]): number {
  if (rings.length === 0) return 0;
  const [outer, ...holes] = rings;
  const holeArea = holes.reduce((total, hole) => total + Math.abs(ringSignedArea(hole)), 0);
  return Math.abs(ringSignedArea(outer)) - holeArea;
}

/** Planar area in square meters (outer rings minus holes). */
export function planarArea(region: ExploredRegion): number {
  return region.coordinates.reduce((total, polygon) => total + polygonArea(polygon), 0);
}

function arc(
  center: PlanarPoint,
  radius: number,
  startAngle: number,
  sweep: number,
  steps: number
): GeoJSON.Position[] {
  const positions: GeoJSON.Position[] = [];
  for (let i = 0; i <= steps; i++) {
    const angle = startAngle + (sweep * i) / steps;
    positions.push([center.x + radius * Math.cos(angle), center.y + radius * Math.sin(angle)]);
  }
  return positions;
}

/** Regular polygon approximating a disc around a point, counter-clockwise. */
export function bufferPoint(
  center: PlanarPoint,
  radius: number,
  segments: number = CIRCLE_SEGMENTS
): GeoJSON.Polygon {
  const ring = arc(center, radius, 0, 2 * Math.PI, segments);
  // close exactly on the first vertex
  ring[ring.length - 1] = [...ring[0]];
  return { type: 'Polygon', coordinates: [ring] };
}

/**
 * Capsule around the segment a→b: two half-discs joined by straight sides,
 * counter-clockwise. A zero-length segment falls back to a disc.
 */
export function bufferSegment(
  a: PlanarPoint,
  b: PlanarPoint,
  radius: number,
  segments: number = CIRCLE_SEGMENTS
): GeoJSON.Polygon {
  const length = Math.hypot(b.x - a.x, b.y - a.y);
  if (length < MIN_CORRIDOR_LENGTH) {
    return bufferPoint(b, radius, segments);
  }

  const heading = Math.atan2(b.y - a.y, b.x - a.x);
  const halfSteps = Math.max(1, Math.round(segments / 2));
  const headCap = arc(b, radius, heading - Math.PI / 2, Math.PI, halfSteps);
  const tailCap = arc(a, radius, heading + Math.PI / 2, Math.PI, halfSteps);
  const ring = [...headCap, ...tailCap, [...headCap[0]]];
  return { type: 'Polygon', coordinates: [ring] };
}

function assertFinite(geometry: GeoJSON.Polygon | GeoJSON.MultiPolygon): void {
  const polygons = geometry.type === 'Polygon' ? [geometry.coordinates] : geometry.coordinates;
  for (const polygon of polygons) {
    for (const ring of polygon) {
      for (const position of ring) {
        if (!Number.isFinite(position[0]) || !Number.isFinite(position[1])) {
          throw new Error('Geometry contains non-finite coordinates');
        }
      }
    }
  }
}

/**
 * Union a shape into the region and return the new region.
 * Throws on a degenerate shape or a failed clip; the input region is never touched.
 */
export function unionIntoRegion(region: ExploredRegion, shape: GeoJSON.Polygon): ExploredRegion {
  assertFinite(shape);
  // turf.polygon validates ring length and closure
  const shapeFeature = turf.polygon(shape.coordinates);

  if (region.coordinates.length === 0) {
    return { type: 'MultiPolygon', coordinates: [shapeFeature.geometry.coordinates] };
  }

  const merged = turf.union(
    turf.featureCollection<GeoJSON.Polygon | GeoJSON.MultiPolygon>([
      turf.multiPolygon(region.coordinates),
      shapeFeature,
    ])
  );
  if (!merged?.geometry) {
    throw new Error('Union produced no geometry');
  }

  assertFinite(merged.geometry);
  return merged.geometry.type === 'Polygon'
    ? { type: 'MultiPolygon', coordinates: [merged.geometry.coordinates] }
    : { type: 'MultiPolygon', coordinates: merged.geometry.coordinates };
}
