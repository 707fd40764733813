/**
 * Fog polygon export
 *
 * The renderable shape is the world minus the explored area: one outer ring
 * spanning the whole lon/lat extent and one hole per explored component.
 * Rings are oriented by their signed area in lon/lat space, outer ring
 * positive (counter-clockwise) and holes negative, as GeoJSON expects.
 */

import * as turf from '@turf/turf';
import { ringSignedArea } from './geometry.js';
import { toGeographic } from './projection.js';
import type { ExploredRegion, TunnelSegment } from './types.js';

export const WORLD_RING: GeoJSON.Position[] = [
  [-180, -90],
  [180, -90],
  [180, 90],
  [-180, 90],
  [-180, -90],
];

function orient(ring: GeoJSON.Position[], sign: 1 | -1): GeoJSON.Position[] {
  return ringSignedArea(ring) * sign < 0 ? [...ring].reverse() : ring;
}

function unprojectRing(ring: GeoJSON.Position[]): GeoJSON.Position[] {
  return ring.map(([x, y]) => toGeographic(x, y));
}

/**
 * World ring plus one hole per explored component (its exterior ring).
 * Islands of unexplored ground inside a component cannot be expressed in a
 * single world-minus-explored polygon and are left out.
 */
export function toRenderablePolygon(region: ExploredRegion): GeoJSON.Polygon {
  const outer = orient(WORLD_RING.map(position => [...position]), 1);
  const holes = region.coordinates.map(([exterior]) => orient(unprojectRing(exterior), -1));
  return { type: 'Polygon', coordinates: [outer, ...holes] };
}

export function toFogFeature(region: ExploredRegion): GeoJSON.Feature<GeoJSON.Polygon> {
  return turf.feature(toRenderablePolygon(region), { holes: region.coordinates.length });
}

/** Tunnel gaps as two-point lon/lat lines, for drawing on top of the fog. */
export function toTunnelLines(segments: readonly TunnelSegment[]): GeoJSON.Feature<GeoJSON.MultiLineString> {
  return turf.multiLineString(
    segments.map(({ from, to }) => [toGeographic(from.x, from.y), toGeographic(to.x, to.y)]),
    { count: segments.length }
  );
}
