/**
 * Spherical Web Mercator (EPSG:3857) conversions, radius 6 378 137 m.
 * All distance, buffer and area math in the engine happens in these meters.
 */

import * as turf from '@turf/turf';
import type { PlanarPoint } from './types.js';

export function toPlanar(longitude: number, latitude: number): PlanarPoint {
  const [x, y] = turf.toMercator([longitude, latitude]);
  return { x, y };
}

export function toGeographic(x: number, y: number): GeoJSON.Position {
  const [longitude, latitude] = turf.toWgs84([x, y]);
  return [longitude, latitude];
}
