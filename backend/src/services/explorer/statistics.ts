/**
 * Exploration statistics.
 *
 * Area is measured in the Web Mercator plane without geodesic correction, so
 * it overstates real ground area by roughly 1/cos²(latitude) away from the
 * equator. This is an accepted approximation.
 */

import { planarArea } from './geometry.js';
import type { ExplorationStats, ExploredRegion } from './types.js';
import { EARTH_LAND_AREA_M2, EARTH_SURFACE_AREA_M2 } from './types.js';

export function exploredAreaMeters(region: ExploredRegion): number {
  return planarArea(region);
}

export function percentOfEarthSurface(areaSquareMeters: number): number {
  return (areaSquareMeters / EARTH_SURFACE_AREA_M2) * 100;
}

export function percentOfLand(areaSquareMeters: number): number {
  return (areaSquareMeters / EARTH_LAND_AREA_M2) * 100;
}

export function computeStatistics(region: ExploredRegion, tunnelCount = 0): ExplorationStats {
  const areaSquareMeters = exploredAreaMeters(region);
  return {
    areaSquareMeters,
    percentOfEarth: percentOfEarthSurface(areaSquareMeters),
    percentOfLand: percentOfLand(areaSquareMeters),
    componentCount: region.coordinates.length,
    tunnelCount,
  };
}

/** Plain decimal for tiny percentages (no exponent notation), e.g. 0.00000123 */
export function formatPercent(value: number, significantDigits = 3): string {
  return value.toLocaleString('en-US', {
    maximumSignificantDigits: significantDigits,
    useGrouping: false,
  });
}
