/**
 * Character scaling for text diagrams
 *
 * Maps inches to character columns. The effective scale is the
 * characters-per-inch base scale multiplied by a clamped zoom factor.
 */

import { MAX_ZOOM, MIN_ZOOM } from '../algorithm/constants';

/**
 * Columns needed to draw `inches` at `scale` chars/inch, never fewer than one
 */
export function charsFromInches(inches: number, scale: number): number {
  return Math.max(1, Math.round(inches * scale));
}

/**
 * Limit zoom to the supported range
 */
export function clampZoom(zoom: number): number {
  return Math.max(MIN_ZOOM, Math.min(MAX_ZOOM, zoom));
}

/**
 * Scale that fits `totalInches` into `maxWidth` columns.
 * Never scales up beyond one character per inch.
 */
export function autoScale(totalInches: number, maxWidth: number): number {
  if (totalInches <= 0 || maxWidth <= 0) {
    return 1;
  }
  const widthAtUnitScale = charsFromInches(totalInches, 1);
  return Math.min(maxWidth / widthAtUnitScale, 1);
}

/**
 * Base chars/inch times the clamped zoom
 */
export function effectiveScale(charsPerInch: number, zoom: number): number {
  return charsPerInch * clampZoom(zoom);
}
