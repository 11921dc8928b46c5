/**
 * Kitchen Layout - Constants
 * Default values and configuration
 *
 * ALL VALUES ARE IN INCHES
 */

import { CabinetTier } from './types';

// Sentinel kind for a deliberate empty space in a cabinet run
export const GAP_KIND = 'gap';

// Kind used when a configuration entry omits its type
export const DEFAULT_CABINET_KIND = 'cabinet';

// `after` label of the gap between the last cabinet and the wall's end
export const WALL_END_LABEL = 'wall end';

/**
 * Gaps this size or smaller are not reported.
 * Keeps rounding noise in measured walls out of the report.
 */
export const DEFAULT_MIN_GAP_TO_REPORT = 1.0;

/**
 * Standard stock cabinet widths, ascending.
 * Used to suggest what could fill a reported gap.
 */
export const STANDARD_CABINET_WIDTHS: readonly number[] = [9, 12, 15, 18, 21, 24, 27, 30, 33, 36];

// ============================================================================
// CABINET DIMENSIONS
// Defaults applied when a cabinet spec does not carry its own depth/height
// ============================================================================

export const CABINET_DEFAULTS: Record<CabinetTier, { depth: number; height: number }> = {
  base: { depth: 24, height: 34.5 },
  wall: { depth: 12, height: 42 }
};

// ============================================================================
// RENDERING
// ============================================================================

// SVG pixels per inch
export const DEFAULT_SVG_SCALE = 3.0;

// Characters per inch for text diagrams
export const DEFAULT_ASCII_SCALE = 1.0;

// Zoom limits for text diagrams
export const MIN_ZOOM = 0.1;
export const MAX_ZOOM = 5.0;

// Fill colors by cabinet kind (CSS hex)
export const CABINET_COLORS: Record<string, string> = {
  base: '#D2691E',
  wall: '#CD853F',
  lazy_susan: '#A0522D',
  tall: '#8B4513',
  fridge: '#C0C0C0',
  sink: '#87CEEB',
  dishwasher: '#708090',
  stove: '#696969'
};

export const DEFAULT_CABINET_COLOR = '#DEB887';
export const WALL_COLOR = '#000000';
export const GAP_COLOR = '#F5F5DC';
export const PROBLEM_COLOR = '#D32F2F';
export const TEXT_COLOR = '#333333';
export const DIMENSION_COLOR = '#666666';

// ============================================================================
// OUTPUT
// ============================================================================

export const DEFAULT_OUTPUT_PREFIX = 'kitchen_layout';
export const DEFAULT_MAX_VERSIONS = 25;
export const VERSIONS_DIR = 'versions';
