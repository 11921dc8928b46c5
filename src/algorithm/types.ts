/**
 * Kitchen Layout - Algorithm Types
 * Types for the sequential cabinet placement engine
 *
 * ## Cabinet spec variants
 *
 * A wall run is an ordered list of cabinet specs. Two variants exist:
 *
 * - `PlaceableCabinetSpec` - a real cabinet or appliance that occupies wall length
 * - `GapSpec` - the `"gap"` sentinel; advances the cursor without placing anything
 *
 * Both share the `kind` field. Use `isGapSpec()` to tell them apart.
 *
 * All lengths are in inches. Fractional inches are kept at full precision.
 */

import { GAP_KIND } from './constants';

// ============================================================================
// INPUT
// ============================================================================

/**
 * Fields carried through from the configuration that the engine never reads
 * (finish, notes, depth overrides, ...). Renderers may look at them.
 */
export type CabinetExtras = Readonly<Record<string, unknown>>;

/**
 * A cabinet (or appliance) to be placed along the wall.
 */
export interface PlaceableCabinetSpec {
  readonly kind: string;
  /** Absent when the configuration omitted it; reported as a structural error */
  readonly width?: number;
  /** Caller-declared absolute position, reconciled against the computed one */
  readonly explicitPosition?: number;
  readonly extras?: CabinetExtras;
}

/**
 * Deliberate empty space of `width` inches.
 */
export interface GapSpec {
  readonly kind: typeof GAP_KIND;
  readonly width?: number;
  readonly extras?: CabinetExtras;
}

export type CabinetSpec = PlaceableCabinetSpec | GapSpec;

export function isGapSpec(spec: CabinetSpec): spec is GapSpec {
  return spec.kind === GAP_KIND;
}

// ============================================================================
// OUTPUT
// ============================================================================

/**
 * A cabinet with its computed position from the wall start.
 */
export interface PositionedCabinet {
  readonly kind: string;
  readonly width: number;
  /** Cursor value when the cabinet was placed */
  readonly position: number;
  /** position + width */
  readonly endPosition: number;
  /** Index of the originating spec in the input list */
  readonly index: number;
  readonly spec: PlaceableCabinetSpec;
}

/**
 * Unused wall length between two placements, or between the last placement
 * and the end of the wall.
 */
export interface Gap {
  readonly start: number;
  readonly end: number;
  /** end - start */
  readonly width: number;
  /** Label of the cabinet before the gap, e.g. "base 2" */
  readonly before?: string;
  /** Label of the cabinet after the gap, or "wall end" */
  readonly after?: string;
}

/**
 * A standard width that fits a gap, with the length it leaves unfilled.
 */
export interface WidthSuggestion {
  readonly width: number;
  readonly residual: number;
}

/**
 * Result of laying out one wall run. Never mutated after creation.
 */
export interface LayoutResult {
  readonly positionedCabinets: readonly PositionedCabinet[];
  readonly gaps: readonly Gap[];
  /** Cursor travel from the start offset to the end of the run */
  readonly totalWidth: number;
  readonly wallLength: number;
  /** True iff errors is empty */
  readonly success: boolean;
  /** Detection order */
  readonly errors: readonly string[];
  /** Detection order */
  readonly warnings: readonly string[];
}

// ============================================================================
// KITCHEN PLANNING
// ============================================================================

/**
 * Base cabinets stand on the floor; wall cabinets hang above the counter.
 */
export type CabinetTier = 'base' | 'wall';

/**
 * A positioned cabinet in the shape the renderers draw.
 */
export interface RenderableCabinet {
  /** "<kind> <index>" */
  label: string;
  kind: string;
  index: number;
  /** Position along the wall */
  x: number;
  width: number;
  depth: number;
  height: number;
}

/**
 * One tier of cabinets laid out on one wall segment.
 */
export interface WallPlan {
  wallName: string;
  tier: CabinetTier;
  wallLength: number;
  result: LayoutResult;
  cabinets: RenderableCabinet[];
}

/**
 * All wall plans for a named kitchen layout.
 */
export interface KitchenPlan {
  layoutName: string;
  description?: string;
  walls: WallPlan[];
  /** True iff every wall plan succeeded */
  success: boolean;
}

/**
 * A measured wall segment
 */
export interface WallDefinition {
  name: string;
  length: number;
  /** wall, window, entryway, alcove, ... */
  type?: string;
}

/**
 * Named layout: ordered base and wall cabinet runs keyed by wall name
 */
export interface KitchenLayoutDefinition {
  name: string;
  description?: string;
  baseCabinets: Record<string, CabinetSpec[]>;
  wallCabinets: Record<string, CabinetSpec[]>;
}

/**
 * Everything the planner needs: walls and layouts, keyed by name
 */
export interface KitchenConfig {
  walls: Record<string, WallDefinition>;
  layouts: Record<string, KitchenLayoutDefinition>;
}

export interface PlannerOptions {
  /** Gaps at or below this width are not reported (default 1.0") */
  minGapToReport?: number;
}
