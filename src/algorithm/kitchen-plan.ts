/**
 * Kitchen Layout - Planner
 *
 * Runs the sequential engine for every wall of a named layout, once for the
 * base cabinet run and once for the wall cabinet run, and converts the
 * positioned cabinets to the shape the renderers draw.
 */

import {
  CabinetSpec,
  CabinetTier,
  KitchenConfig,
  KitchenPlan,
  LayoutResult,
  PlannerOptions,
  RenderableCabinet,
  WallPlan
} from './types';
import { CABINET_DEFAULTS, DEFAULT_MIN_GAP_TO_REPORT } from './constants';
import { SequentialLayoutEngine } from './sequential-layout';
import { Logger } from './utils/logger';

const TIERS: { tier: CabinetTier; pick: (runs: LayoutRuns) => Record<string, CabinetSpec[]> }[] = [
  { tier: 'base', pick: runs => runs.baseCabinets },
  { tier: 'wall', pick: runs => runs.wallCabinets }
];

interface LayoutRuns {
  baseCabinets: Record<string, CabinetSpec[]>;
  wallCabinets: Record<string, CabinetSpec[]>;
}

/**
 * Error thrown when a plan names a layout or wall the kitchen does not define.
 */
export class KitchenPlanError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'KitchenPlanError';
  }
}

function ownEntry<T>(record: Record<string, T>, key: string): T | undefined {
  return Object.hasOwn(record, key) ? record[key] : undefined;
}

function numericExtra(extras: Readonly<Record<string, unknown>> | undefined, key: string): number | undefined {
  const value = extras?.[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

/**
 * Convert positioned cabinets to renderer rectangles.
 * Depth and height come from the spec's `depth` / `height` extras, else the tier default.
 */
export function toRenderableCabinets(result: LayoutResult, tier: CabinetTier): RenderableCabinet[] {
  const defaults = CABINET_DEFAULTS[tier];

  return result.positionedCabinets.map(cab => ({
    label: `${cab.kind} ${cab.index}`,
    kind: cab.kind,
    index: cab.index,
    x: cab.position,
    width: cab.width,
    depth: numericExtra(cab.spec.extras, 'depth') ?? defaults.depth,
    height: numericExtra(cab.spec.extras, 'height') ?? defaults.height
  }));
}

/**
 * Lay out one tier of cabinets on one wall.
 */
export function planWall(
  wallName: string,
  wallLength: number,
  tier: CabinetTier,
  cabinets: readonly CabinetSpec[],
  options: PlannerOptions = {}
): WallPlan {
  const engine = new SequentialLayoutEngine(
    wallLength,
    options.minGapToReport ?? DEFAULT_MIN_GAP_TO_REPORT
  );
  const result = engine.layout(cabinets);

  Logger.debug(
    `${wallName} ${tier}: ${result.positionedCabinets.length} cabinets, ` +
      `${result.gaps.length} gaps, ${result.errors.length} errors`
  );

  return {
    wallName,
    tier,
    wallLength,
    result,
    cabinets: toRenderableCabinets(result, tier)
  };
}

/**
 * Plan every wall of a named layout. Walls with an empty run are skipped.
 * Base runs come first, then wall runs, each in configuration order.
 *
 * @throws {KitchenPlanError} If the layout, or a wall it uses, is not defined
 */
export function planKitchen(
  config: KitchenConfig,
  layoutName: string,
  options: PlannerOptions = {}
): KitchenPlan {
  const layout = ownEntry(config.layouts, layoutName);
  if (!layout) {
    const available = Object.keys(config.layouts);
    throw new KitchenPlanError(
      `Layout '${layoutName}' not found. Available layouts: ${available.length > 0 ? available.join(', ') : '(none)'}`
    );
  }

  const walls: WallPlan[] = [];
  for (const { tier, pick } of TIERS) {
    for (const [wallName, cabinets] of Object.entries(pick(layout))) {
      if (cabinets.length === 0) continue;

      const wall = ownEntry(config.walls, wallName);
      if (!wall) {
        throw new KitchenPlanError(`Layout '${layoutName}' uses unknown wall '${wallName}'`);
      }
      walls.push(planWall(wallName, wall.length, tier, cabinets, options));
    }
  }

  return {
    layoutName,
    description: layout.description,
    walls,
    success: walls.every(w => w.result.success)
  };
}
