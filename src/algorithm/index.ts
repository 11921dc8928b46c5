/**
 * Kitchen Layout - Algorithm Module
 *
 * Exports all public APIs for cabinet placement and reporting
 */

// Types - use 'export type' for type-only exports
export { isGapSpec } from './types';
export type {
  CabinetExtras,
  CabinetSpec,
  CabinetTier,
  GapSpec,
  PlaceableCabinetSpec,
  PositionedCabinet,
  Gap,
  WidthSuggestion,
  LayoutResult,
  RenderableCabinet,
  WallPlan,
  KitchenPlan,
  PlannerOptions,
  WallDefinition,
  KitchenLayoutDefinition,
  KitchenConfig
} from './types';

// Constants
export {
  GAP_KIND,
  DEFAULT_CABINET_KIND,
  WALL_END_LABEL,
  DEFAULT_MIN_GAP_TO_REPORT,
  STANDARD_CABINET_WIDTHS,
  CABINET_DEFAULTS,
  CABINET_COLORS
} from './constants';

// Engine
export { SequentialLayoutEngine, LayoutEngineError } from './sequential-layout';

// Gap suggestions
export { suggestWidths, bestFitWidth } from './gap-suggestions';

// Planner
export { planKitchen, planWall, toRenderableCabinets, KitchenPlanError } from './kitchen-plan';

// Reports
export { hasIssues, formatLayoutReport, formatWallAnalysis, formatKitchenAnalysis } from './report';
export type { ReportOptions } from './report';
