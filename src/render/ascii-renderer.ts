/**
 * Kitchen Layout ASCII Renderer
 * Renders planned walls as character diagrams for terminals and .txt output
 *
 * Each wall is three rows:
 *   header   - wall name, tier, length and scale
 *   cabinets - "[kind====]" per cabinet, "." for reported gaps
 *   wall     - "#" along the wall length, "!" where cabinets run past its end
 */

import { KitchenPlan, WallPlan } from '../algorithm/types';
import { DEFAULT_ASCII_SCALE } from '../algorithm/constants';
import { autoScale, charsFromInches, effectiveScale } from './text-scale';

export interface AsciiRenderOptions {
  charsPerInch?: number;   // Base scale
  zoom?: number;           // Multiplies the base scale, clamped to 0.1-5
  fitWidth?: number;       // When set, the base scale is chosen to fit this many columns
  showIssues?: boolean;    // List errors and warnings under each wall
}

const SYMBOLS = {
  empty: ' ',
  gap: '.',
  fill: '=',
  open: '[',
  close: ']',
  narrow: '|',
  wall: '#',
  overhang: '!'
} as const;

/**
 * Draw one cabinet into `width` columns: "[", label, "=" fill, "]"
 */
export function cabinetGlyphs(label: string, width: number): string {
  if (width <= 1) return SYMBOLS.narrow;
  if (width === 2) return SYMBOLS.open + SYMBOLS.close;

  const inner = width - 2;
  const text = label.slice(0, inner);
  return SYMBOLS.open + text + SYMBOLS.fill.repeat(inner - text.length) + SYMBOLS.close;
}

function wallExtent(plan: WallPlan): number {
  const cabinetEnds = plan.cabinets.map(c => c.x + c.width);
  return Math.max(plan.wallLength, ...cabinetEnds);
}

/**
 * Render one wall plan as lines of text
 */
export function renderWallASCII(plan: WallPlan, options: AsciiRenderOptions = {}): string[] {
  const { zoom = 1, fitWidth, showIssues = true } = options;
  const base = fitWidth !== undefined
    ? autoScale(wallExtent(plan), fitWidth)
    : options.charsPerInch ?? DEFAULT_ASCII_SCALE;
  const scale = effectiveScale(base, zoom);

  const column = (inches: number): number => Math.round(inches * scale);
  const wallColumns = charsFromInches(plan.wallLength, scale);

  const spans: { start: number; glyphs: string }[] = [];
  plan.result.gaps.forEach(gap => {
    spans.push({ start: column(gap.start), glyphs: SYMBOLS.gap.repeat(charsFromInches(gap.width, scale)) });
  });
  // Cabinets after gaps so they draw on top; later cabinets draw over earlier ones
  plan.cabinets.forEach(cab => {
    spans.push({ start: column(cab.x), glyphs: cabinetGlyphs(cab.kind, charsFromInches(cab.width, scale)) });
  });

  const totalColumns = Math.max(wallColumns, ...spans.map(s => s.start + s.glyphs.length));
  const row: string[] = new Array<string>(totalColumns).fill(SYMBOLS.empty);
  spans.forEach(({ start, glyphs }) => {
    for (let i = 0; i < glyphs.length; i++) {
      const col = start + i;
      if (col >= 0 && col < totalColumns) {
        row[col] = glyphs[i];
      }
    }
  });

  let wallRow = '';
  for (let col = 0; col < totalColumns; col++) {
    wallRow += col < wallColumns ? SYMBOLS.wall : SYMBOLS.overhang;
  }

  const lines = [
    `${plan.wallName} ${plan.tier} (${plan.wallLength}" wall, ${scale.toFixed(2)} chars/in)`,
    row.join('').trimEnd(),
    wallRow
  ];

  if (showIssues) {
    plan.result.errors.forEach(error => lines.push(`  ! ${error}`));
    plan.result.warnings.forEach(warning => lines.push(`  ~ ${warning}`));
  }

  return lines;
}

/**
 * Render every wall of a kitchen plan with a title and legend
 */
export function renderKitchenASCII(plan: KitchenPlan, options: AsciiRenderOptions = {}): string {
  const lines: string[] = [`Kitchen layout: ${plan.layoutName}`];
  if (plan.description) {
    lines.push(plan.description);
  }

  plan.walls.forEach(wall => {
    lines.push('', ...renderWallASCII(wall, options));
  });

  lines.push(
    '',
    'Legend:',
    `  ${SYMBOLS.open}kind${SYMBOLS.fill}${SYMBOLS.close}  Cabinet`,
    `  ${SYMBOLS.gap}          Reported gap`,
    `  ${SYMBOLS.wall}          Wall`,
    `  ${SYMBOLS.overhang}          Past wall end`
  );

  return lines.join('\n') + '\n';
}
