/**
 * Kitchen Layout - Text Reports
 * Formats LayoutResult for terminal output
 */

import { KitchenPlan, LayoutResult } from './types';
import { suggestWidths } from './gap-suggestions';

export interface ReportOptions {
  /** How many width suggestions to list per gap */
  suggestionLimit?: number;
}

const inches = (value: number): string => `${value.toFixed(2)}"`;

// Right-aligned to 6 columns, e.g. "  4.50"
const column = (value: number): string => value.toFixed(2).padStart(6);

/**
 * True if the layout has any errors or warnings
 */
export function hasIssues(result: LayoutResult): boolean {
  return result.errors.length > 0 || result.warnings.length > 0;
}

/**
 * Full human-readable report: outcome, errors, warnings and gaps with fill suggestions.
 */
export function formatLayoutReport(result: LayoutResult, options: ReportOptions = {}): string {
  const { suggestionLimit = 3 } = options;
  const lines: string[] = [];

  if (result.success) {
    lines.push(`✓ Layout successful: ${inches(result.totalWidth)} used of ${inches(result.wallLength)}`);
  } else {
    lines.push('✗ Layout failed');
  }

  if (result.errors.length > 0) {
    lines.push('', 'Errors:');
    result.errors.forEach(error => lines.push(`  - ${error}`));
  }

  if (result.warnings.length > 0) {
    lines.push('', 'Warnings:');
    result.warnings.forEach(warning => lines.push(`  - ${warning}`));
  }

  if (result.gaps.length > 0) {
    lines.push('', `Gaps found (${result.gaps.length}):`);
    result.gaps.forEach((gap, i) => {
      lines.push(`  Gap ${i + 1}: ${inches(gap.width)} at ${inches(gap.start)}-${inches(gap.end)}`);
      if (gap.before) {
        lines.push(`    After: ${gap.before}`);
      }
      if (gap.after) {
        lines.push(`    Before: ${gap.after}`);
      }

      const suggestions = suggestWidths(gap).slice(0, suggestionLimit);
      if (suggestions.length > 0) {
        lines.push('    Suggestions:');
        suggestions.forEach(s => {
          lines.push(`      - ${s.width}" cabinet (leaves ${inches(s.residual)} gap)`);
        });
      }
    });
  }

  return lines.join('\n');
}

/**
 * Per-wall listing: one line per placed cabinet, then gaps, errors and warnings.
 */
export function formatWallAnalysis(
  wallName: string,
  result: LayoutResult,
  options: ReportOptions = {}
): string {
  const { suggestionLimit = 2 } = options;
  const lines: string[] = [`${wallName} Wall (${result.wallLength}" total):`];

  result.positionedCabinets.forEach(cab => {
    lines.push(`  ${column(cab.position)}"-${column(cab.endPosition)}": ${cab.kind.padEnd(15)} (${cab.width}")`);
  });

  if (result.gaps.length > 0) {
    lines.push('', '  Gaps:');
    result.gaps.forEach(gap => {
      lines.push(`    ${column(gap.start)}"-${column(gap.end)}": ${gap.width.toFixed(2).padStart(5)}" gap`);
      const suggestions = suggestWidths(gap).slice(0, suggestionLimit);
      if (suggestions.length > 0) {
        const text = suggestions.map(s => `${s.width}" (${inches(s.residual)} remaining)`).join(', ');
        lines.push(`      Suggestions: ${text}`);
      }
    });
  }

  if (result.errors.length > 0) {
    lines.push('', '  Errors:');
    result.errors.forEach(error => lines.push(`    ${error}`));
  }

  if (result.warnings.length > 0) {
    lines.push('', '  Warnings:');
    result.warnings.forEach(warning => lines.push(`    ${warning}`));
  }

  return lines.join('\n');
}

const RULE = '='.repeat(60);
const SECTION_RULE = '-'.repeat(60);

/**
 * Whole-kitchen analysis: base cabinets then wall cabinets, one block per wall.
 */
export function formatKitchenAnalysis(plan: KitchenPlan, options: ReportOptions = {}): string {
  const lines: string[] = [
    RULE,
    `Kitchen Layout Analysis: ${plan.layoutName}`,
    `Description: ${plan.description ?? 'N/A'}`,
    RULE
  ];

  const sections = [
    { title: 'BASE CABINETS', tier: 'base' },
    { title: 'WALL CABINETS', tier: 'wall' }
  ] as const;

  sections.forEach(({ title, tier }) => {
    lines.push('', title, SECTION_RULE);
    const walls = plan.walls.filter(w => w.tier === tier);
    if (walls.length === 0) {
      lines.push('', '  (none)');
    }
    walls.forEach(wall => {
      lines.push('', formatWallAnalysis(wall.wallName, wall.result, options));
    });
  });

  lines.push('', RULE);
  return lines.join('\n');
}
