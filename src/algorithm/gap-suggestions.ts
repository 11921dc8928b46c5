/**
 * Gap width suggestions
 *
 * Proposes stock cabinet widths that would fit a reported gap.
 */

import { Gap, WidthSuggestion } from './types';
import { STANDARD_CABINET_WIDTHS } from './constants';

/**
 * Every standard width that fits in the gap, in catalog (ascending) order,
 * paired with what it would leave unfilled.
 *
 * Exhaustive rather than best-fit; slice the result for a short list.
 */
export function suggestWidths(
  gap: Pick<Gap, 'width'>,
  catalog: readonly number[] = STANDARD_CABINET_WIDTHS
): WidthSuggestion[] {
  return catalog
    .filter(width => width <= gap.width)
    .map(width => ({ width, residual: gap.width - width }));
}

/**
 * The standard width that leaves the least unfilled, or undefined if none fits.
 */
export function bestFitWidth(
  gap: Pick<Gap, 'width'>,
  catalog: readonly number[] = STANDARD_CABINET_WIDTHS
): WidthSuggestion | undefined {
  const suggestions = suggestWidths(gap, catalog);
  return suggestions.length > 0 ? suggestions[suggestions.length - 1] : undefined;
}
