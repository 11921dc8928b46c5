import { suggestWidths, bestFitWidth } from './gap-suggestions';

describe('suggestWidths', () => {
  it('should list every standard width that fits, ascending, with what it leaves', () => {
    expect(suggestWidths({ width: 25 })).toEqual([
      { width: 9, residual: 16 },
      { width: 12, residual: 13 },
      { width: 15, residual: 10 },
      { width: 18, residual: 7 },
      { width: 21, residual: 4 },
      { width: 24, residual: 1 }
    ]);
  });

  it('should include a width that fills the gap exactly', () => {
    const suggestions = suggestWidths({ width: 12 });

    expect(suggestions).toEqual([
      { width: 9, residual: 3 },
      { width: 12, residual: 0 }
    ]);
  });

  it('should return nothing for a gap narrower than the smallest stock width', () => {
    expect(suggestWidths({ width: 8.75 })).toEqual([]);
  });

  it('should offer the whole catalog for a wide gap', () => {
    const suggestions = suggestWidths({ width: 40 });

    expect(suggestions.map(s => s.width)).toEqual([9, 12, 15, 18, 21, 24, 27, 30, 33, 36]);
    expect(suggestions[suggestions.length - 1].residual).toBe(4);
  });

  it('should accept a custom catalog', () => {
    expect(suggestWidths({ width: 20 }, [10, 15, 20, 25])).toEqual([
      { width: 10, residual: 10 },
      { width: 15, residual: 5 },
      { width: 20, residual: 0 }
    ]);
  });

  it('should never suggest a width larger than the gap', () => {
    suggestWidths({ width: 29.5 }).forEach(s => {
      expect(s.width).toBeLessThanOrEqual(29.5);
      expect(s.residual).toBe(29.5 - s.width);
    });
  });
});

describe('bestFitWidth', () => {
  it('should pick the widest fitting width', () => {
    expect(bestFitWidth({ width: 29.5 })).toEqual({ width: 27, residual: 2.5 });
  });

  it('should return undefined when nothing fits', () => {
    expect(bestFitWidth({ width: 6 })).toBeUndefined();
  });
});
