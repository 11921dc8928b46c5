/**
 * Sequential Layout Engine Tests
 *
 * Tests for cursor-based cabinet placement, gap detection and diagnostics.
 */

import { SequentialLayoutEngine, LayoutEngineError } from './sequential-layout';
import { CabinetSpec } from './types';
import {
  THREE_THIRTIES,
  OVERHANGING_RUN,
  EXPLICIT_GAP_RUN,
  SENTINEL_GAP_RUN,
  OVERLAPPING_RUN,
  MIXED_WIDTH_RUN
} from '../../test/fixtures/cabinet-runs';

describe('SequentialLayoutEngine', () => {
  describe('construction', () => {
    it('should keep the wall length and gap threshold', () => {
      const engine = new SequentialLayoutEngine(87.5, 0.5);

      expect(engine.wallLength).toBe(87.5);
      expect(engine.minGapToReport).toBe(0.5);
    });

    it('should default the gap threshold to 1 inch', () => {
      expect(new SequentialLayoutEngine(100).minGapToReport).toBe(1);
    });

    it('should reject non-positive wall lengths', () => {
      expect(() => new SequentialLayoutEngine(0)).toThrow(LayoutEngineError);
      expect(() => new SequentialLayoutEngine(-12)).toThrow('Wall length must be a positive number, got -12');
      expect(() => new SequentialLayoutEngine(NaN)).toThrow(LayoutEngineError);
    });

    it('should reject a negative gap threshold', () => {
      expect(() => new SequentialLayoutEngine(100, -1)).toThrow(
        'Minimum reportable gap must be zero or more, got -1'
      );
    });
  });

  describe('sequential placement', () => {
    it('should place cabinets end to end and report the trailing gap', () => {
      const result = new SequentialLayoutEngine(100).layout(THREE_THIRTIES);

      expect(result.positionedCabinets.map(c => c.position)).toEqual([0, 30, 60]);
      expect(result.positionedCabinets.map(c => c.endPosition)).toEqual([30, 60, 90]);
      expect(result.gaps).toEqual([
        { start: 90, end: 100, width: 10, before: 'cabinet', after: 'wall end' }
      ]);
      expect(result.totalWidth).toBe(90);
      expect(result.wallLength).toBe(100);
      expect(result.success).toBe(true);
      expect(result.errors).toEqual([]);
      expect(result.warnings).toEqual([]);
    });

    it('should place each cabinet at the sum of the preceding widths', () => {
      const result = new SequentialLayoutEngine(200).layout(MIXED_WIDTH_RUN);

      let expected = 0;
      result.positionedCabinets.forEach((cab, i) => {
        expect(cab.position).toBe(expected);
        expected += MIXED_WIDTH_RUN[i].width ?? 0;
      });
      expect(result.totalWidth).toBe(91.5);
    });

    it('should start at the offset', () => {
      const result = new SequentialLayoutEngine(100).layout(THREE_THIRTIES.slice(0, 2), 6);

      expect(result.positionedCabinets.map(c => c.position)).toEqual([6, 36]);
      expect(result.totalWidth).toBe(60);
      expect(result.gaps).toEqual([
        { start: 66, end: 100, width: 34, before: 'cabinet', after: 'wall end' }
      ]);
    });

    it('should keep the input index and original spec on each cabinet', () => {
      const result = new SequentialLayoutEngine(100).layout(SENTINEL_GAP_RUN);
      const sink = result.positionedCabinets[1];

      expect(sink.kind).toBe('sink');
      expect(sink.index).toBe(2);
      expect(sink.spec).toBe(SENTINEL_GAP_RUN[2]);
      expect(sink.spec.extras).toEqual({ finish: 'white oak' });
    });

    it('should preserve fractional inches', () => {
      const cabinets: CabinetSpec[] = [
        { kind: 'base', width: 12.25 },
        { kind: 'base', width: 15.5 }
      ];
      const result = new SequentialLayoutEngine(27.75).layout(cabinets);

      expect(result.positionedCabinets.map(c => c.position)).toEqual([0, 12.25]);
      expect(result.positionedCabinets[1].endPosition).toBe(27.75);
    });
  });

  describe('gap sentinel', () => {
    it('should advance the cursor without placing a cabinet', () => {
      const result = new SequentialLayoutEngine(100).layout(SENTINEL_GAP_RUN);

      expect(result.positionedCabinets).toHaveLength(2);
      expect(result.positionedCabinets.map(c => c.position)).toEqual([0, 42]);
      expect(result.gaps).toEqual([
        { start: 66, end: 100, width: 34, before: 'sink', after: 'wall end' }
      ]);
      expect(result.totalWidth).toBe(66);
    });

    it('should not report the deliberate gap itself', () => {
      const cabinets: CabinetSpec[] = [
        { kind: 'base', width: 30 },
        { kind: 'gap', width: 40 },
        { kind: 'base', width: 30 }
      ];
      const result = new SequentialLayoutEngine(100).layout(cabinets);

      expect(result.gaps).toEqual([]);
      expect(result.success).toBe(true);
    });
  });

  describe('structural errors', () => {
    it('should skip entries without a width and keep going', () => {
      const cabinets: CabinetSpec[] = [
        { kind: 'base' },
        { kind: 'base', width: 30 },
        { kind: 'gap' },
        { kind: 'sink', width: 24 }
      ];
      const result = new SequentialLayoutEngine(54).layout(cabinets);

      expect(result.errors).toEqual([
        'Cabinet 0: Missing width field',
        'Cabinet 2: Missing width field'
      ]);
      expect(result.positionedCabinets.map(c => [c.index, c.position])).toEqual([[1, 0], [3, 30]]);
      expect(result.success).toBe(false);
    });
  });

  describe('overhang', () => {
    it('should report the overhang and still place the cabinet', () => {
      const result = new SequentialLayoutEngine(50).layout(OVERHANGING_RUN);

      expect(result.positionedCabinets.map(c => c.position)).toEqual([0, 40]);
      expect(result.errors).toEqual([
        'Cabinet 1 (cabinet, 20"): Extends 10.00" past wall end (position 40.00" + 20" > 50")'
      ]);
      expect(result.gaps).toEqual([]);
      expect(result.totalWidth).toBe(60);
      expect(result.success).toBe(false);
    });

    it('should accept a cabinet that ends exactly at the wall end', () => {
      const result = new SequentialLayoutEngine(90).layout(THREE_THIRTIES);

      expect(result.errors).toEqual([]);
      expect(result.gaps).toEqual([]);
      expect(result.success).toBe(true);
    });

    it('should report every overhanging cabinet in one pass', () => {
      const result = new SequentialLayoutEngine(45).layout(THREE_THIRTIES);

      expect(result.errors).toEqual([
        'Cabinet 1 (cabinet, 30"): Extends 15.00" past wall end (position 30.00" + 30" > 45")',
        'Cabinet 2 (cabinet, 30"): Extends 45.00" past wall end (position 60.00" + 30" > 45")'
      ]);
    });
  });

  describe('explicit positions', () => {
    it('should record the gap and jump to the declared position', () => {
      const result = new SequentialLayoutEngine(60).layout(EXPLICIT_GAP_RUN);

      expect(result.positionedCabinets.map(c => c.position)).toEqual([0, 45]);
      expect(result.gaps).toEqual([
        { start: 20, end: 45, width: 25, before: 'base 0', after: 'base 1' }
      ]);
      // The declared position pushes the second cabinet past the wall end
      expect(result.errors).toEqual([
        'Cabinet 1 (base, 20"): Extends 5.00" past wall end (position 45.00" + 20" > 60")'
      ]);
      expect(result.totalWidth).toBe(65);
      expect(result.success).toBe(false);
    });

    it('should warn about an overlap without moving either cabinet', () => {
      const result = new SequentialLayoutEngine(100).layout(OVERLAPPING_RUN);

      expect(result.warnings).toEqual([
        'Overlap detected: Cabinet 0 ends at 30.00", but cabinet 1 starts at 25.00"'
      ]);
      expect(result.positionedCabinets.map(c => c.position)).toEqual([0, 30]);
      expect(result.success).toBe(true);
    });

    it('should ignore a declared position within the gap threshold', () => {
      const cabinets: CabinetSpec[] = [
        { kind: 'base', width: 20 },
        { kind: 'base', width: 20, explicitPosition: 20.5 }
      ];
      const result = new SequentialLayoutEngine(100).layout(cabinets);

      expect(result.positionedCabinets.map(c => c.position)).toEqual([0, 20]);
      expect(result.warnings).toEqual([]);
      expect(result.gaps).toEqual([
        { start: 40, end: 100, width: 60, before: 'base', after: 'wall end' }
      ]);
    });

    it('should accept a declared position equal to the computed one', () => {
      const cabinets: CabinetSpec[] = [
        { kind: 'base', width: 20 },
        { kind: 'base', width: 20, explicitPosition: 20 }
      ];
      const result = new SequentialLayoutEngine(40).layout(cabinets);

      expect(result.positionedCabinets.map(c => c.position)).toEqual([0, 20]);
      expect(result.warnings).toEqual([]);
      expect(result.gaps).toEqual([]);
    });

    it('should honour an explicit position only when it follows a placed cabinet', () => {
      const cabinets: CabinetSpec[] = [
        { kind: 'gap', width: 10 },
        { kind: 'base', width: 20, explicitPosition: 50 }
      ];
      const result = new SequentialLayoutEngine(100).layout(cabinets);

      // Nothing before it to reconcile against, so the cursor wins
      expect(result.positionedCabinets[0].position).toBe(10);
      expect(result.gaps).toEqual([
        { start: 30, end: 100, width: 70, before: 'base', after: 'wall end' }
      ]);
    });
  });

  describe('trailing gap threshold', () => {
    it('should not report a trailing gap equal to the threshold', () => {
      const result = new SequentialLayoutEngine(61).layout([{ kind: 'base', width: 60 }]);

      expect(result.gaps).toEqual([]);
    });

    it('should use the configured threshold', () => {
      const result = new SequentialLayoutEngine(64, 5).layout([{ kind: 'base', width: 60 }]);

      expect(result.gaps).toEqual([]);
      expect(result.totalWidth).toBe(60);
    });

    it('should report every gap wider than the threshold with matching width', () => {
      const cabinets: CabinetSpec[] = [
        { kind: 'base', width: 18 },
        { kind: 'base', width: 24, explicitPosition: 30.5 },
        { kind: 'sink', width: 30, explicitPosition: 60 }
      ];
      const result = new SequentialLayoutEngine(120).layout(cabinets);

      expect(result.gaps.map(g => [g.start, g.end])).toEqual([[18, 30.5], [54.5, 60], [90, 120]]);
      result.gaps.forEach(gap => {
        expect(gap.end - gap.start).toBe(gap.width);
        expect(gap.width).toBeGreaterThan(1);
      });
    });
  });

  describe('empty input', () => {
    it('should report the whole wall as one gap', () => {
      const result = new SequentialLayoutEngine(24).layout([]);

      expect(result.positionedCabinets).toEqual([]);
      expect(result.gaps).toEqual([{ start: 0, end: 24, width: 24, before: undefined, after: 'wall end' }]);
      expect(result.errors).toEqual([]);
      expect(result.totalWidth).toBe(0);
      expect(result.success).toBe(true);
    });
  });

  describe('purity', () => {
    it('should produce identical results for identical input', () => {
      const engine = new SequentialLayoutEngine(60);

      expect(engine.layout(EXPLICIT_GAP_RUN)).toEqual(engine.layout(EXPLICIT_GAP_RUN));
    });

    it('should return a frozen result', () => {
      const result = new SequentialLayoutEngine(100).layout(THREE_THIRTIES);

      expect(Object.isFrozen(result)).toBe(true);
      expect(Object.isFrozen(result.positionedCabinets)).toBe(true);
      expect(Object.isFrozen(result.gaps[0])).toBe(true);
    });

    it('should not carry state between walls', () => {
      const engine = new SequentialLayoutEngine(50);
      engine.layout(OVERHANGING_RUN);
      const second = engine.layout([{ kind: 'base', width: 24 }]);

      expect(second.errors).toEqual([]);
      expect(second.positionedCabinets[0].position).toBe(0);
    });
  });
});
