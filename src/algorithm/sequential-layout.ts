/**
 * Kitchen Layout - Sequential Layout Engine
 *
 * Positions cabinets one after another along a wall so that nobody has to
 * hand-compute absolute positions in the configuration.
 *
 * A single left-to-right pass keeps a running cursor:
 * 1. Entries without a width are reported and skipped
 * 2. "gap" entries advance the cursor without placing anything
 * 3. Every other entry is placed at the cursor; running past the wall end is an error
 * 4. If the next entry declares an explicit position, it is reconciled against
 *    the current cabinet's end: a gap moves the cursor there, an overlap is a warning
 * 5. Space left between the cursor and the wall end is reported as a trailing gap
 */

import {
  CabinetSpec,
  Gap,
  LayoutResult,
  PlaceableCabinetSpec,
  PositionedCabinet,
  isGapSpec
} from './types';
import { DEFAULT_MIN_GAP_TO_REPORT, WALL_END_LABEL } from './constants';
import { Logger } from './utils/logger';

/**
 * Error thrown when the engine is constructed with unusable parameters.
 */
export class LayoutEngineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LayoutEngineError';
  }
}

// Inches with two decimals, e.g. 12.5 -> "12.50"
const fmt = (inches: number): string => inches.toFixed(2);

function label(spec: CabinetSpec, index: number): string {
  return `${spec.kind} ${index}`;
}

export class SequentialLayoutEngine {
  readonly wallLength: number;
  readonly minGapToReport: number;

  /**
   * @param wallLength - Usable length of the wall segment
   * @param minGapToReport - Gaps this size or smaller are suppressed
   * @throws {LayoutEngineError} If wallLength is not a positive finite number,
   *         or minGapToReport is negative
   */
  constructor(wallLength: number, minGapToReport: number = DEFAULT_MIN_GAP_TO_REPORT) {
    if (!Number.isFinite(wallLength) || wallLength <= 0) {
      throw new LayoutEngineError(`Wall length must be a positive number, got ${wallLength}`);
    }
    if (!Number.isFinite(minGapToReport) || minGapToReport < 0) {
      throw new LayoutEngineError(
        `Minimum reportable gap must be zero or more, got ${minGapToReport}`
      );
    }
    this.wallLength = wallLength;
    this.minGapToReport = minGapToReport;
  }

  /**
   * Position cabinets sequentially along the wall.
   *
   * Never throws for problems in the cabinet list; they are collected in
   * the result's errors and warnings so one run surfaces all of them.
   *
   * @param cabinets - Ordered cabinet specs, wall start first
   * @param startOffset - Where the first cabinet goes
   */
  layout(cabinets: readonly CabinetSpec[], startOffset: number = 0): LayoutResult {
    const positioned: PositionedCabinet[] = [];
    const gaps: Gap[] = [];
    const errors: string[] = [];
    const warnings: string[] = [];
    let cursor = startOffset;

    for (let i = 0; i < cabinets.length; i++) {
      const spec = cabinets[i];
      const width = spec.width;

      if (width === undefined) {
        errors.push(`Cabinet ${i}: Missing width field`);
        continue;
      }

      if (isGapSpec(spec)) {
        cursor += width;
        continue;
      }

      if (cursor + width > this.wallLength) {
        const overhang = cursor + width - this.wallLength;
        errors.push(
          `Cabinet ${i} (${spec.kind}, ${width}"): ` +
            `Extends ${fmt(overhang)}" past wall end ` +
            `(position ${fmt(cursor)}" + ${width}" > ${this.wallLength}")`
        );
      }

      const cabinet = this.place(spec, i, width, cursor);
      positioned.push(cabinet);
      Logger.debug(`Placed ${label(spec, i)} at ${fmt(cabinet.position)}-${fmt(cabinet.endPosition)}`);

      // Lookahead: an explicit position on the next entry wins over the cursor
      const next = i + 1 < cabinets.length ? cabinets[i + 1] : undefined;
      if (next && !isGapSpec(next) && next.explicitPosition !== undefined) {
        const declared = next.explicitPosition;
        const gapWidth = declared - cabinet.endPosition;

        if (gapWidth > this.minGapToReport) {
          gaps.push({
            start: cabinet.endPosition,
            end: declared,
            width: gapWidth,
            before: label(spec, i),
            after: label(next, i + 1)
          });
          cursor = declared;
          continue;
        } else if (gapWidth < 0) {
          warnings.push(
            `Overlap detected: Cabinet ${i} ends at ${fmt(cabinet.endPosition)}", ` +
              `but cabinet ${i + 1} starts at ${fmt(declared)}"`
          );
        }
      }

      cursor += width;
    }

    if (cursor < this.wallLength) {
      const gapWidth = this.wallLength - cursor;
      if (gapWidth > this.minGapToReport) {
        const last = positioned.length > 0 ? positioned[positioned.length - 1] : undefined;
        gaps.push({
          start: cursor,
          end: this.wallLength,
          width: gapWidth,
          before: last?.kind,
          after: WALL_END_LABEL
        });
      }
    }

    if (errors.length > 0) {
      Logger.debug(`Layout finished with ${errors.length} error(s) on ${this.wallLength}" wall`);
    }

    return Object.freeze({
      positionedCabinets: Object.freeze(positioned),
      gaps: Object.freeze(gaps.map(gap => Object.freeze(gap))),
      totalWidth: cursor - startOffset,
      wallLength: this.wallLength,
      success: errors.length === 0,
      errors: Object.freeze(errors),
      warnings: Object.freeze(warnings)
    });
  }

  private place(
    spec: PlaceableCabinetSpec,
    index: number,
    width: number,
    position: number
  ): PositionedCabinet {
    return Object.freeze({
      kind: spec.kind,
      width,
      position,
      endPosition: position + width,
      index,
      spec
    });
  }
}
