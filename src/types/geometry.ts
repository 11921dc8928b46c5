/**
 * Geometry types shared by the renderers
 * All measurements are in inches until a renderer scales them
 */

/**
 * A 2D point. x runs along the wall from its start; y runs away from the wall.
 */
export interface Point {
  x: number;
  y: number;
}

/**
 * An axis-aligned rectangle.
 * (x, y) is the corner nearest the wall start and the wall line.
 */
export interface Rectangle {
  x: number;
  y: number;
  width: number;
  height: number;
}

/**
 * Axis-aligned bounds of one or more shapes
 */
export interface BoundingBox {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}
