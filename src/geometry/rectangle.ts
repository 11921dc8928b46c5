/**
 * Rectangle utility functions
 * Rectangles are axis-aligned (no rotation)
 */

import { Rectangle, Point, BoundingBox } from '../types/geometry';

/**
 * Creates a new rectangle
 */
export function createRectangle(x: number, y: number, width: number, height: number): Rectangle {
  return { x, y, width, height };
}

/**
 * x coordinate of the far edge
 */
export function rectangleRight(rect: Rectangle): number {
  return rect.x + rect.width;
}

/**
 * y coordinate of the far edge
 */
export function rectangleBottom(rect: Rectangle): number {
  return rect.y + rect.height;
}

/**
 * Returns the center point of a rectangle
 */
export function rectangleCenter(rect: Rectangle): Point {
  return {
    x: rect.x + rect.width / 2,
    y: rect.y + rect.height / 2
  };
}

/**
 * Checks if two rectangles share interior area.
 * Cabinets placed back to back touch at an edge; that is not an overlap.
 */
export function rectanglesOverlap(rect1: Rectangle, rect2: Rectangle): boolean {
  return (
    rect1.x < rectangleRight(rect2) &&
    rect2.x < rectangleRight(rect1) &&
    rect1.y < rectangleBottom(rect2) &&
    rect2.y < rectangleBottom(rect1)
  );
}

/**
 * Returns the intersection of two rectangles (or null if they don't overlap)
 */
export function rectangleIntersection(rect1: Rectangle, rect2: Rectangle): Rectangle | null {
  const x = Math.max(rect1.x, rect2.x);
  const y = Math.max(rect1.y, rect2.y);
  const right = Math.min(rectangleRight(rect1), rectangleRight(rect2));
  const bottom = Math.min(rectangleBottom(rect1), rectangleBottom(rect2));

  if (right <= x || bottom <= y) {
    return null;
  }

  return {
    x,
    y,
    width: right - x,
    height: bottom - y
  };
}

/**
 * Bounds enclosing every rectangle, or null for an empty list
 */
export function boundingBoxOf(rects: readonly Rectangle[]): BoundingBox | null {
  if (rects.length === 0) return null;

  return {
    minX: Math.min(...rects.map(r => r.x)),
    minY: Math.min(...rects.map(r => r.y)),
    maxX: Math.max(...rects.map(rectangleRight)),
    maxY: Math.max(...rects.map(rectangleBottom))
  };
}

/**
 * Scales position and size by the same factor (e.g. inches to pixels)
 */
export function scaleRectangle(rect: Rectangle, factor: number): Rectangle {
  return {
    x: rect.x * factor,
    y: rect.y * factor,
    width: rect.width * factor,
    height: rect.height * factor
  };
}

/**
 * Translates a rectangle by dx, dy
 */
export function translateRectangle(rect: Rectangle, dx: number, dy: number): Rectangle {
  return {
    x: rect.x + dx,
    y: rect.y + dy,
    width: rect.width,
    height: rect.height
  };
}
