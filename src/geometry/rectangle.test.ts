/**
 * Rectangle Utility Tests
 */

import {
  createRectangle,
  rectangleRight,
  rectangleBottom,
  rectangleCenter,
  rectanglesOverlap,
  rectangleIntersection,
  boundingBoxOf,
  scaleRectangle,
  translateRectangle
} from './rectangle';

describe('Rectangle utilities', () => {
  describe('createRectangle', () => {
    it('should create rectangle from position and dimensions', () => {
      const rect = createRectangle(0, 0, 30, 24);

      expect(rect).toEqual({ x: 0, y: 0, width: 30, height: 24 });
    });
  });

  describe('edges', () => {
    it('should compute far edges', () => {
      const rect = createRectangle(12.5, 0, 18, 24);

      expect(rectangleRight(rect)).toBe(30.5);
      expect(rectangleBottom(rect)).toBe(24);
    });
  });

  describe('rectangleCenter', () => {
    it('should find center of offset rectangle', () => {
      const center = rectangleCenter(createRectangle(10, 20, 8, 6));

      expect(center).toEqual({ x: 14, y: 23 });
    });
  });

  describe('rectanglesOverlap', () => {
    it('should detect overlapping rectangles', () => {
      const rect1 = createRectangle(0, 0, 30, 24);
      const rect2 = createRectangle(25, 0, 30, 24);

      expect(rectanglesOverlap(rect1, rect2)).toBe(true);
    });

    it('should return false for separate rectangles', () => {
      const rect1 = createRectangle(0, 0, 30, 24);
      const rect2 = createRectangle(40, 0, 30, 24);

      expect(rectanglesOverlap(rect1, rect2)).toBe(false);
    });

    it('should not treat cabinets placed back to back as overlapping', () => {
      const rect1 = createRectangle(0, 0, 30, 24);
      const rect2 = createRectangle(30, 0, 15, 24);

      expect(rectanglesOverlap(rect1, rect2)).toBe(false);
    });

    it('should detect when one rectangle contains another', () => {
      const outer = createRectangle(0, 0, 36, 24);
      const inner = createRectangle(6, 6, 12, 12);

      expect(rectanglesOverlap(outer, inner)).toBe(true);
    });
  });

  describe('rectangleIntersection', () => {
    it('should return the shared area', () => {
      const rect1 = createRectangle(0, 0, 30, 24);
      const rect2 = createRectangle(25, 0, 30, 12);

      expect(rectangleIntersection(rect1, rect2)).toEqual({ x: 25, y: 0, width: 5, height: 12 });
    });

    it('should return null for touching rectangles', () => {
      const rect1 = createRectangle(0, 0, 30, 24);
      const rect2 = createRectangle(30, 0, 30, 24);

      expect(rectangleIntersection(rect1, rect2)).toBeNull();
    });
  });

  describe('boundingBoxOf', () => {
    it('should enclose all rectangles', () => {
      const box = boundingBoxOf([
        createRectangle(0, 0, 30, 24),
        createRectangle(30, 0, 45, 12),
        createRectangle(-5, 2, 4, 4)
      ]);

      expect(box).toEqual({ minX: -5, minY: 0, maxX: 75, maxY: 24 });
    });

    it('should return null for no rectangles', () => {
      expect(boundingBoxOf([])).toBeNull();
    });
  });

  describe('scaleRectangle', () => {
    it('should scale position and size', () => {
      const scaled = scaleRectangle(createRectangle(10, 2, 30, 24), 3);

      expect(scaled).toEqual({ x: 30, y: 6, width: 90, height: 72 });
    });
  });

  describe('translateRectangle', () => {
    it('should move without resizing', () => {
      const moved = translateRectangle(createRectangle(10, 2, 30, 24), 50, -2);

      expect(moved).toEqual({ x: 60, y: 0, width: 30, height: 24 });
    });
  });
});
