export type { Point, Rectangle, BoundingBox } from './geometry';
