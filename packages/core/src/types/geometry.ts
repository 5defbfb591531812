// ---- Primitive geometry ----

export interface Point {
  x: number;
  y: number;
}

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

/**
 * 2D affine transform as [a, b, c, d, e, f]:
 *
 *   | a c e |
 *   | b d f |
 *   | 0 0 1 |
 */
export type Matrix = [number, number, number, number, number, number];

// ---- Path segments ----

export interface MoveSegment {
  type: "M";
  x: number;
  y: number;
}

export interface LineSegment {
  type: "L";
  x: number;
  y: number;
}

export interface QuadSegment {
  type: "Q";
  cx: number;
  cy: number;
  x: number;
  y: number;
}

export interface CubicSegment {
  type: "C";
  c1x: number;
  c1y: number;
  c2x: number;
  c2y: number;
  x: number;
  y: number;
}

/**
 * Elliptical arc in endpoint parameterization.
 * `rotation` is the x-axis rotation in degrees; `sweep` true means the arc is
 * traced in the positive-angle (counter-clockwise, Y-up) direction.
 */
export interface ArcSegment {
  type: "A";
  rx: number;
  ry: number;
  rotation: number;
  largeArc: boolean;
  sweep: boolean;
  x: number;
  y: number;
}

export interface CloseSegment {
  type: "Z";
}

export type PathSegment =
  | MoveSegment
  | LineSegment
  | QuadSegment
  | CubicSegment
  | ArcSegment
  | CloseSegment;

/** A flattened subpath. Closed polylines do not repeat their first point. */
export interface Polyline {
  points: Point[];
  closed: boolean;
}
