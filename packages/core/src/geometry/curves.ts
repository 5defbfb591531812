import type { CubicSegment, Point } from "../types/geometry.js";

export interface ArcCenter {
  cx: number;
  cy: number;
  rx: number;
  ry: number;
  /** x-axis rotation in radians */
  phi: number;
  /** start angle in radians */
  theta: number;
  /** signed sweep in radians, positive is counter-clockwise */
  delta: number;
}

/**
 * Convert an endpoint-parameterized elliptical arc to center form, scaling
 * the radii up when they are too small to span the endpoints.
 * Returns null for degenerate arcs that are drawn as straight lines.
 */
export function arcToCenter(
  x1: number,
  y1: number,
  rxIn: number,
  ryIn: number,
  rotationDeg: number,
  largeArc: boolean,
  sweep: boolean,
  x2: number,
  y2: number,
): ArcCenter | null {
  let rx = Math.abs(rxIn);
  let ry = Math.abs(ryIn);
  if (rx === 0 || ry === 0 || (x1 === x2 && y1 === y2)) return null;

  const phi = (rotationDeg * Math.PI) / 180;
  const cos = Math.cos(phi);
  const sin = Math.sin(phi);

  const dx = (x1 - x2) / 2;
  const dy = (y1 - y2) / 2;
  const x1p = cos * dx + sin * dy;
  const y1p = -sin * dx + cos * dy;

  const lambda = (x1p * x1p) / (rx * rx) + (y1p * y1p) / (ry * ry);
  if (lambda > 1) {
    const s = Math.sqrt(lambda);
    rx *= s;
    ry *= s;
  }

  const num = rx * rx * ry * ry - rx * rx * y1p * y1p - ry * ry * x1p * x1p;
  const den = rx * rx * y1p * y1p + ry * ry * x1p * x1p;
  let coef = Math.sqrt(Math.max(0, num / den));
  if (largeArc === sweep) coef = -coef;

  const cxp = (coef * rx * y1p) / ry;
  const cyp = (-coef * ry * x1p) / rx;
  const cx = cos * cxp - sin * cyp + (x1 + x2) / 2;
  const cy = sin * cxp + cos * cyp + (y1 + y2) / 2;

  const theta = vectorAngle(1, 0, (x1p - cxp) / rx, (y1p - cyp) / ry);
  let delta = vectorAngle(
    (x1p - cxp) / rx,
    (y1p - cyp) / ry,
    (-x1p - cxp) / rx,
    (-y1p - cyp) / ry,
  );
  if (!sweep && delta > 0) delta -= 2 * Math.PI;
  if (sweep && delta < 0) delta += 2 * Math.PI;

  return { cx, cy, rx, ry, phi, theta, delta };
}

function vectorAngle(ux: number, uy: number, vx: number, vy: number): number {
  const dot = ux * vx + uy * vy;
  const len = Math.hypot(ux, uy) * Math.hypot(vx, vy);
  let angle = Math.acos(Math.min(1, Math.max(-1, dot / len)));
  if (ux * vy - uy * vx < 0) angle = -angle;
  return angle;
}

/** Point on the ellipse at parameter angle t. */
export function ellipsePoint(arc: ArcCenter, t: number): Point {
  const cos = Math.cos(arc.phi);
  const sin = Math.sin(arc.phi);
  const ex = arc.rx * Math.cos(t);
  const ey = arc.ry * Math.sin(t);
  return { x: arc.cx + cos * ex - sin * ey, y: arc.cy + sin * ex + cos * ey };
}

/** Approximate an arc with cubic Béziers, one per quarter turn at most. */
export function arcToCubics(arc: ArcCenter): CubicSegment[] {
  const count = Math.max(1, Math.ceil(Math.abs(arc.delta) / (Math.PI / 2) - 1e-9));
  const step = arc.delta / count;
  const kappa = (4 / 3) * Math.tan(step / 4);
  const cos = Math.cos(arc.phi);
  const sin = Math.sin(arc.phi);

  // derivative of the ellipse at t, scaled by kappa
  const tangent = (t: number): Point => {
    const dx = -arc.rx * Math.sin(t);
    const dy = arc.ry * Math.cos(t);
    return { x: kappa * (cos * dx - sin * dy), y: kappa * (sin * dx + cos * dy) };
  };

  const cubics: CubicSegment[] = [];
  let t0 = arc.theta;
  for (let i = 0; i < count; i++) {
    const t1 = t0 + step;
    const p0 = ellipsePoint(arc, t0);
    const p1 = ellipsePoint(arc, t1);
    const d0 = tangent(t0);
    const d1 = tangent(t1);
    cubics.push({
      type: "C",
      c1x: p0.x + d0.x,
      c1y: p0.y + d0.y,
      c2x: p1.x - d1.x,
      c2y: p1.y - d1.y,
      x: p1.x,
      y: p1.y,
    });
    t0 = t1;
  }
  return cubics;
}

/** Quadratic to cubic elevation: control points at 2/3 toward the quad control. */
export function quadToCubic(
  x0: number,
  y0: number,
  cx: number,
  cy: number,
  x: number,
  y: number,
): CubicSegment {
  return {
    type: "C",
    c1x: x0 + (2 / 3) * (cx - x0),
    c1y: y0 + (2 / 3) * (cy - y0),
    c2x: x + (2 / 3) * (cx - x),
    c2y: y + (2 / 3) * (cy - y),
    x,
    y,
  };
}

// ---- Flattening ----

/** Points after p0 approximating a quadratic within `tolerance` (Wang's formula). */
export function flattenQuad(
  p0: Point,
  p1: Point,
  p2: Point,
  tolerance: number,
): Point[] {
  const dd = Math.hypot(p0.x - 2 * p1.x + p2.x, p0.y - 2 * p1.y + p2.y);
  const n = Math.max(1, Math.ceil(Math.sqrt((0.25 * dd) / tolerance)));
  const points: Point[] = [];
  for (let i = 1; i <= n; i++) {
    const t = i / n;
    const mt = 1 - t;
    points.push({
      x: mt * mt * p0.x + 2 * mt * t * p1.x + t * t * p2.x,
      y: mt * mt * p0.y + 2 * mt * t * p1.y + t * t * p2.y,
    });
  }
  return points;
}

export function flattenCubic(
  p0: Point,
  p1: Point,
  p2: Point,
  p3: Point,
  tolerance: number,
): Point[] {
  const dd = Math.max(
    Math.hypot(p0.x - 2 * p1.x + p2.x, p0.y - 2 * p1.y + p2.y),
    Math.hypot(p1.x - 2 * p2.x + p3.x, p1.y - 2 * p2.y + p3.y),
  );
  const n = Math.max(1, Math.ceil(Math.sqrt((0.75 * dd) / tolerance)));
  const points: Point[] = [];
  for (let i = 1; i <= n; i++) {
    const t = i / n;
    const mt = 1 - t;
    const a = mt * mt * mt;
    const b = 3 * mt * mt * t;
    const c = 3 * mt * t * t;
    const d = t * t * t;
    points.push({
      x: a * p0.x + b * p1.x + c * p2.x + d * p3.x,
      y: a * p0.y + b * p1.y + c * p2.y + d * p3.y,
    });
  }
  return points;
}

export function flattenArc(arc: ArcCenter, tolerance: number): Point[] {
  const r = Math.max(arc.rx, arc.ry);
  const step = tolerance < r ? 2 * Math.acos(1 - tolerance / r) : Math.PI / 2;
  const n = Math.max(1, Math.ceil(Math.abs(arc.delta) / step));
  const points: Point[] = [];
  for (let i = 1; i <= n; i++) {
    points.push(ellipsePoint(arc, arc.theta + (arc.delta * i) / n));
  }
  return points;
}
