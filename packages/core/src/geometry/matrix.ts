import type { Matrix, Point } from "../types/geometry.js";

export function identity(): Matrix {
  return [1, 0, 0, 1, 0, 0];
}

/** a × b: applies b first, then a. */
export function multiply(a: Matrix, b: Matrix): Matrix {
  return [
    a[0] * b[0] + a[2] * b[1],
    a[1] * b[0] + a[3] * b[1],
    a[0] * b[2] + a[2] * b[3],
    a[1] * b[2] + a[3] * b[3],
    a[0] * b[4] + a[2] * b[5] + a[4],
    a[1] * b[4] + a[3] * b[5] + a[5],
  ];
}

export function translation(tx: number, ty: number): Matrix {
  return [1, 0, 0, 1, tx, ty];
}

export function scaling(sx: number, sy: number): Matrix {
  return [sx, 0, 0, sy, 0, 0];
}

/** Counter-clockwise rotation in degrees about (cx, cy). */
export function rotation(degrees: number, cx = 0, cy = 0): Matrix {
  const rad = (degrees * Math.PI) / 180;
  const cos = Math.cos(rad);
  const sin = Math.sin(rad);
  return [cos, sin, -sin, cos, cx - cos * cx + sin * cy, cy - sin * cx - cos * cy];
}

export function applyMatrix(m: Matrix, x: number, y: number): Point {
  return { x: m[0] * x + m[2] * y + m[4], y: m[1] * x + m[3] * y + m[5] };
}

export function determinant(m: Matrix): number {
  return m[0] * m[3] - m[1] * m[2];
}

/**
 * Uniform scale factor if the linear part is a similarity
 * (rotation, uniform scale, optional reflection), otherwise null.
 */
export function similarityScale(m: Matrix): number | null {
  const lenX = Math.hypot(m[0], m[1]);
  const lenY = Math.hypot(m[2], m[3]);
  const dot = m[0] * m[2] + m[1] * m[3];
  const eps = 1e-9 * Math.max(1, lenX, lenY);
  if (Math.abs(lenX - lenY) > eps || Math.abs(dot) > eps) return null;
  return lenX;
}

/** Rotation angle of the matrix' x axis, in degrees. */
export function rotationAngle(m: Matrix): number {
  return (Math.atan2(m[1], m[0]) * 180) / Math.PI;
}
