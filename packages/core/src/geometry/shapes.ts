import { Path } from "./path.js";

/** Rectangle with its lower-left corner at the origin. */
export function rectangle(width: number, height: number): Path {
  if (width <= 0 || height <= 0) return new Path();
  return new Path().moveTo(0, 0).lineTo(width, 0).lineTo(width, height).lineTo(0, height).close();
}

/** Rectangle with circular corners of radius `r` (clamped to half the short side). */
export function roundedRectangle(width: number, height: number, r: number): Path {
  if (width <= 0 || height <= 0) return new Path();
  const radius = Math.min(Math.abs(r), width / 2, height / 2);
  if (radius === 0) return rectangle(width, height);
  return new Path()
    .moveTo(radius, 0)
    .lineTo(width - radius, 0)
    .arcTo(radius, radius, 0, false, true, width, radius)
    .lineTo(width, height - radius)
    .arcTo(radius, radius, 0, false, true, width - radius, height)
    .lineTo(radius, height)
    .arcTo(radius, radius, 0, false, true, 0, height - radius)
    .lineTo(0, radius)
    .arcTo(radius, radius, 0, false, true, radius, 0)
    .close();
}

/** Ellipse centered on the origin. */
export function ellipse(rx: number, ry: number): Path {
  if (rx <= 0 || ry <= 0) return new Path();
  return new Path()
    .moveTo(rx, 0)
    .arcTo(rx, ry, 0, false, true, -rx, 0)
    .arcTo(rx, ry, 0, false, true, rx, 0)
    .close();
}

export function circle(r: number): Path {
  return ellipse(r, r);
}

/**
 * Regular polygon with `n` vertices on a circle of radius `r` around the
 * origin. With `up` the first vertex points up, otherwise a flat edge is on
 * top for even `n`.
 */
export function regularPolygon(n: number, r: number, up = true): Path {
  if (n < 3 || r <= 0) return new Path();
  const start = up ? Math.PI / 2 : Math.PI / 2 + Math.PI / n;
  const path = new Path();
  for (let i = 0; i < n; i++) {
    const angle = start + (2 * Math.PI * i) / n;
    const x = r * Math.cos(angle);
    const y = r * Math.sin(angle);
    if (i === 0) {
      path.moveTo(x, y);
    } else {
      path.lineTo(x, y);
    }
  }
  return path.close();
}
