import { unsupportedStyle } from "../errors.js";
import { DEFAULT_TOLERANCE, Path } from "../geometry/path.js";
import { strokeActive } from "../style/draw-state.js";
import type { Point } from "../types/geometry.js";
import type { Capper, DrawState, Joiner } from "../types/style.js";
import { dash } from "./dash.js";

const EPSILON = 1e-9;

interface Vec {
  x: number;
  y: number;
}

/**
 * Outline of the region covered by stroking `path`.
 *
 * Every subpath is flattened and offset by half the width on both sides.
 * Open subpaths give one contour (right side forward, end cap, right side of
 * the reversed run, start cap); closed subpaths give two contours of opposite
 * orientation. Corners get the joiner on their outer side and pivot through
 * the vertex on the inner side, so the outline must be filled with the
 * non-zero rule.
 *
 * A width ≤ 0 yields an empty path.
 */
export function strokePath(
  path: Path,
  width: number,
  capper: Capper,
  joiner: Joiner,
  tolerance: number = DEFAULT_TOLERANCE,
): Path {
  const out = new Path();
  if (!(width > 0)) return out;
  const hw = width / 2;

  for (const pl of path.flatten(tolerance)) {
    const pts = dedupe(pl.points, pl.closed);
    if (pts.length === 1) {
      dot(out, pts[0], hw, capper);
      continue;
    }

    if (pl.closed) {
      walkRightSide(out, pts, true, hw, joiner);
      out.close();
      walkRightSide(out, [...pts].reverse(), true, hw, joiner);
      out.close();
      continue;
    }

    const n = pts.length;
    walkRightSide(out, pts, false, hw, joiner);
    cap(out, pts[n - 1], direction(pts[n - 2], pts[n - 1]), hw, capper);
    walkRightSide(out, [...pts].reverse(), false, hw, joiner, true);
    cap(out, pts[0], direction(pts[1], pts[0]), hw, capper);
    out.close();
  }
  return out;
}

/**
 * Filled outline of a layer's stroke: dashes applied first, then outlined.
 * Returns null when the stroke is inactive.
 */
export function outlineStroke(
  path: Path,
  state: DrawState,
  tolerance: number = DEFAULT_TOLERANCE,
): Path | null {
  if (!strokeActive(state)) return null;
  const center = state.dashes.length > 0 ? dash(path, state.dashOffset, state.dashes, tolerance) : path;
  return strokePath(center, state.strokeWidth, state.capper, state.joiner, tolerance);
}

// ---- Offsetting ----

function walkRightSide(
  out: Path,
  pts: Point[],
  closed: boolean,
  hw: number,
  joiner: Joiner,
  continuing = false,
): void {
  const n = pts.length;
  const segCount = closed ? n : n - 1;
  const dirs: Vec[] = [];
  for (let k = 0; k < segCount; k++) {
    dirs.push(direction(pts[k], pts[(k + 1) % n]));
  }

  const start = offset(pts[0], dirs[0], hw);
  if (continuing) {
    out.lineTo(start.x, start.y);
  } else {
    out.moveTo(start.x, start.y);
  }

  for (let j = 1; j < segCount; j++) {
    const end = offset(pts[j], dirs[j - 1], hw);
    out.lineTo(end.x, end.y);
    join(out, pts[j], dirs[j - 1], dirs[j], hw, joiner);
  }

  if (closed) {
    const end = offset(pts[0], dirs[n - 1], hw);
    out.lineTo(end.x, end.y);
    join(out, pts[0], dirs[n - 1], dirs[0], hw, joiner);
  } else {
    const end = offset(pts[n - 1], dirs[n - 2], hw);
    out.lineTo(end.x, end.y);
  }
}

/**
 * Connect the right-side offsets of two segments meeting at `p`.
 * The current point is p + right(d0)·hw; ends at p + right(d1)·hw.
 */
function join(out: Path, p: Point, d0: Vec, d1: Vec, hw: number, joiner: Joiner): void {
  const cross = d0.x * d1.y - d0.y * d1.x;
  const dot = d0.x * d1.x + d0.y * d1.y;
  const end = offset(p, d1, hw);

  if (Math.abs(cross) <= EPSILON && dot > 0) {
    out.lineTo(end.x, end.y);
    return;
  }
  if (cross < -EPSILON) {
    // inner side of a right turn
    out.lineTo(p.x, p.y);
    out.lineTo(end.x, end.y);
    return;
  }
  outerJoin(out, p, d0, d1, hw, joiner);
}

function outerJoin(out: Path, p: Point, d0: Vec, d1: Vec, hw: number, joiner: Joiner): void {
  const end = offset(p, d1, hw);
  switch (joiner.kind) {
    case "bevel":
      out.lineTo(end.x, end.y);
      return;
    case "round":
      out.arcTo(hw, hw, 0, false, true, end.x, end.y);
      return;
    case "miter":
    case "arcs": {
      // Flattened segments carry no curvature, so arcs meet like a miter.
      const denom = 1 + d0.x * d1.x + d0.y * d1.y;
      if (denom > EPSILON) {
        const ratio = 1 / Math.sqrt(denom / 2);
        if (Number.isNaN(joiner.limit) || ratio <= joiner.limit) {
          const r0 = right(d0);
          const r1 = right(d1);
          out.lineTo(p.x + ((r0.x + r1.x) * hw) / denom, p.y + ((r0.y + r1.y) * hw) / denom);
          out.lineTo(end.x, end.y);
          return;
        }
      }
      outerJoin(out, p, d0, d1, hw, joiner.fallback);
      return;
    }
    default:
      unsupportedStyle(joiner, "Line join");
  }
}

/**
 * Cap the end `p` of a run travelling in direction `d`: from the right-side
 * offset around to the left-side offset.
 */
function cap(out: Path, p: Point, d: Vec, hw: number, capper: Capper): void {
  const r = right(d);
  const left = { x: p.x - r.x * hw, y: p.y - r.y * hw };
  switch (capper.kind) {
    case "butt":
      out.lineTo(left.x, left.y);
      return;
    case "round":
      out.arcTo(hw, hw, 0, false, true, p.x + d.x * hw, p.y + d.y * hw);
      out.arcTo(hw, hw, 0, false, true, left.x, left.y);
      return;
    case "square":
      out.lineTo(p.x + (r.x + d.x) * hw, p.y + (r.y + d.y) * hw);
      out.lineTo(left.x + d.x * hw, left.y + d.y * hw);
      out.lineTo(left.x, left.y);
      return;
    default:
      unsupportedStyle(capper, "Line cap");
  }
}

/** Zero-length run: round and square caps still leave a mark. */
function dot(out: Path, p: Point, hw: number, capper: Capper): void {
  switch (capper.kind) {
    case "butt":
      return;
    case "round":
      out
        .moveTo(p.x + hw, p.y)
        .arcTo(hw, hw, 0, false, true, p.x - hw, p.y)
        .arcTo(hw, hw, 0, false, true, p.x + hw, p.y)
        .close();
      return;
    case "square":
      out
        .moveTo(p.x - hw, p.y - hw)
        .lineTo(p.x + hw, p.y - hw)
        .lineTo(p.x + hw, p.y + hw)
        .lineTo(p.x - hw, p.y + hw)
        .close();
      return;
    default:
      unsupportedStyle(capper, "Line cap");
  }
}

// ---- Vector helpers ----

function direction(a: Point, b: Point): Vec {
  const len = Math.hypot(b.x - a.x, b.y - a.y);
  return { x: (b.x - a.x) / len, y: (b.y - a.y) / len };
}

/** Unit normal on the right-hand side of travel (Y-up). */
function right(d: Vec): Vec {
  return { x: d.y, y: -d.x };
}

function offset(p: Point, d: Vec, hw: number): Point {
  const r = right(d);
  return { x: p.x + r.x * hw, y: p.y + r.y * hw };
}

function dedupe(points: Point[], closed: boolean): Point[] {
  const out: Point[] = [];
  for (const p of points) {
    const last = out[out.length - 1];
    if (last === undefined || Math.hypot(p.x - last.x, p.y - last.y) > EPSILON) {
      out.push(p);
    }
  }
  if (closed && out.length > 1) {
    const first = out[0];
    const last = out[out.length - 1];
    if (Math.hypot(first.x - last.x, first.y - last.y) <= EPSILON) out.pop();
  }
  return out;
}
