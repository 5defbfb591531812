import { DEFAULT_TOLERANCE, Path } from "../geometry/path.js";
import type { Point } from "../types/geometry.js";

/**
 * Normalized dash pattern: odd-length patterns are repeated once so that
 * on/off alternate consistently. Returns null when the pattern means
 * "solid" (empty, or all lengths zero).
 */
export function normalizeDashes(dashes: readonly number[]): number[] | null {
  if (dashes.length === 0) return null;
  for (const d of dashes) {
    if (!(d >= 0)) {
      throw new Error(`Invalid dash length ${d}: dash lengths must be non-negative`);
    }
  }
  const pattern = dashes.length % 2 === 1 ? [...dashes, ...dashes] : [...dashes];
  const total = pattern.reduce((sum, d) => sum + d, 0);
  return total > 0 ? pattern : null;
}

interface DashCursor {
  index: number;
  remaining: number;
}

function seedCursor(pattern: number[], offset: number): DashCursor {
  const total = pattern.reduce((sum, d) => sum + d, 0);
  let pos = ((offset % total) + total) % total;
  let index = 0;
  while (pos >= pattern[index]) {
    pos -= pattern[index];
    index = (index + 1) % pattern.length;
  }
  return { index, remaining: pattern[index] - pos };
}

/**
 * Split a path into its visible dash runs.
 *
 * Walks the arc length of every subpath, alternating on/off runs starting
 * `offset` into the pattern; the pattern restarts at each subpath. Runs in
 * the off state are dropped. On a closed subpath a run that wraps past the
 * start point is joined with the first run.
 */
export function dashPath(
  path: Path,
  offset: number,
  dashes: readonly number[],
  tolerance: number = DEFAULT_TOLERANCE,
): Path[] {
  const pattern = normalizeDashes(dashes);
  if (pattern === null) {
    return path.empty() ? [] : [path.copy()];
  }

  const result: Path[] = [];
  for (const pl of path.flatten(tolerance)) {
    const pts = pl.closed ? [...pl.points, pl.points[0]] : pl.points;
    const cursor = seedCursor(pattern, offset);
    const startsOn = cursor.index % 2 === 0;
    const runs: Point[][] = [];
    let run: Point[] | null = startsOn ? [pts[0]] : null;

    for (let k = 0; k + 1 < pts.length; k++) {
      const a = pts[k];
      const b = pts[k + 1];
      const len = Math.hypot(b.x - a.x, b.y - a.y);
      let t = 0;
      while (len - t > cursor.remaining) {
        t += cursor.remaining;
        const p = { x: a.x + ((b.x - a.x) * t) / len, y: a.y + ((b.y - a.y) * t) / len };
        if (run !== null) {
          run.push(p);
          runs.push(run);
          run = null;
        } else {
          run = [p];
        }
        cursor.index = (cursor.index + 1) % pattern.length;
        cursor.remaining = pattern[cursor.index];
      }
      cursor.remaining -= len - t;
      if (run !== null) run.push(b);
    }

    if (run !== null && pl.closed && runs.length === 0) {
      // the whole closed subpath is visible
      const whole = new Path().moveTo(pl.points[0].x, pl.points[0].y);
      for (const p of pl.points.slice(1)) {
        whole.lineTo(p.x, p.y);
      }
      result.push(whole.close());
      continue;
    }
    if (run !== null) {
      if (pl.closed && startsOn && runs.length > 0) {
        // wrap around the start point
        runs[0] = [...run, ...runs[0].slice(1)];
      } else {
        runs.push(run);
      }
    }

    for (const r of runs) {
      if (r.length < 2) continue;
      const dash = new Path().moveTo(r[0].x, r[0].y);
      for (const p of r.slice(1)) {
        dash.lineTo(p.x, p.y);
      }
      result.push(dash);
    }
  }
  return result;
}

/** All dash runs of a path merged into a single path. */
export function dash(
  path: Path,
  offset: number,
  dashes: readonly number[],
  tolerance: number = DEFAULT_TOLERANCE,
): Path {
  const out = new Path();
  for (const run of dashPath(path, offset, dashes, tolerance)) {
    out.append(run);
  }
  return out;
}
