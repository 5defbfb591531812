import { Path } from "../geometry/path.js";
import type { Point } from "../types/geometry.js";

const ARG_COUNTS: Record<string, number> = {
  M: 2,
  L: 2,
  H: 1,
  V: 1,
  C: 6,
  S: 4,
  Q: 4,
  T: 2,
  A: 7,
  Z: 0,
};

const TOKEN = /([MmLlHhVvCcSsQqTtAaZz])|([-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?)|([\s,]+)|(.)/g;

/**
 * Parse SVG path data ("M0 0L10 0 10 10z") into a Path.
 * Supports absolute and relative commands, implicit repeats and the
 * smooth curve shorthands. Throws a descriptive error on malformed input.
 */
export function parsePathData(d: string): Path {
  const tokens = tokenize(d);
  const path = new Path();

  let i = 0;
  let cmd = "";
  // reflected control point for S/T
  let lastCtrl: { x: number; y: number; kind: "C" | "Q" } | null = null;

  const next = (): number => {
    const tok = tokens[i];
    if (typeof tok !== "number") {
      throw new Error(`Invalid path data "${d}": expected a number after "${cmd}"`);
    }
    i++;
    return tok;
  };
  const flag = (): boolean => {
    const value = next();
    if (value !== 0 && value !== 1) {
      throw new Error(`Invalid path data "${d}": arc flags must be 0 or 1`);
    }
    return value === 1;
  };

  while (i < tokens.length) {
    const tok = tokens[i];
    if (typeof tok === "string") {
      cmd = tok;
      i++;
    } else if (cmd === "") {
      throw new Error(`Invalid path data "${d}": must start with a command`);
    } else if (cmd === "M") {
      cmd = "L";
    } else if (cmd === "m") {
      cmd = "l";
    }

    const upper = cmd.toUpperCase();
    const rel = cmd !== upper;
    const { x: cx, y: cy } = path.position;
    const ox = rel ? cx : 0;
    const oy = rel ? cy : 0;

    if (upper === "Z") {
      path.close();
      lastCtrl = null;
      if (typeof tokens[i] === "number") {
        throw new Error(`Invalid path data "${d}": unexpected number after "z"`);
      }
      continue;
    }
    if (typeof tokens[i] !== "number" && ARG_COUNTS[upper] > 0) {
      throw new Error(`Invalid path data "${d}": missing arguments for "${cmd}"`);
    }

    switch (upper) {
      case "M":
        path.moveTo(ox + next(), oy + next());
        lastCtrl = null;
        break;
      case "L":
        path.lineTo(ox + next(), oy + next());
        lastCtrl = null;
        break;
      case "H":
        path.lineTo(ox + next(), cy);
        lastCtrl = null;
        break;
      case "V":
        path.lineTo(cx, oy + next());
        lastCtrl = null;
        break;
      case "C": {
        const c1x = ox + next();
        const c1y = oy + next();
        const c2x = ox + next();
        const c2y = oy + next();
        const x = ox + next();
        const y = oy + next();
        path.cubeTo(c1x, c1y, c2x, c2y, x, y);
        lastCtrl = { x: c2x, y: c2y, kind: "C" };
        break;
      }
      case "S": {
        const c1 = lastCtrl?.kind === "C" ? { x: 2 * cx - lastCtrl.x, y: 2 * cy - lastCtrl.y } : { x: cx, y: cy };
        const c2x = ox + next();
        const c2y = oy + next();
        const x = ox + next();
        const y = oy + next();
        path.cubeTo(c1.x, c1.y, c2x, c2y, x, y);
        lastCtrl = { x: c2x, y: c2y, kind: "C" };
        break;
      }
      case "Q": {
        const qx = ox + next();
        const qy = oy + next();
        const x = ox + next();
        const y = oy + next();
        path.quadTo(qx, qy, x, y);
        lastCtrl = { x: qx, y: qy, kind: "Q" };
        break;
      }
      case "T": {
        const q: Point = lastCtrl?.kind === "Q" ? { x: 2 * cx - lastCtrl.x, y: 2 * cy - lastCtrl.y } : { x: cx, y: cy };
        const x = ox + next();
        const y = oy + next();
        path.quadTo(q.x, q.y, x, y);
        lastCtrl = { x: q.x, y: q.y, kind: "Q" };
        break;
      }
      case "A": {
        const rx = next();
        const ry = next();
        const rot = next();
        const large = flag();
        const sweep = flag();
        path.arcTo(rx, ry, rot, large, sweep, ox + next(), oy + next());
        lastCtrl = null;
        break;
      }
    }
  }

  return path;
}

function tokenize(d: string): (string | number)[] {
  const tokens: (string | number)[] = [];
  for (const match of d.matchAll(TOKEN)) {
    if (match[1] !== undefined) {
      tokens.push(match[1]);
    } else if (match[2] !== undefined) {
      tokens.push(parseFloat(match[2]));
    } else if (match[4] !== undefined) {
      throw new Error(`Invalid path data "${d}": unexpected character "${match[4]}"`);
    }
  }
  return tokens;
}
