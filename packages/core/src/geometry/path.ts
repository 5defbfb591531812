import type {
  ArcSegment,
  Matrix,
  PathSegment,
  Point,
  Polyline,
  Rect,
} from "../types/geometry.js";
import {
  arcToCenter,
  arcToCubics,
  flattenArc,
  flattenCubic,
  flattenQuad,
  quadToCubic,
} from "./curves.js";
import {
  applyMatrix,
  determinant,
  rotation,
  rotationAngle,
  scaling,
  similarityScale,
  translation,
} from "./matrix.js";

/** Default flattening tolerance, in millimeters. */
export const DEFAULT_TOLERANCE = 0.01;

/**
 * Ordered sequence of subpaths in a Y-up coordinate space.
 *
 * Builder methods (`moveTo`, `lineTo`, ...) append in place and return `this`.
 * Transforms (`translate`, `scale`, `rotate`, `transform`) never touch the
 * receiver: they return a new path, so the same path can be drawn at several
 * positions.
 */
export class Path {
  private segs: PathSegment[];
  private startX = 0;
  private startY = 0;
  private curX = 0;
  private curY = 0;

  constructor(segments: readonly PathSegment[] = []) {
    this.segs = [];
    for (const seg of segments) {
      this.push({ ...seg });
    }
  }

  get segments(): readonly PathSegment[] {
    return this.segs;
  }

  /** Current point (end of the last segment). */
  get position(): Point {
    return { x: this.curX, y: this.curY };
  }

  moveTo(x: number, y: number): this {
    return this.push({ type: "M", x, y });
  }

  lineTo(x: number, y: number): this {
    return this.push({ type: "L", x, y });
  }

  quadTo(cx: number, cy: number, x: number, y: number): this {
    return this.push({ type: "Q", cx, cy, x, y });
  }

  cubeTo(
    c1x: number,
    c1y: number,
    c2x: number,
    c2y: number,
    x: number,
    y: number,
  ): this {
    return this.push({ type: "C", c1x, c1y, c2x, c2y, x, y });
  }

  arcTo(
    rx: number,
    ry: number,
    rotationDeg: number,
    largeArc: boolean,
    sweep: boolean,
    x: number,
    y: number,
  ): this {
    return this.push({ type: "A", rx, ry, rotation: rotationDeg, largeArc, sweep, x, y });
  }

  close(): this {
    return this.push({ type: "Z" });
  }

  /** Append all subpaths of another path. */
  append(other: Path): this {
    for (const seg of other.segs) {
      this.push({ ...seg });
    }
    return this;
  }

  private push(seg: PathSegment): this {
    switch (seg.type) {
      case "M":
        // a trailing bare moveTo is replaced rather than kept
        if (this.segs.length > 0 && this.segs[this.segs.length - 1].type === "M") {
          this.segs.pop();
        }
        this.segs.push(seg);
        this.startX = this.curX = seg.x;
        this.startY = this.curY = seg.y;
        return this;
      case "Z": {
        const last = this.segs[this.segs.length - 1];
        if (last === undefined || last.type === "Z" || last.type === "M") {
          return this;
        }
        this.segs.push(seg);
        this.curX = this.startX;
        this.curY = this.startY;
        return this;
      }
      default: {
        const last = this.segs[this.segs.length - 1];
        if (last === undefined) {
          this.segs.push({ type: "M", x: 0, y: 0 });
        } else if (last.type === "Z") {
          this.segs.push({ type: "M", x: this.startX, y: this.startY });
        }
        this.segs.push(seg);
        this.curX = seg.x;
        this.curY = seg.y;
        return this;
      }
    }
  }

  /** True iff the path has no drawable segment. */
  empty(): boolean {
    return !this.segs.some((seg) => seg.type !== "M");
  }

  /** True iff the last subpath is explicitly closed. */
  closed(): boolean {
    const last = this.segs[this.segs.length - 1];
    return last !== undefined && last.type === "Z";
  }

  copy(): Path {
    return new Path(this.segs);
  }

  equals(other: Path, epsilon = 0): boolean {
    if (this.segs.length !== other.segs.length) return false;
    return this.segs.every((seg, i) => segmentEquals(seg, other.segs[i], epsilon));
  }

  /** Split into one path per subpath. */
  subpaths(): Path[] {
    const result: Path[] = [];
    let current: Path | null = null;
    for (const seg of this.segs) {
      if (seg.type === "M" || current === null) {
        current = new Path();
        result.push(current);
      }
      current.push({ ...seg });
    }
    return result.filter((p) => !p.empty());
  }

  // ---- Transforms ----

  translate(tx: number, ty: number): Path {
    return this.transform(translation(tx, ty));
  }

  scale(sx: number, sy: number = sx): Path {
    return this.transform(scaling(sx, sy));
  }

  /** Counter-clockwise rotation in degrees about (cx, cy). */
  rotate(degrees: number, cx = 0, cy = 0): Path {
    return this.transform(rotation(degrees, cx, cy));
  }

  transform(m: Matrix): Path {
    const out = new Path();
    let x0 = 0;
    let y0 = 0;
    let sx = 0;
    let sy = 0;
    for (const seg of this.segs) {
      switch (seg.type) {
        case "M": {
          const p = applyMatrix(m, seg.x, seg.y);
          out.moveTo(p.x, p.y);
          sx = seg.x;
          sy = seg.y;
          break;
        }
        case "L": {
          const p = applyMatrix(m, seg.x, seg.y);
          out.lineTo(p.x, p.y);
          break;
        }
        case "Q": {
          const c = applyMatrix(m, seg.cx, seg.cy);
          const p = applyMatrix(m, seg.x, seg.y);
          out.quadTo(c.x, c.y, p.x, p.y);
          break;
        }
        case "C": {
          const c1 = applyMatrix(m, seg.c1x, seg.c1y);
          const c2 = applyMatrix(m, seg.c2x, seg.c2y);
          const p = applyMatrix(m, seg.x, seg.y);
          out.cubeTo(c1.x, c1.y, c2.x, c2.y, p.x, p.y);
          break;
        }
        case "A":
          transformArc(out, m, x0, y0, seg);
          break;
        case "Z":
          out.close();
          x0 = sx;
          y0 = sy;
          break;
      }
      if (seg.type !== "Z") {
        x0 = seg.x;
        y0 = seg.y;
      }
    }
    return out;
  }

  // ---- Measurement ----

  /** Polylines approximating every subpath within `tolerance`. */
  flatten(tolerance: number = DEFAULT_TOLERANCE): Polyline[] {
    const polylines: Polyline[] = [];
    let current: Polyline | null = null;
    let x0 = 0;
    let y0 = 0;

    for (const seg of this.segs) {
      if (seg.type === "M") {
        current = { points: [{ x: seg.x, y: seg.y }], closed: false };
        polylines.push(current);
        x0 = seg.x;
        y0 = seg.y;
        continue;
      }
      if (current === null) continue;
      if (seg.type === "Z") {
        current.closed = true;
        const first = current.points[0];
        const last = current.points[current.points.length - 1];
        if (current.points.length > 1 && first.x === last.x && first.y === last.y) {
          current.points.pop();
        }
        x0 = first.x;
        y0 = first.y;
        continue;
      }

      const p0 = { x: x0, y: y0 };
      const end = { x: seg.x, y: seg.y };
      let points: Point[] = [end];
      switch (seg.type) {
        case "Q":
          points = flattenQuad(p0, { x: seg.cx, y: seg.cy }, end, tolerance);
          break;
        case "C":
          points = flattenCubic(
            p0,
            { x: seg.c1x, y: seg.c1y },
            { x: seg.c2x, y: seg.c2y },
            end,
            tolerance,
          );
          break;
        case "A": {
          const arc = arcToCenter(
            x0, y0, seg.rx, seg.ry, seg.rotation, seg.largeArc, seg.sweep, seg.x, seg.y,
          );
          points = arc ? flattenArc(arc, tolerance) : [end];
          break;
        }
      }
      // snap to the exact endpoint
      points[points.length - 1] = end;
      current.points.push(...points);
      x0 = seg.x;
      y0 = seg.y;
    }

    return polylines.filter((pl) => pl.points.length > 1);
  }

  /** Bounding box of the flattened path, or null for an empty path. */
  bounds(tolerance: number = DEFAULT_TOLERANCE): Rect | null {
    let minX = Infinity;
    let minY = Infinity;
    let maxX = -Infinity;
    let maxY = -Infinity;
    for (const pl of this.flatten(tolerance)) {
      for (const p of pl.points) {
        minX = Math.min(minX, p.x);
        minY = Math.min(minY, p.y);
        maxX = Math.max(maxX, p.x);
        maxY = Math.max(maxY, p.y);
      }
    }
    if (minX === Infinity) return null;
    return { x: minX, y: minY, width: maxX - minX, height: maxY - minY };
  }

  /** Total arc length of the flattened path. */
  length(tolerance: number = DEFAULT_TOLERANCE): number {
    let total = 0;
    for (const pl of this.flatten(tolerance)) {
      const pts = pl.points;
      const count = pl.closed ? pts.length : pts.length - 1;
      for (let i = 0; i < count; i++) {
        const a = pts[i];
        const b = pts[(i + 1) % pts.length];
        total += Math.hypot(b.x - a.x, b.y - a.y);
      }
    }
    return total;
  }

  // ---- Serialization ----

  /** SVG path data, e.g. "M0 0L10 0L10 10z". */
  toSvg(): string {
    const parts: string[] = [];
    for (const seg of this.segs) {
      switch (seg.type) {
        case "M":
          parts.push(`M${num(seg.x)} ${num(seg.y)}`);
          break;
        case "L":
          parts.push(`L${num(seg.x)} ${num(seg.y)}`);
          break;
        case "Q":
          parts.push(`Q${num(seg.cx)} ${num(seg.cy)} ${num(seg.x)} ${num(seg.y)}`);
          break;
        case "C":
          parts.push(
            `C${num(seg.c1x)} ${num(seg.c1y)} ${num(seg.c2x)} ${num(seg.c2y)} ${num(seg.x)} ${num(seg.y)}`,
          );
          break;
        case "A":
          parts.push(
            `A${num(seg.rx)} ${num(seg.ry)} ${num(seg.rotation)} ${seg.largeArc ? 1 : 0} ${seg.sweep ? 1 : 0} ${num(seg.x)} ${num(seg.y)}`,
          );
          break;
        case "Z":
          parts.push("z");
          break;
      }
    }
    return parts.join("");
  }

  /** PDF content-stream path operators (m, l, c, h). */
  toPdf(): string {
    return this.toOperators({ move: "m", line: "l", cubic: "c", close: "h" });
  }

  /** PostScript path operators (moveto, lineto, curveto, closepath). */
  toPs(): string {
    return this.toOperators({
      move: "moveto",
      line: "lineto",
      cubic: "curveto",
      close: "closepath",
    });
  }

  private toOperators(ops: { move: string; line: string; cubic: string; close: string }): string {
    const parts: string[] = [];
    let x0 = 0;
    let y0 = 0;
    let sx = 0;
    let sy = 0;
    const cubic = (c1x: number, c1y: number, c2x: number, c2y: number, x: number, y: number) =>
      `${num(c1x)} ${num(c1y)} ${num(c2x)} ${num(c2y)} ${num(x)} ${num(y)} ${ops.cubic}`;

    for (const seg of this.segs) {
      switch (seg.type) {
        case "M":
          parts.push(`${num(seg.x)} ${num(seg.y)} ${ops.move}`);
          sx = seg.x;
          sy = seg.y;
          break;
        case "L":
          parts.push(`${num(seg.x)} ${num(seg.y)} ${ops.line}`);
          break;
        case "Q": {
          const c = quadToCubic(x0, y0, seg.cx, seg.cy, seg.x, seg.y);
          parts.push(cubic(c.c1x, c.c1y, c.c2x, c.c2y, c.x, c.y));
          break;
        }
        case "C":
          parts.push(cubic(seg.c1x, seg.c1y, seg.c2x, seg.c2y, seg.x, seg.y));
          break;
        case "A": {
          const arc = arcToCenter(
            x0, y0, seg.rx, seg.ry, seg.rotation, seg.largeArc, seg.sweep, seg.x, seg.y,
          );
          if (arc === null) {
            parts.push(`${num(seg.x)} ${num(seg.y)} ${ops.line}`);
          } else {
            for (const c of arcToCubics(arc)) {
              parts.push(cubic(c.c1x, c.c1y, c.c2x, c.c2y, c.x, c.y));
            }
          }
          break;
        }
        case "Z":
          parts.push(ops.close);
          x0 = sx;
          y0 = sy;
          break;
      }
      if (seg.type !== "Z") {
        x0 = seg.x;
        y0 = seg.y;
      }
    }
    return parts.join(" ");
  }
}

function transformArc(out: Path, m: Matrix, x0: number, y0: number, seg: ArcSegment): void {
  const end = applyMatrix(m, seg.x, seg.y);
  const flip = determinant(m) < 0;
  const scale = similarityScale(m);

  if (scale !== null) {
    // a reflection mirrors the axis angle before the matrix rotation applies
    const turn = rotationAngle(m);
    const angle = flip ? turn - seg.rotation : seg.rotation + turn;
    out.arcTo(seg.rx * scale, seg.ry * scale, angle, seg.largeArc, seg.sweep !== flip, end.x, end.y);
    return;
  }

  const axisAligned = m[1] === 0 && m[2] === 0;
  const quarter = ((seg.rotation % 180) + 180) % 180;
  if (axisAligned && (quarter === 0 || quarter === 90)) {
    const [fx, fy] = quarter === 0 ? [m[0], m[3]] : [m[3], m[0]];
    out.arcTo(
      seg.rx * Math.abs(fx),
      seg.ry * Math.abs(fy),
      seg.rotation,
      seg.largeArc,
      seg.sweep !== flip,
      end.x,
      end.y,
    );
    return;
  }

  const arc = arcToCenter(
    x0, y0, seg.rx, seg.ry, seg.rotation, seg.largeArc, seg.sweep, seg.x, seg.y,
  );
  if (arc === null) {
    out.lineTo(end.x, end.y);
    return;
  }
  for (const c of arcToCubics(arc)) {
    const c1 = applyMatrix(m, c.c1x, c.c1y);
    const c2 = applyMatrix(m, c.c2x, c.c2y);
    const p = applyMatrix(m, c.x, c.y);
    out.cubeTo(c1.x, c1.y, c2.x, c2.y, p.x, p.y);
  }
}

function segmentEquals(a: PathSegment, b: PathSegment, epsilon: number): boolean {
  if (a.type !== b.type) return false;
  const other = new Map<string, unknown>(Object.entries(b));
  return Object.entries(a).every(([key, v]) => {
    const w = other.get(key);
    if (typeof v === "number" && typeof w === "number") {
      return Math.abs(v - w) <= epsilon;
    }
    return v === w;
  });
}

/** Compact number formatting for path data: at most 4 decimals, no "-0". */
export function num(value: number): string {
  const rounded = Number(value.toFixed(4));
  return rounded === 0 ? "0" : rounded.toString();
}
