import type { FillRule, Polyline } from "@inkframe/core";

/** Sample lines per pixel row. A power of two keeps coverage sums exact. */
const SUBSAMPLES = 16;

interface Edge {
  x0: number;
  y0: number;
  x1: number;
  y1: number;
  /** +1 for downward edges, -1 for upward ones. */
  winding: number;
}

/**
 * Anti-aliased scan converter. Each pixel row is sampled on SUBSAMPLES
 * horizontal lines; along a line, inside spans contribute their exact
 * horizontal overlap with every pixel they touch.
 */
export class Rasterizer {
  private edges: Edge[] = [];

  constructor(
    readonly width: number,
    readonly height: number,
  ) {}

  /** Add polylines in device pixels. Every polyline is closed implicitly. */
  addPolylines(polylines: readonly Polyline[]): void {
    for (const pl of polylines) {
      const pts = pl.points;
      for (let i = 0; i < pts.length; i++) {
        const a = pts[i];
        const b = pts[(i + 1) % pts.length];
        if (a.y === b.y) continue;
        this.edges.push(
          a.y < b.y
            ? { x0: a.x, y0: a.y, x1: b.x, y1: b.y, winding: 1 }
            : { x0: b.x, y0: b.y, x1: a.x, y1: a.y, winding: -1 },
        );
      }
    }
  }

  /** Coverage in 0..1 for every pixel, row-major. */
  coverage(fillRule: FillRule): Float64Array {
    const out = new Float64Array(this.width * this.height);
    if (this.edges.length === 0) return out;

    const edges = [...this.edges].sort((a, b) => a.y0 - b.y0);
    const weight = 1 / SUBSAMPLES;
    const crossings: { x: number; winding: number }[] = [];
    let first = 0;

    for (let row = 0; row < this.height; row++) {
      while (first < edges.length && edges[first].y1 <= row) first++;
      for (let s = 0; s < SUBSAMPLES; s++) {
        const sy = row + (s + 0.5) * weight;
        crossings.length = 0;
        for (let k = first; k < edges.length; k++) {
          const e = edges[k];
          if (e.y0 > sy) break;
          if (sy >= e.y1) continue;
          crossings.push({ x: e.x0 + ((sy - e.y0) * (e.x1 - e.x0)) / (e.y1 - e.y0), winding: e.winding });
        }
        if (crossings.length < 2) continue;
        crossings.sort((a, b) => a.x - b.x);

        let winding = 0;
        for (let c = 0; c < crossings.length - 1; c++) {
          winding += crossings[c].winding;
          const inside = fillRule === "evenodd" ? winding % 2 !== 0 : winding !== 0;
          if (inside) {
            this.addSpan(out, row, crossings[c].x, crossings[c + 1].x, weight);
          }
        }
      }
    }
    return out;
  }

  private addSpan(out: Float64Array, row: number, xa: number, xb: number, weight: number): void {
    const left = Math.max(0, xa);
    const right = Math.min(this.width, xb);
    if (right <= left) return;
    const base = row * this.width;
    const start = Math.floor(left);
    const end = Math.ceil(right);
    for (let x = start; x < end; x++) {
      const overlap = Math.min(right, x + 1) - Math.max(left, x);
      out[base + x] += overlap * weight;
    }
  }
}
