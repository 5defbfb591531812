import { describe, expect, it } from "vitest";
import type { Polyline } from "@inkframe/core";
import { Rasterizer } from "../src/raster/rasterizer.js";

function square(x0: number, y0: number, x1: number, y1: number): Polyline {
  return {
    points: [
      { x: x0, y: y0 },
      { x: x1, y: y0 },
      { x: x1, y: y1 },
      { x: x0, y: y1 },
    ],
    closed: true,
  };
}

const sum = (values: Float64Array) => values.reduce((a, b) => a + b, 0);

describe("Rasterizer", () => {
  it("fully covers pixels inside an aligned square", () => {
    const ras = new Rasterizer(4, 4);
    ras.addPolylines([square(1, 1, 3, 3)]);
    const cov = ras.coverage("nonzero");

    expect(cov[0]).toBe(0);
    expect(cov[1 * 4 + 1]).toBe(1);
    expect(cov[2 * 4 + 2]).toBe(1);
    expect(cov[3 * 4 + 3]).toBe(0);
    expect(sum(cov)).toBe(4);
  });

  it("gives partial coverage on pixel boundaries", () => {
    const ras = new Rasterizer(2, 1);
    ras.addPolylines([square(0, 0, 0.25, 1)]);
    expect([...ras.coverage("nonzero")]).toEqual([0.25, 0]);
  });

  it("integrates a triangle to its area", () => {
    const ras = new Rasterizer(4, 4);
    ras.addPolylines([
      {
        points: [
          { x: 0, y: 0 },
          { x: 4, y: 0 },
          { x: 0, y: 4 },
        ],
        closed: true,
      },
    ]);
    expect(sum(ras.coverage("nonzero"))).toBeCloseTo(8, 9);
  });

  it("applies the fill rule to overlapping polylines", () => {
    const nonzero = new Rasterizer(4, 4);
    nonzero.addPolylines([square(1, 1, 3, 3), square(1, 1, 3, 3)]);
    expect(nonzero.coverage("nonzero")[5]).toBe(1);

    const evenOdd = new Rasterizer(4, 4);
    evenOdd.addPolylines([square(1, 1, 3, 3), square(1, 1, 3, 3)]);
    expect(sum(evenOdd.coverage("evenodd"))).toBe(0);
  });

  it("clips geometry outside the image", () => {
    const ras = new Rasterizer(2, 2);
    ras.addPolylines([square(-5, -5, 10, 10)]);
    expect([...ras.coverage("nonzero")]).toEqual([1, 1, 1, 1]);
  });

  it("returns empty coverage without edges", () => {
    expect(sum(new Rasterizer(3, 3).coverage("nonzero"))).toBe(0);
  });
});
