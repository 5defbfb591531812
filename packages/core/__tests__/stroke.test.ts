import { describe, expect, it } from "vitest";
import { Path } from "../src/geometry/path.js";
import { rectangle } from "../src/geometry/shapes.js";
import { rgba } from "../src/style/color.js";
import {
  BEVEL_JOINER,
  BUTT_CAPPER,
  DEFAULT_DRAW_STATE,
  miterJoiner,
  ROUND_CAPPER,
  ROUND_JOINER,
  SQUARE_CAPPER,
} from "../src/style/draw-state.js";
import { outlineStroke, strokePath } from "../src/stroke/stroke.js";

const line = () => new Path().moveTo(0, 0).lineTo(10, 0);
// turns back sharply at (10, 0): miter ratio about 20
const spike = () => new Path().moveTo(0, 0).lineTo(10, 0).lineTo(0, 1);

function expectBounds(path: Path, x: number, y: number, width: number, height: number): void {
  const b = path.bounds();
  expect(b).not.toBeNull();
  if (b === null) return;
  expect(b.x).toBeCloseTo(x, 6);
  expect(b.y).toBeCloseTo(y, 6);
  expect(b.width).toBeCloseTo(width, 6);
  expect(b.height).toBeCloseTo(height, 6);
}

describe("strokePath caps", () => {
  it("butt caps end flush with the path", () => {
    expectBounds(strokePath(line(), 2, BUTT_CAPPER, BEVEL_JOINER), 0, -1, 10, 2);
  });

  it("square caps extend by half the width", () => {
    expectBounds(strokePath(line(), 2, SQUARE_CAPPER, BEVEL_JOINER), -1, -1, 12, 2);
  });

  it("round caps extend by half the width", () => {
    expectBounds(strokePath(line(), 2, ROUND_CAPPER, BEVEL_JOINER), -1, -1, 12, 2);
  });

  it("produces a single closed contour for an open path", () => {
    const outline = strokePath(line(), 2, BUTT_CAPPER, BEVEL_JOINER);
    expect(outline.subpaths()).toHaveLength(1);
    expect(outline.closed()).toBe(true);
  });

  it("draws a dot for a zero-length run with round caps", () => {
    const point = new Path().moveTo(5, 5).lineTo(5, 5);
    expectBounds(strokePath(point, 2, ROUND_CAPPER, BEVEL_JOINER), 4, 4, 2, 2);
    expect(strokePath(point, 2, BUTT_CAPPER, BEVEL_JOINER).empty()).toBe(true);
  });
});

describe("strokePath joins", () => {
  it("produces two contours for a closed path", () => {
    const outline = strokePath(rectangle(10, 10), 2, BUTT_CAPPER, miterJoiner());
    expect(outline.subpaths()).toHaveLength(2);
    expectBounds(outline, -1, -1, 12, 12);
  });

  it("extends an unbounded miter to the spike tip", () => {
    const b = strokePath(spike(), 1, BUTT_CAPPER, miterJoiner()).bounds();
    // the butt end at (0, 1) sits slightly left of the origin
    expect(b?.x).toBeCloseTo(-0.5 / Math.sqrt(101), 6);
    expect((b?.x ?? 0) + (b?.width ?? 0)).toBeGreaterThan(19);
  });

  it("falls back to a bevel beyond the miter limit", () => {
    const b = strokePath(spike(), 1, BUTT_CAPPER, miterJoiner(4, BEVEL_JOINER)).bounds();
    expect((b?.x ?? 0) + (b?.width ?? 0)).toBeCloseTo(10 + 0.5 / Math.sqrt(101), 6);
  });

  it("keeps the miter within the limit", () => {
    const outline = strokePath(rectangle(10, 10), 2, BUTT_CAPPER, miterJoiner(1.5, BEVEL_JOINER));
    // 90° corners have a miter ratio of √2
    expect(outline.toSvg()).toContain("L11 -1");
  });

  it("rounds corners with a round joiner", () => {
    const outline = strokePath(spike(), 1, BUTT_CAPPER, ROUND_JOINER);
    expect(outline.segments.some((s) => s.type === "A")).toBe(true);
    const b = outline.bounds();
    expect((b?.x ?? 0) + (b?.width ?? 0)).toBeCloseTo(10.5, 1);
  });

  it("returns an empty path for a non-positive width", () => {
    expect(strokePath(line(), 0, BUTT_CAPPER, BEVEL_JOINER).empty()).toBe(true);
    expect(strokePath(line(), -1, BUTT_CAPPER, BEVEL_JOINER).empty()).toBe(true);
  });
});

describe("outlineStroke", () => {
  const stroked = { ...DEFAULT_DRAW_STATE, stroke: rgba(0, 0, 255), strokeWidth: 2 };

  it("is null when the stroke is inactive", () => {
    expect(outlineStroke(line(), DEFAULT_DRAW_STATE)).toBeNull();
    expect(outlineStroke(line(), { ...stroked, strokeWidth: 0 })).toBeNull();
  });

  it("outlines each dash separately", () => {
    const outline = outlineStroke(line(), { ...stroked, dashes: [4, 2] });
    expect(outline?.subpaths()).toHaveLength(2);
  });
});
