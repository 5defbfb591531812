import { Buffer } from "node:buffer";
import { describe, expect, it } from "vitest";
import {
  arcsJoiner,
  BEVEL_JOINER,
  Canvas,
  miterJoiner,
  Path,
  rectangle,
  rgba,
  ROUND_JOINER,
  Text,
  TRANSPARENT,
} from "@inkframe/core";
import type { Joiner } from "@inkframe/core";
import { nativeJoiner, renderPdf } from "../src/pdf/render-pdf.js";

const RED = rgba(255, 0, 0);
const BLUE = rgba(0, 0, 255);
const PAINT_OPS = new Set(["f", "f*", "S", "s", "B", "B*", "b", "b*"]);

function pdfText(canvas: Canvas): string {
  return Buffer.from(renderPdf(canvas)).toString("latin1");
}

/** Operator lines of the page content stream. */
function contentLines(canvas: Canvas): string[] {
  const text = pdfText(canvas);
  const start = text.indexOf("stream\n") + "stream\n".length;
  const end = text.indexOf("\nendstream");
  return text.slice(start, end).split("\n");
}

function paintOps(canvas: Canvas): string[] {
  return contentLines(canvas)
    .map((line) => line.slice(line.lastIndexOf(" ") + 1))
    .filter((op) => PAINT_OPS.has(op));
}

// turns back sharply at (10, 0)
const spike = () => new Path().moveTo(0, 0).lineTo(10, 0).lineTo(0, 1);

function strokedCanvas(joiner: Joiner): Canvas {
  const canvas = new Canvas(20, 20);
  canvas.setFillColor(RED);
  canvas.setStrokeColor(BLUE);
  canvas.setStrokeJoiner(joiner);
  canvas.drawPath(0, 0, spike());
  return canvas;
}

describe("renderPdf document", () => {
  it("writes a single page in points", () => {
    const text = pdfText(new Canvas(100, 50));
    expect(text.startsWith("%PDF-1.7\n")).toBe(true);
    expect(text.endsWith("%%EOF\n")).toBe(true);
    expect(text).toContain("/MediaBox [0 0 283.4646 141.7323]");
    expect(text).toContain("/Count 1");
  });

  it("writes a cross-reference table with correct offsets", () => {
    const canvas = new Canvas(10, 10);
    canvas.drawPath(0, 0, rectangle(1, 1));
    const text = pdfText(canvas);

    const startxref = Number(/startxref\n(\d+)\n/.exec(text)?.[1]);
    expect(text.slice(startxref, startxref + 5)).toBe("xref\n");

    const offsets = [...text.matchAll(/^(\d{10}) 00000 n $/gm)].map((m) => Number(m[1]));
    expect(offsets).toHaveLength(4);
    offsets.forEach((offset, i) => {
      expect(text.slice(offset).startsWith(`${i + 1} 0 obj\n`)).toBe(true);
    });
  });

  it("scales the page from millimeters to points", () => {
    expect(contentLines(new Canvas(10, 10))).toEqual(["2.8346 0 0 2.8346 0 0 cm"]);
  });
});

describe("renderPdf layers", () => {
  it("fills and strokes natively with a close-and-paint operator", () => {
    const canvas = new Canvas(10, 10);
    canvas.setFillColor(RED);
    canvas.setStrokeColor(BLUE);
    canvas.setStrokeWidth(0.5);
    canvas.drawPath(0, 0, rectangle(10, 10));

    expect(contentLines(canvas)).toEqual([
      "2.8346 0 0 2.8346 0 0 cm",
      "1 0 0 rg",
      "0 0 1 RG",
      "0.5 w",
      "10000 M",
      "0 0 m 10 0 l 10 10 l 0 10 l b",
    ]);
  });

  it("uses the open-path operators for open paths", () => {
    const canvas = new Canvas(10, 10);
    canvas.setFillColor(TRANSPARENT);
    canvas.setStrokeColor(BLUE);
    canvas.setStrokeJoiner(BEVEL_JOINER);
    canvas.drawPath(0, 0, new Path().moveTo(0, 0).lineTo(5, 5));
    expect(contentLines(canvas).slice(1)).toEqual(["0 0 1 RG", "2 j", "0 0 m 5 5 l S"]);
  });

  it("marks even-odd fills", () => {
    const canvas = new Canvas(10, 10);
    canvas.setFillRule("evenodd");
    canvas.drawPath(0, 0, rectangle(1, 1));
    expect(paintOps(canvas)).toEqual(["f*"]);
  });

  it("keeps a single operator when the miter overflow falls back to bevel", () => {
    expect(paintOps(strokedCanvas(miterJoiner(2, BEVEL_JOINER)))).toEqual(["B"]);
    expect(contentLines(strokedCanvas(miterJoiner(2, BEVEL_JOINER)))).toContain("2 M");
  });

  it("splits fill and stroke outline when the miter overflow is not a bevel", () => {
    const lines = contentLines(strokedCanvas(miterJoiner(2, ROUND_JOINER)));
    expect(paintOps(strokedCanvas(miterJoiner(2, ROUND_JOINER)))).toEqual(["f", "f"]);
    // the outline is filled in the stroke color
    expect(lines.indexOf("0 0 1 rg")).toBeGreaterThan(lines.indexOf("1 0 0 rg"));
    expect(lines.some((line) => line.endsWith(" RG"))).toBe(false);
  });

  it("outlines arcs joins", () => {
    expect(paintOps(strokedCanvas(arcsJoiner()))).toEqual(["f", "f"]);
  });

  it("paints fill and stroke separately when their alphas differ", () => {
    const canvas = new Canvas(10, 10);
    canvas.setFillColor(rgba(255, 0, 0, 128));
    canvas.setStrokeColor(BLUE);
    canvas.drawPath(0, 0, rectangle(2, 2));

    const text = pdfText(canvas);
    expect(paintOps(canvas)).toEqual(["f", "s"]);
    expect(contentLines(canvas)).toContain("/Fa128 gs");
    expect(text).toContain("/ExtGState << /Fa128 << /Type /ExtGState /ca 0.502 >> >>");
  });

  it("sets stroke alpha through its own graphics state", () => {
    const canvas = new Canvas(10, 10);
    canvas.setFillColor(TRANSPARENT);
    canvas.setStrokeColor(rgba(0, 0, 255, 51));
    canvas.drawPath(0, 0, rectangle(2, 2));
    expect(pdfText(canvas)).toContain("/Sa51 << /Type /ExtGState /CA 0.2 >>");
  });

  it("writes a zero-sum dash pattern as a solid stroke", () => {
    const canvas = new Canvas(10, 10);
    canvas.setFillColor(TRANSPARENT);
    canvas.setStrokeColor(BLUE);
    canvas.setDashes(1, 2, 1);
    canvas.drawPath(0, 0, new Path().moveTo(0, 0).lineTo(5, 0));
    canvas.setDashes(0, 0, 0);
    canvas.drawPath(0, 5, new Path().moveTo(0, 0).lineTo(5, 0));

    const dashOps = contentLines(canvas).filter((line) => line.endsWith(" d"));
    expect(dashOps).toEqual(["[2 1] 1 d", "[] 0 d"]);
  });

  it("repeats an odd dash pattern", () => {
    const canvas = new Canvas(10, 10);
    canvas.setFillColor(TRANSPARENT);
    canvas.setStrokeColor(BLUE);
    canvas.setDashes(0, 3);
    canvas.drawPath(0, 0, new Path().moveTo(0, 0).lineTo(5, 0));
    expect(contentLines(canvas)).toContain("[3 3] 0 d");
  });

  it("decomposes text into filled outlines", () => {
    const font = { name: "F", mimeType: "font/ttf", data: new Uint8Array([0]) };
    const canvas = new Canvas(20, 20);
    canvas.drawText(5, 5, new Text([
      { content: "a", font, size: 2, color: RED, x: 0, y: 0, outline: rectangle(1, 1) },
    ]));
    expect(contentLines(canvas).slice(1)).toEqual(["1 0 0 rg", "5 5 m 6 5 l 6 6 l 5 6 l f"]);
  });
});

describe("nativeJoiner", () => {
  it("accepts joins PDF can draw", () => {
    expect(nativeJoiner(miterJoiner())).not.toBeNull();
    expect(nativeJoiner(miterJoiner(3, BEVEL_JOINER))).not.toBeNull();
    expect(nativeJoiner(ROUND_JOINER)).toBe(ROUND_JOINER);
  });

  it("rejects arcs and miters with a non-bevel overflow", () => {
    expect(nativeJoiner(arcsJoiner(4))).toBeNull();
    expect(nativeJoiner(miterJoiner(3, ROUND_JOINER))).toBeNull();
  });
});
