import { Buffer } from "node:buffer";
import { buildCanvas, parseScene } from "@inkframe/core";
import { describe, expect, it } from "vitest";
import { renderEps } from "../src/eps/render-eps.js";
import { renderPdf } from "../src/pdf/render-pdf.js";
import { pixelAt } from "../src/raster/image.js";
import { renderRaster } from "../src/raster/render-raster.js";
import { renderSvg } from "../src/svg/render-svg.js";

const SCENE_YAML = `
version: "0.1"
title: Badge
canvas:
  width: 20mm
  height: 1cm
draw:
  - fill: "#00ff00"
    shape: { type: rect, width: 20, height: 10 }
  - x: 5
    y: 5
    fill: none
    stroke: "#0000ff"
    stroke_width: 2
    cap: round
    path: M0 0 L10 0
`;

describe("end-to-end rendering", () => {
  const canvas = buildCanvas(parseScene(SCENE_YAML));

  it("builds the layers in statement order", () => {
    expect(canvas.width).toBe(20);
    expect(canvas.height).toBe(10);
    expect(canvas.layers.map((l) => l.kind)).toEqual(["path", "path"]);
  });

  it("renders SVG", () => {
    const svg = renderSvg(canvas);
    expect(svg.split("\n").slice(1, -1)).toEqual([
      '<path d="M0 10L20 10L20 0L0 0z" fill="#00ff00"/>',
      '<path d="M5 5L15 5" stroke="#0000ff" stroke-width="2" stroke-linecap="round" fill="none"/>',
    ]);
  });

  it("renders PDF with a native stroke", () => {
    const pdf = Buffer.from(renderPdf(canvas)).toString("latin1");
    expect(pdf).toContain("0 0 m 20 0 l 20 10 l 0 10 l f");
    expect(pdf).toContain("1 J");
    expect(pdf).toContain("5 5 m 15 5 l S");
  });

  it("renders EPS with the stroke outlined", () => {
    const eps = renderEps(canvas);
    expect(eps).toContain("0 1 0 setrgbcolor\n0 0 moveto 20 0 lineto 20 10 lineto 0 10 lineto closepath fill\n");
    expect(eps).toContain("0 0 1 setrgbcolor\n");
  });

  it("renders pixels", () => {
    const image = renderRaster(canvas, { resolution: 1 });
    expect(image.width).toBe(20);
    expect(pixelAt(image, 0, 0)).toEqual({ r: 0, g: 255, b: 0, a: 255 });
    expect(pixelAt(image, 10, 4)).toEqual({ r: 0, g: 0, b: 255, a: 255 });
  });
});
