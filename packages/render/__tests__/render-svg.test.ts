import { describe, expect, it } from "vitest";
import {
  BEVEL_JOINER,
  Canvas,
  circle,
  miterJoiner,
  rectangle,
  rgba,
  ROUND_CAPPER,
  ROUND_JOINER,
  Text,
  TRANSPARENT,
  UnsupportedStyleError,
} from "@inkframe/core";
import type { Capper, FontResource } from "@inkframe/core";
import { renderSvg } from "../src/svg/render-svg.js";

const HEADER_10 =
  '<svg xmlns="http://www.w3.org/2000/svg" version="1.1" shape-rendering="geometricPrecision" width="10" height="10" viewBox="0 0 10 10">';

/** Lines between the header and the closing tag. */
function body(svg: string): string[] {
  const lines = svg.split("\n");
  return lines.slice(1, -1);
}

describe("renderSvg", () => {
  it("flips a filled rectangle into SVG coordinates", () => {
    const canvas = new Canvas(10, 10);
    canvas.setFillColor(rgba(255, 0, 0));
    canvas.drawPath(0, 0, rectangle(10, 10));

    expect(renderSvg(canvas)).toBe(
      `${HEADER_10}\n<path d="M0 10L10 10L10 0L0 0z" fill="#ff0000"/>\n</svg>`,
    );
  });

  it("omits the default black fill and flips arc sweeps", () => {
    const canvas = new Canvas(10, 10);
    canvas.drawPath(5, 5, circle(5));
    expect(body(renderSvg(canvas))).toEqual([
      '<path d="M10 5A5 5 0 0 0 0 5A5 5 0 0 0 10 5z"/>',
    ]);
  });

  it("emits stroke presentation attributes", () => {
    const canvas = new Canvas(10, 10);
    canvas.setFillColor(TRANSPARENT);
    canvas.setStrokeColor(rgba(0, 0, 255));
    canvas.setStrokeWidth(2);
    canvas.setStrokeCapper(ROUND_CAPPER);
    canvas.setStrokeJoiner(miterJoiner(2));
    canvas.setDashes(0.5, 1, 2);
    canvas.setFillRule("evenodd");
    canvas.drawPath(0, 0, rectangle(4, 4));

    expect(body(renderSvg(canvas))).toEqual([
      '<path d="M0 10L4 10L4 6L0 6z" stroke="#0000ff" stroke-width="2" stroke-linecap="round" stroke-linejoin="miter-clip" stroke-miterlimit="2" stroke-dasharray="1 2" stroke-dashoffset="0.5" fill="none" fill-rule="evenodd"/>',
    ]);
  });

  it("maps each joiner to its linejoin", () => {
    const joins = [
      [miterJoiner(), ""],
      [miterJoiner(4), ' stroke-linejoin="miter-clip"'],
      [ROUND_JOINER, ' stroke-linejoin="round"'],
      [BEVEL_JOINER, ' stroke-linejoin="bevel"'],
    ] as const;
    for (const [joiner, attrs] of joins) {
      const canvas = new Canvas(10, 10);
      canvas.setStrokeColor(rgba(0, 0, 0));
      canvas.setStrokeJoiner(joiner);
      canvas.drawPath(0, 0, rectangle(1, 1));
      expect(body(renderSvg(canvas))).toEqual([
        `<path d="M0 10L1 10L1 9L0 9z" stroke="#000000"${attrs}/>`,
      ]);
    }
  });

  it("leaves out the dash offset when it is zero", () => {
    const canvas = new Canvas(10, 10);
    canvas.setStrokeColor(rgba(0, 0, 0));
    canvas.setDashes(0, 3);
    canvas.drawPath(0, 0, rectangle(1, 1));
    expect(renderSvg(canvas)).toContain(' stroke-dasharray="3"/>');
  });

  it("skips layers that paint nothing", () => {
    const canvas = new Canvas(10, 10);
    canvas.setFillColor(TRANSPARENT);
    canvas.drawPath(0, 0, rectangle(1, 1));
    canvas.setStrokeColor(rgba(0, 0, 0));
    canvas.setStrokeWidth(0);
    canvas.drawPath(0, 0, rectangle(1, 1));
    expect(renderSvg(canvas)).toBe(`${HEADER_10}\n</svg>`);
  });

  it("writes layers in stack order", () => {
    const canvas = new Canvas(10, 10);
    canvas.setFillColor(rgba(255, 0, 0));
    canvas.drawPath(0, 0, rectangle(1, 1));
    canvas.setFillColor(rgba(0, 128, 0, 128));
    canvas.drawPath(0, 0, rectangle(1, 1));
    expect(body(renderSvg(canvas))).toEqual([
      '<path d="M0 10L1 10L1 9L0 9z" fill="#ff0000"/>',
      '<path d="M0 10L1 10L1 9L0 9z" fill="rgba(0,128,0,0.502)"/>',
    ]);
  });

  it("paints an optional background", () => {
    const canvas = new Canvas(10, 10);
    expect(renderSvg(canvas, { background: "white" })).toBe(
      `${HEADER_10}\n<rect width="10" height="10" fill="white"/>\n</svg>`,
    );
  });

  it("embeds fonts once and writes text spans", () => {
    const font: FontResource = { name: "Test Sans", mimeType: "font/woff2", data: new Uint8Array([1, 2, 3]) };
    const span = {
      content: "Hi & bye",
      font,
      size: 4,
      color: rgba(0, 0, 0),
      x: 0,
      y: 0,
      outline: rectangle(1, 1),
    };
    const canvas = new Canvas(50, 50);
    canvas.drawText(10, 20, new Text([span]));
    canvas.drawText(10, 20, new Text([{ ...span, content: "up", color: rgba(255, 0, 0), y: 5 }]), 45);

    const lines = renderSvg(canvas).split("\n");
    expect(lines.slice(1, 4)).toEqual([
      "<defs><style>",
      "@font-face{font-family:'Test Sans';src:url('data:font/woff2;base64,AQID');}",
      "</style></defs>",
    ]);
    expect(lines.slice(4, 6)).toEqual([
      '<text transform="translate(10,30)"><tspan x="0" y="0" font-family="Test Sans" font-size="4">Hi &amp; bye</tspan></text>',
      '<text transform="translate(10,30) rotate(-45)"><tspan x="0" y="-5" font-family="Test Sans" font-size="4" fill="#ff0000">up</tspan></text>',
    ]);
  });

  it("escapes font family names in the style block", () => {
    const font: FontResource = { name: "O'Brien & Co", mimeType: "font/ttf", data: new Uint8Array([0]) };
    const canvas = new Canvas(10, 10);
    canvas.drawText(0, 0, new Text([{ content: "x", font, size: 1, color: rgba(0, 0, 0), x: 0, y: 0, outline: rectangle(1, 1) }]));
    expect(renderSvg(canvas).split("\n")[2]).toBe(
      "@font-face{font-family:'O\\&apos;Brien &amp; Co';src:url('data:font/ttf;base64,AA==');}",
    );
  });

  it("can leave fonts out", () => {
    const font: FontResource = { name: "F", mimeType: "font/ttf", data: new Uint8Array([0]) };
    const canvas = new Canvas(10, 10);
    canvas.drawText(0, 0, new Text([{ content: "x", font, size: 1, color: rgba(0, 0, 0), x: 0, y: 0, outline: rectangle(1, 1) }]));
    expect(renderSvg(canvas, { embedFonts: false })).not.toContain("@font-face");
  });

  it("fails loudly on a cap outside the known set", () => {
    const bogus: Capper = JSON.parse('{"kind":"triangle"}');
    const canvas = new Canvas(10, 10);
    canvas.setStrokeColor(rgba(0, 0, 0));
    canvas.setStrokeCapper(bogus);
    canvas.drawPath(0, 0, rectangle(1, 1));
    expect(() => renderSvg(canvas)).toThrow(UnsupportedStyleError);
  });
});
