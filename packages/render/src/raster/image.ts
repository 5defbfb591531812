import { Buffer } from "node:buffer";
import type { Color } from "@inkframe/core";
import { rgba } from "@inkframe/core";

/** Straight (non-premultiplied) RGBA pixels, row-major from the top-left. */
export interface RgbaImage {
  width: number;
  height: number;
  data: Uint8Array;
}

export function createImage(width: number, height: number, background: Color): RgbaImage {
  const data = new Uint8Array(width * height * 4);
  for (let i = 0; i < data.length; i += 4) {
    data[i] = background.r;
    data[i + 1] = background.g;
    data[i + 2] = background.b;
    data[i + 3] = background.a;
  }
  return { width, height, data };
}

export function pixelAt(image: RgbaImage, x: number, y: number): Color {
  if (x < 0 || y < 0 || x >= image.width || y >= image.height) {
    throw new RangeError(`Pixel (${x}, ${y}) outside ${image.width}x${image.height} image`);
  }
  const i = (y * image.width + x) * 4;
  return rgba(image.data[i], image.data[i + 1], image.data[i + 2], image.data[i + 3]);
}

/**
 * Source-over composite `color` into the pixel at byte offset `i`, with
 * its alpha scaled by `coverage` (0..1).
 */
export function blendPixel(image: RgbaImage, i: number, color: Color, coverage: number): void {
  const sa = (color.a / 255) * coverage;
  if (sa <= 0) return;
  const d = image.data;
  const da = d[i + 3] / 255;
  const outA = sa + da * (1 - sa);
  const mix = (s: number, dst: number) => Math.round((s * sa + dst * da * (1 - sa)) / outA);
  d[i] = mix(color.r, d[i]);
  d[i + 1] = mix(color.g, d[i + 1]);
  d[i + 2] = mix(color.b, d[i + 2]);
  d[i + 3] = Math.round(outA * 255);
}

/**
 * Encode image to PAM format
 * Always outputs RGB_ALPHA format
 */
export function encodePam(image: RgbaImage): Uint8Array {
  const header = `${[
    "P7",
    `WIDTH ${image.width}`,
    `HEIGHT ${image.height}`,
    "DEPTH 4",
    "MAXVAL 255",
    "TUPLTYPE RGB_ALPHA",
    "ENDHDR",
  ].join("\n")}\n`;

  const headerBytes = Buffer.from(header, "ascii");
  const output = new Uint8Array(headerBytes.length + image.width * image.height * 4);
  output.set(headerBytes, 0);
  output.set(image.data, headerBytes.length);
  return output;
}
