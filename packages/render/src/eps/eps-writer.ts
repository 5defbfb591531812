import type { Color } from "@inkframe/core";
import type { OutputSink } from "../sink.js";
import { n } from "../utils.js";

/** Page space is in points; user space is millimeters. */
const POINTS_PER_MM = 72 / 25.4;

/**
 * Encapsulated PostScript writer. Coordinates are millimeters (Y-up);
 * the prologue scales them to points. EPS has no transparency.
 */
export class EpsWriter {
  private color: Color | null = null;

  constructor(
    private sink: OutputSink,
    width: number,
    height: number,
  ) {
    const w = width * POINTS_PER_MM;
    const h = height * POINTS_PER_MM;
    this.sink.write(
      [
        "%!PS-Adobe-3.0 EPSF-3.0",
        "%%Creator: inkframe",
        `%%BoundingBox: 0 0 ${Math.ceil(w)} ${Math.ceil(h)}`,
        `%%HiResBoundingBox: 0 0 ${n(w)} ${n(h)}`,
        "%%EndComments",
        `${n(POINTS_PER_MM)} ${n(POINTS_PER_MM)} scale`,
      ].join("\n") + "\n",
    );
  }

  setColor(color: Color): void {
    if (this.color !== null && sameRgb(this.color, color)) return;
    this.sink.write(`${n(color.r / 255)} ${n(color.g / 255)} ${n(color.b / 255)} setrgbcolor\n`);
    this.color = color;
  }

  fill(pathData: string, evenOdd = false): void {
    this.sink.write(`${pathData} ${evenOdd ? "eofill" : "fill"}\n`);
  }

  close(): void {
    this.sink.write("showpage\n%%EOF\n");
  }
}

function sameRgb(a: Color, b: Color): boolean {
  return a.r === b.r && a.g === b.g && a.b === b.b;
}
