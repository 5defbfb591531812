import { Buffer } from "node:buffer";
import type { Capper, Color, GapJoiner, MiterJoiner } from "@inkframe/core";
import { unsupportedStyle } from "@inkframe/core";
import type { OutputSink } from "../sink.js";
import { n, numList } from "../utils.js";

/** Page space is in points; user space is millimeters. */
const POINTS_PER_MM = 72 / 25.4;

/** PDF's own default miter limit. */
const PDF_DEFAULT_MITER_LIMIT = 10;

/**
 * Stand-in for an unbounded miter. PDF always clips at some limit; this
 * one is beyond any corner a flattened path produces in practice.
 */
export const UNBOUNDED_MITER_LIMIT = 10000;

export type PaintOperator = "f" | "f*" | "S" | "s" | "B" | "B*" | "b" | "b*";

/**
 * Minimal PDF 1.7 writer: one catalog, a page tree, and an uncompressed
 * content stream per page. Everything is buffered until `close()`.
 */
export class PdfWriter {
  private pages: PdfPageWriter[] = [];
  private closed = false;

  constructor(private sink: OutputSink) {}

  /** Start a page of `width` x `height` millimeters. */
  newPage(width: number, height: number): PdfPageWriter {
    const page = new PdfPageWriter(width, height);
    this.pages.push(page);
    return page;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;

    // object numbers: 1 catalog, 2 page tree, then (page, contents) pairs
    const objects: string[] = [];
    const pageRefs = this.pages.map((_, i) => `${3 + i * 2} 0 R`);
    objects.push("<< /Type /Catalog /Pages 2 0 R >>");
    objects.push(`<< /Type /Pages /Kids [${pageRefs.join(" ")}] /Count ${this.pages.length} >>`);
    this.pages.forEach((page, i) => {
      const contentsRef = `${4 + i * 2} 0 R`;
      objects.push(page.pageDictionary(contentsRef));
      const stream = page.contentStream();
      objects.push(
        `<< /Length ${Buffer.byteLength(stream, "latin1")} >>\nstream\n${stream}\nendstream`,
      );
    });

    let offset = 0;
    const emit = (text: string) => {
      this.sink.write(Buffer.from(text, "latin1"));
      offset += Buffer.byteLength(text, "latin1");
    };

    emit("%PDF-1.7\n");
    const offsets: number[] = [];
    objects.forEach((body, i) => {
      offsets.push(offset);
      emit(`${i + 1} 0 obj\n${body}\nendobj\n`);
    });

    const xref = offset;
    const entries = offsets.map((o) => `${String(o).padStart(10, "0")} 00000 n \n`);
    emit(`xref\n0 ${objects.length + 1}\n0000000000 65535 f \n${entries.join("")}`);
    emit(`trailer\n<< /Size ${objects.length + 1} /Root 1 0 R >>\nstartxref\n${xref}\n%%EOF\n`);
  }
}

/**
 * Graphics-state tracking content stream for one page. User space is
 * millimeters (Y-up); the page matrix maps it to points.
 * Setters only emit an operator when the value changes.
 */
export class PdfPageWriter {
  private ops: string[] = [];
  private extGStates = new Map<string, string>();

  private fill: Color = { r: 0, g: 0, b: 0, a: 255 };
  private stroke: Color = { r: 0, g: 0, b: 0, a: 255 };
  private lineWidth = 1;
  private lineCap = 0;
  private lineJoin = 0;
  private miterLimit = PDF_DEFAULT_MITER_LIMIT;
  private dashOffset = 0;
  private dashes: readonly number[] = [];

  constructor(
    readonly width: number,
    readonly height: number,
  ) {
    this.ops.push(`${n(POINTS_PER_MM)} 0 0 ${n(POINTS_PER_MM)} 0 0 cm`);
  }

  setFillColor(color: Color): void {
    if (!sameRgb(color, this.fill)) {
      this.ops.push(`${rgb(color)} rg`);
    }
    if (color.a !== this.fill.a) {
      this.ops.push(`/${this.alphaState("Fa", "ca", color.a)} gs`);
    }
    this.fill = color;
  }

  setStrokeColor(color: Color): void {
    if (!sameRgb(color, this.stroke)) {
      this.ops.push(`${rgb(color)} RG`);
    }
    if (color.a !== this.stroke.a) {
      this.ops.push(`/${this.alphaState("Sa", "CA", color.a)} gs`);
    }
    this.stroke = color;
  }

  setLineWidth(width: number): void {
    if (width === this.lineWidth) return;
    this.ops.push(`${n(width)} w`);
    this.lineWidth = width;
  }

  setLineCap(capper: Capper): void {
    const style = lineCapStyle(capper);
    if (style === this.lineCap) return;
    this.ops.push(`${style} J`);
    this.lineCap = style;
  }

  /**
   * Only joins PDF renders natively are accepted. A miter's limit is passed
   * through as the PDF miter limit and beyond it PDF bevels.
   */
  setLineJoin(joiner: MiterJoiner | GapJoiner): void {
    let style: number;
    switch (joiner.kind) {
      case "miter": {
        style = 0;
        const limit = Number.isNaN(joiner.limit) ? UNBOUNDED_MITER_LIMIT : joiner.limit;
        if (limit !== this.miterLimit) {
          this.ops.push(`${n(limit)} M`);
          this.miterLimit = limit;
        }
        break;
      }
      case "round":
        style = 1;
        break;
      case "bevel":
        style = 2;
        break;
      default:
        return unsupportedStyle(joiner, "PDF line join");
    }
    if (style === this.lineJoin) return;
    this.ops.push(`${style} j`);
    this.lineJoin = style;
  }

  setDashes(offset: number, dashes: readonly number[]): void {
    if (offset === this.dashOffset && sameNumbers(dashes, this.dashes)) return;
    this.ops.push(`[${numList(dashes)}] ${n(offset)} d`);
    this.dashOffset = offset;
    this.dashes = [...dashes];
  }

  /** Append path construction operators followed by a painting operator. */
  paint(pathData: string, op: PaintOperator): void {
    this.ops.push(`${pathData} ${op}`);
  }

  pageDictionary(contentsRef: string): string {
    const mediaBox = `[0 0 ${n(this.width * POINTS_PER_MM)} ${n(this.height * POINTS_PER_MM)}]`;
    let resources = "<< >>";
    if (this.extGStates.size > 0) {
      const states = [...this.extGStates].map(([name, dict]) => `/${name} ${dict}`).join(" ");
      resources = `<< /ExtGState << ${states} >> >>`;
    }
    return `<< /Type /Page /Parent 2 0 R /MediaBox ${mediaBox} /Resources ${resources} /Contents ${contentsRef} >>`;
  }

  contentStream(): string {
    return this.ops.join("\n");
  }

  private alphaState(prefix: string, key: "ca" | "CA", alpha: number): string {
    const name = `${prefix}${alpha}`;
    if (!this.extGStates.has(name)) {
      this.extGStates.set(name, `<< /Type /ExtGState /${key} ${n(alpha / 255)} >>`);
    }
    return name;
  }
}

function lineCapStyle(capper: Capper): number {
  switch (capper.kind) {
    case "butt":
      return 0;
    case "round":
      return 1;
    case "square":
      return 2;
    default:
      return unsupportedStyle(capper, "PDF line cap");
  }
}

function rgb(color: Color): string {
  return `${n(color.r / 255)} ${n(color.g / 255)} ${n(color.b / 255)}`;
}

function sameRgb(a: Color, b: Color): boolean {
  return a.r === b.r && a.g === b.g && a.b === b.b;
}

function sameNumbers(a: readonly number[], b: readonly number[]): boolean {
  return a.length === b.length && a.every((v, i) => v === b[i]);
}
