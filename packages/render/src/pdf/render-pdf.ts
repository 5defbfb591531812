import type { Canvas, DrawState, GapJoiner, Joiner, MiterJoiner, Path, TextLayer } from "@inkframe/core";
import { fillActive, normalizeDashes, outlineStroke, strokeActive } from "@inkframe/core";
import { renderLayers, textLayerPaths } from "../drawing-context.js";
import type { DrawingContext } from "../drawing-context.js";
import { BufferSink } from "../sink.js";
import type { OutputSink } from "../sink.js";
import { PdfWriter } from "./pdf-writer.js";
import type { PaintOperator, PdfPageWriter } from "./pdf-writer.js";

/**
 * PDF implementation of DrawingContext.
 *
 * A layer is painted with one native operator when PDF can express its
 * style. Otherwise fill and stroke become separate passes: when the joiner
 * has no PDF equivalent the stroke pass fills the stroke outline, and when
 * only the alphas differ it is a native stroke on its own.
 */
export class PdfDrawingContext implements DrawingContext {
  constructor(private page: PdfPageWriter) {}

  drawPath(path: Path, state: DrawState): void {
    const fill = fillActive(state);
    const stroke = strokeActive(state);
    if (!fill && !stroke) return;

    let data = path.toPdf();
    let closed = false;
    if (data.endsWith(" h")) {
      data = data.slice(0, -2);
      closed = true;
    }

    const joiner = nativeJoiner(state.joiner);
    const differentAlpha = fill && stroke && state.fill.a !== state.stroke.a;
    const evenOdd = state.fillRule === "evenodd";

    if (joiner === null || differentAlpha) {
      if (fill) {
        this.page.setFillColor(state.fill);
        this.page.paint(data, evenOdd ? "f*" : "f");
      }
      if (!stroke) return;
      if (joiner === null) {
        const outline = outlineStroke(path, state);
        if (outline === null || outline.empty()) return;
        // outlines overlap themselves at joins, so always non-zero
        this.page.setFillColor(state.stroke);
        this.page.paint(outline.toPdf(), "f");
      } else {
        this.setStrokeStyle(state, joiner);
        this.page.paint(data, closed ? "s" : "S");
      }
      return;
    }

    if (fill) this.page.setFillColor(state.fill);
    if (stroke) this.setStrokeStyle(state, joiner);

    let op: PaintOperator;
    if (fill && stroke) {
      op = closed ? (evenOdd ? "b*" : "b") : evenOdd ? "B*" : "B";
    } else if (fill) {
      op = evenOdd ? "f*" : "f";
    } else {
      op = closed ? "s" : "S";
    }
    this.page.paint(data, op);
  }

  drawText(layer: TextLayer): void {
    for (const { path, state } of textLayerPaths(layer)) {
      this.drawPath(path, state);
    }
  }

  private setStrokeStyle(state: DrawState, joiner: MiterJoiner | GapJoiner): void {
    this.page.setStrokeColor(state.stroke);
    this.page.setLineWidth(state.strokeWidth);
    this.page.setLineCap(state.capper);
    this.page.setLineJoin(joiner);
    const dashes = normalizeDashes(state.dashes);
    if (dashes === null) {
      this.page.setDashes(0, []);
    } else {
      this.page.setDashes(state.dashOffset, dashes);
    }
  }
}

/**
 * The joiner as PDF can render it, or null when the stroke has to be
 * outlined: arcs joins, and miters whose overflow is not a bevel.
 */
export function nativeJoiner(joiner: Joiner): MiterJoiner | GapJoiner | null {
  switch (joiner.kind) {
    case "arcs":
      return null;
    case "miter":
      if (!Number.isNaN(joiner.limit) && joiner.fallback.kind !== "bevel") return null;
      return joiner;
    default:
      return joiner;
  }
}

/** Write the canvas as a single-page PDF document. */
export function writePdf(canvas: Canvas, sink: OutputSink): void {
  const pdf = new PdfWriter(sink);
  const page = pdf.newPage(canvas.width, canvas.height);
  renderLayers(canvas, new PdfDrawingContext(page));
  pdf.close();
}

export function renderPdf(canvas: Canvas): Uint8Array {
  const sink = new BufferSink();
  writePdf(canvas, sink);
  return sink.toBytes();
}
