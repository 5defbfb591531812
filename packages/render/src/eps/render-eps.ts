import type { Canvas, DrawState, Path, TextLayer } from "@inkframe/core";
import { fillActive, outlineStroke } from "@inkframe/core";
import { renderLayers, textLayerPaths } from "../drawing-context.js";
import type { DrawingContext } from "../drawing-context.js";
import { BufferSink } from "../sink.js";
import type { OutputSink } from "../sink.js";
import { EpsWriter } from "./eps-writer.js";

/**
 * EPS implementation of DrawingContext. Everything is painted as filled
 * geometry: strokes are outlined first and filled in the stroke color.
 * Alpha is dropped, except that a fully transparent paint is skipped.
 */
export class EpsDrawingContext implements DrawingContext {
  constructor(private eps: EpsWriter) {}

  drawPath(path: Path, state: DrawState): void {
    if (fillActive(state)) {
      this.eps.setColor(state.fill);
      this.eps.fill(path.toPs(), state.fillRule === "evenodd");
    }
    const outline = outlineStroke(path, state);
    if (outline !== null && !outline.empty()) {
      this.eps.setColor(state.stroke);
      this.eps.fill(outline.toPs());
    }
  }

  drawText(layer: TextLayer): void {
    for (const { path, state } of textLayerPaths(layer)) {
      this.drawPath(path, state);
    }
  }
}

export function writeEps(canvas: Canvas, sink: OutputSink): void {
  const eps = new EpsWriter(sink, canvas.width, canvas.height);
  renderLayers(canvas, new EpsDrawingContext(eps));
  eps.close();
}

export function renderEps(canvas: Canvas): string {
  const sink = new BufferSink();
  writeEps(canvas, sink);
  return sink.toString();
}
