import type { Canvas } from "@inkframe/core";
import { fontDataUri } from "@inkframe/core";
import { renderLayers } from "../drawing-context.js";
import { SvgDocument } from "./svg-document.js";
import { SvgDrawingContext } from "./svg-drawing-context.js";

export interface SvgRenderOptions {
  /** Fill color painted under all layers; none when null. */
  background?: string | null;
  /** Embed referenced fonts as data URIs in an `@font-face` block. */
  embedFonts?: boolean;
}

const DEFAULT_OPTIONS = {
  background: null,
  embedFonts: true,
} as const;

/**
 * Render a canvas as an SVG document. One `<path>` per visible path layer,
 * one `<text>` per text layer, in stack order.
 */
export function renderSvg(canvas: Canvas, options?: SvgRenderOptions): string {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const doc = new SvgDocument(canvas.width, canvas.height, opts.background ?? null);

  if (opts.embedFonts) {
    for (const font of canvas.fonts) {
      doc.addFontFace(font.name, fontDataUri(font));
    }
  }

  const dc = new SvgDrawingContext(canvas.height);
  renderLayers(canvas, dc);
  for (const el of dc.getOutput()) {
    doc.add(el);
  }

  return doc.toString();
}
