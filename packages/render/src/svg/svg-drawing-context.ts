import type { Capper, DrawState, Joiner, Path, TextLayer } from "@inkframe/core";
import {
  BLACK,
  colorEquals,
  fillActive,
  strokeActive,
  toCssColor,
  unsupportedStyle,
} from "@inkframe/core";
import type { DrawingContext } from "../drawing-context.js";
import { escapeXml, n, numList } from "../utils.js";

/** Miter limit SVG assumes when `stroke-miterlimit` is absent. */
const SVG_DEFAULT_MITER_LIMIT = 4;

/**
 * SVG implementation of DrawingContext.
 * Builds SVG elements as string output. Paths are reflected about the
 * horizontal midline on the way out, since SVG is Y-down.
 */
export class SvgDrawingContext implements DrawingContext {
  private parts: string[] = [];

  constructor(private height: number) {}

  drawPath(path: Path, state: DrawState): void {
    const d = path.scale(1, -1).translate(0, this.height).toSvg();
    this.parts.push(`<path d="${d}"${styleAttrs(state)}/>`);
  }

  drawText(layer: TextLayer): void {
    if (layer.text.spans.length === 0) return;
    let transform = `translate(${n(layer.x)},${n(this.height - layer.y)})`;
    if (layer.rotation !== 0) {
      transform += ` rotate(${n(-layer.rotation)})`;
    }
    const spans = layer.text.spans.map((span) => {
      const fill = colorEquals(span.color, BLACK) ? "" : ` fill="${toCssColor(span.color)}"`;
      return `<tspan x="${n(span.x)}" y="${n(-span.y)}" font-family="${escapeXml(span.font.name)}" font-size="${n(span.size)}"${fill}>${escapeXml(span.content)}</tspan>`;
    });
    this.parts.push(`<text transform="${transform}">${spans.join("")}</text>`);
  }

  getOutput(): string[] {
    return this.parts;
  }
}

function styleAttrs(state: DrawState): string {
  const attrs: string[] = [];
  if (strokeActive(state)) {
    attrs.push(`stroke="${toCssColor(state.stroke)}"`);
    if (state.strokeWidth !== 1) attrs.push(`stroke-width="${n(state.strokeWidth)}"`);
    const cap = lineCap(state.capper);
    if (cap !== null) attrs.push(`stroke-linecap="${cap}"`);
    attrs.push(...lineJoinAttrs(state.joiner));
    if (state.dashes.length > 0) {
      attrs.push(`stroke-dasharray="${numList(state.dashes)}"`);
      if (state.dashOffset > 0) attrs.push(`stroke-dashoffset="${n(state.dashOffset)}"`);
    }
  }
  if (!colorEquals(state.fill, BLACK)) {
    attrs.push(`fill="${fillActive(state) ? toCssColor(state.fill) : "none"}"`);
  }
  if (state.fillRule === "evenodd") attrs.push(`fill-rule="evenodd"`);
  return attrs.length > 0 ? " " + attrs.join(" ") : "";
}

/** `stroke-linecap` value, or null for butt (the SVG default). */
function lineCap(capper: Capper): string | null {
  switch (capper.kind) {
    case "butt":
      return null;
    case "round":
      return "round";
    case "square":
      return "square";
    default:
      return unsupportedStyle(capper, "Line cap");
  }
}

function lineJoinAttrs(joiner: Joiner): string[] {
  switch (joiner.kind) {
    case "round":
      return [`stroke-linejoin="round"`];
    case "bevel":
      return [`stroke-linejoin="bevel"`];
    case "miter":
      // unbounded is plain miter, the SVG default
      if (Number.isNaN(joiner.limit)) return [];
      return [`stroke-linejoin="miter-clip"`, ...miterLimitAttr(joiner.limit)];
    case "arcs":
      return [`stroke-linejoin="arcs"`, ...miterLimitAttr(joiner.limit)];
    default:
      return unsupportedStyle(joiner, "Line join");
  }
}

function miterLimitAttr(limit: number): string[] {
  if (Number.isNaN(limit) || limit === SVG_DEFAULT_MITER_LIMIT) return [];
  return [`stroke-miterlimit="${n(limit)}"`];
}
