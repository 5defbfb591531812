import type { Canvas, DrawState, Path, TextLayer } from "@inkframe/core";
import { DEFAULT_DRAW_STATE, fillActive, strokeActive } from "@inkframe/core";

/**
 * Abstract drawing interface for recorded layers.
 * Enables multiple output backends (SVG, PDF, EPS, raster) from the same
 * layer walk.
 */
export interface DrawingContext {
  /** Paint one path with a frozen style. Called only when fill or stroke is active. */
  drawPath(path: Path, state: DrawState): void;
  drawText(layer: TextLayer): void;
}

/**
 * Walk the canvas layers in stack order (painter's algorithm).
 * Layers that would paint nothing are skipped before reaching the context.
 */
export function renderLayers(canvas: Canvas, dc: DrawingContext): void {
  for (const layer of canvas.layers) {
    switch (layer.kind) {
      case "path":
        if (fillActive(layer.state) || strokeActive(layer.state)) {
          dc.drawPath(layer.path, layer.state);
        }
        break;
      case "text":
        dc.drawText(layer);
        break;
      default:
        throw new Error(`Unknown layer kind: ${JSON.stringify(layer satisfies never)}`);
    }
  }
}

/**
 * Decompose a text layer into filled outlines: each glyph path is rotated
 * about the text origin, moved to the layer position and filled with its
 * color and the default (inactive) stroke.
 */
export function textLayerPaths(layer: TextLayer): { path: Path; state: DrawState }[] {
  const { paths, colors } = layer.text.toPaths();
  const result: { path: Path; state: DrawState }[] = [];
  paths.forEach((path, i) => {
    const placed = path.rotate(layer.rotation).translate(layer.x, layer.y);
    const state: DrawState = { ...DEFAULT_DRAW_STATE, fill: colors[i] };
    if (!placed.empty() && fillActive(state)) {
      result.push({ path: placed, state });
    }
  });
  return result;
}
