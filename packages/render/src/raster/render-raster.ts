import type { Canvas, Color, DrawState, FillRule, Matrix, Path, TextLayer } from "@inkframe/core";
import { fillActive, outlineStroke, WHITE } from "@inkframe/core";
import { renderLayers, textLayerPaths } from "../drawing-context.js";
import type { DrawingContext } from "../drawing-context.js";
import type { OutputSink } from "../sink.js";
import { blendPixel, createImage, encodePam } from "./image.js";
import type { RgbaImage } from "./image.js";
import { Rasterizer } from "./rasterizer.js";

export interface RasterRenderOptions {
  /** Pixels per millimeter; see `resolutionFromDpi`. */
  resolution: number;
  background?: Color;
}

/** Flattening tolerance in device pixels. */
const PIXEL_TOLERANCE = 0.1;

/**
 * Raster implementation of DrawingContext. Paths are mapped to device
 * pixels (top-left origin), scan converted and composited source-over;
 * the fill first, then the stroke outline.
 */
export class RasterDrawingContext implements DrawingContext {
  private device: Matrix;

  constructor(
    private image: RgbaImage,
    canvasHeight: number,
    resolution: number,
  ) {
    this.device = [resolution, 0, 0, -resolution, 0, canvasHeight * resolution];
  }

  drawPath(path: Path, state: DrawState): void {
    const devicePath = path.transform(this.device);
    if (fillActive(state)) {
      this.fillPath(devicePath, state.fillRule, state.fill);
    }
    // stroke in canvas units so widths and dashes keep their length
    const outline = outlineStroke(path, state);
    if (outline !== null && !outline.empty()) {
      this.fillPath(outline.transform(this.device), "nonzero", state.stroke);
    }
  }

  drawText(layer: TextLayer): void {
    for (const { path, state } of textLayerPaths(layer)) {
      this.drawPath(path, state);
    }
  }

  private fillPath(devicePath: Path, fillRule: FillRule, color: Color): void {
    const ras = new Rasterizer(this.image.width, this.image.height);
    ras.addPolylines(devicePath.flatten(PIXEL_TOLERANCE));
    const coverage = ras.coverage(fillRule);
    for (let i = 0; i < coverage.length; i++) {
      if (coverage[i] > 0) {
        blendPixel(this.image, i * 4, color, Math.min(1, coverage[i]));
      }
    }
  }
}

export function renderRaster(canvas: Canvas, options: RasterRenderOptions): RgbaImage {
  const { resolution } = options;
  if (!(resolution > 0)) {
    throw new Error(`Invalid resolution ${resolution}: must be positive`);
  }
  const image = createImage(
    Math.round(canvas.width * resolution),
    Math.round(canvas.height * resolution),
    options.background ?? WHITE,
  );
  renderLayers(canvas, new RasterDrawingContext(image, canvas.height, resolution));
  return image;
}

/** Render and write the image as a PAM file. */
export function writeRaster(canvas: Canvas, sink: OutputSink, options: RasterRenderOptions): void {
  sink.write(encodePam(renderRaster(canvas, options)));
}
