import { extname } from "node:path";
import type { Canvas } from "@inkframe/core";
import { resolutionFromDpi } from "@inkframe/core";
import { writeEps } from "./eps/render-eps.js";
import { writePdf } from "./pdf/render-pdf.js";
import { writeRaster } from "./raster/render-raster.js";
import { FileSink, withSink } from "./sink.js";
import type { OutputSink } from "./sink.js";
import { renderSvg } from "./svg/render-svg.js";

export const EXPORT_FORMATS = ["svg", "pdf", "eps", "pam"] as const;
export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export interface ExportOptions {
  /** Output format; inferred from the file extension when omitted. */
  format?: ExportFormat;
  /** Raster pixels per millimeter. */
  resolution?: number;
}

const DEFAULT_OPTIONS = {
  resolution: resolutionFromDpi(96),
} as const;

export function isExportFormat(value: string): value is ExportFormat {
  return EXPORT_FORMATS.some((f) => f === value);
}

/** Format named by a file's extension, or null when it names none. */
export function formatFromPath(file: string): ExportFormat | null {
  const ext = extname(file).slice(1).toLowerCase();
  return isExportFormat(ext) ? ext : null;
}

/** Render the canvas in `format` into an open sink. */
export function writeCanvas(
  canvas: Canvas,
  sink: OutputSink,
  format: ExportFormat,
  resolution: number = DEFAULT_OPTIONS.resolution,
): void {
  switch (format) {
    case "svg":
      sink.write(renderSvg(canvas));
      break;
    case "pdf":
      writePdf(canvas, sink);
      break;
    case "eps":
      writeEps(canvas, sink);
      break;
    case "pam":
      writeRaster(canvas, sink, { resolution });
      break;
    default:
      throw new Error(`Unknown export format: ${JSON.stringify(format satisfies never)}`);
  }
}

/**
 * Render the canvas to a file. The file is closed on every exit path;
 * output already written is left in place when rendering fails.
 */
export function exportCanvas(canvas: Canvas, file: string, options?: ExportOptions): ExportFormat {
  const format = options?.format ?? formatFromPath(file);
  if (format === null) {
    throw new Error(
      `Cannot infer an output format from "${file}". Use one of: ${EXPORT_FORMATS.join(", ")}`,
    );
  }
  const resolution = options?.resolution ?? DEFAULT_OPTIONS.resolution;
  withSink(new FileSink(file), (sink) => writeCanvas(canvas, sink, format, resolution));
  return format;
}
