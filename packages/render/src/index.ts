export { renderLayers, textLayerPaths } from "./drawing-context.js";
export type { DrawingContext } from "./drawing-context.js";
export { BufferSink, FileSink, withSink } from "./sink.js";
export type { OutputSink } from "./sink.js";
export { renderSvg } from "./svg/render-svg.js";
export type { SvgRenderOptions } from "./svg/render-svg.js";
export { SvgDocument } from "./svg/svg-document.js";
export { SvgDrawingContext } from "./svg/svg-drawing-context.js";
export { renderPdf, writePdf, nativeJoiner, PdfDrawingContext } from "./pdf/render-pdf.js";
export { PdfWriter, PdfPageWriter, UNBOUNDED_MITER_LIMIT } from "./pdf/pdf-writer.js";
export type { PaintOperator } from "./pdf/pdf-writer.js";
export { renderEps, writeEps, EpsDrawingContext } from "./eps/render-eps.js";
export { EpsWriter } from "./eps/eps-writer.js";
export { renderRaster, writeRaster, RasterDrawingContext } from "./raster/render-raster.js";
export type { RasterRenderOptions } from "./raster/render-raster.js";
export { Rasterizer } from "./raster/rasterizer.js";
export { createImage, pixelAt, blendPixel, encodePam } from "./raster/image.js";
export type { RgbaImage } from "./raster/image.js";
export {
  exportCanvas,
  writeCanvas,
  formatFromPath,
  isExportFormat,
  EXPORT_FORMATS,
} from "./export.js";
export type { ExportFormat, ExportOptions } from "./export.js";
