export * from "./types/geometry.js";
export * from "./types/style.js";
export * from "./types/scene.js";
export { UnsupportedStyleError, ExportError, unsupportedStyle } from "./errors.js";
export { Path, DEFAULT_TOLERANCE, num } from "./geometry/path.js";
export {
  identity,
  multiply,
  translation,
  scaling,
  rotation,
  applyMatrix,
} from "./geometry/matrix.js";
export { arcToCenter, arcToCubics, quadToCubic } from "./geometry/curves.js";
export {
  rectangle,
  roundedRectangle,
  ellipse,
  circle,
  regularPolygon,
} from "./geometry/shapes.js";
export {
  MM_PER_PT,
  PT_PER_MM,
  MM_PER_INCH,
  INCH_PER_MM,
  resolutionFromDpi,
} from "./geometry/units.js";
export {
  rgba,
  BLACK,
  WHITE,
  TRANSPARENT,
  colorEquals,
  parseColor,
  toCssColor,
} from "./style/color.js";
export {
  BUTT_CAPPER,
  ROUND_CAPPER,
  SQUARE_CAPPER,
  ROUND_JOINER,
  BEVEL_JOINER,
  MITER_JOINER,
  miterJoiner,
  arcsJoiner,
  DEFAULT_DRAW_STATE,
  fillActive,
  strokeActive,
} from "./style/draw-state.js";
export { dashPath, dash, normalizeDashes } from "./stroke/dash.js";
export { strokePath, outlineStroke } from "./stroke/stroke.js";
export { Canvas } from "./canvas.js";
export type { Layer, PathLayer, TextLayer } from "./canvas.js";
export { Text, fontDataUri } from "./text.js";
export type { FontResource, TextObject, TextSpan } from "./text.js";
export { parseLength, formatLength } from "./parser/length.js";
export type { Length } from "./parser/length.js";
export { parsePathData } from "./parser/path-data.js";
export { parseScene } from "./parser/scene-parser.js";
export { buildCanvas } from "./resolver/canvas-resolver.js";
export { validateScene } from "./resolver/validation.js";
