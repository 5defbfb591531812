import { Canvas } from "../canvas.js";
import type { Path } from "../geometry/path.js";
import { circle, ellipse, rectangle, regularPolygon, roundedRectangle } from "../geometry/shapes.js";
import { parseLength } from "../parser/length.js";
import { parsePathData } from "../parser/path-data.js";
import { parseColor } from "../style/color.js";
import {
  arcsJoiner,
  BEVEL_JOINER,
  BUTT_CAPPER,
  miterJoiner,
  ROUND_CAPPER,
  ROUND_JOINER,
  SQUARE_CAPPER,
} from "../style/draw-state.js";
import type {
  CapName,
  DrawStatement,
  JoinConfig,
  JoinName,
  SceneConfig,
  ShapeConfig,
} from "../types/scene.js";
import type { Capper, Joiner } from "../types/style.js";

/**
 * Replay a scene's draw statements onto a new canvas.
 * Each statement first applies its style fields to the current style, then
 * draws its geometry at (x, y).
 */
export function buildCanvas(scene: SceneConfig): Canvas {
  const canvas = new Canvas(parseLength(scene.canvas.width), parseLength(scene.canvas.height));

  scene.draw.forEach((stmt, index) => {
    try {
      applyStyle(canvas, stmt);
      const geometry = resolveGeometry(stmt);
      if (geometry) {
        canvas.drawPath(parseLength(stmt.x ?? 0), parseLength(stmt.y ?? 0), geometry);
      }
    } catch (err) {
      throw new Error(
        `Draw statement ${index}: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
  });

  return canvas;
}

function applyStyle(canvas: Canvas, stmt: DrawStatement): void {
  if (stmt.fill !== undefined) canvas.setFillColor(parseColor(stmt.fill));
  if (stmt.stroke !== undefined) canvas.setStrokeColor(parseColor(stmt.stroke));
  if (stmt.stroke_width !== undefined) canvas.setStrokeWidth(parseLength(stmt.stroke_width));
  if (stmt.cap !== undefined) canvas.setStrokeCapper(resolveCapper(stmt.cap));
  if (stmt.join !== undefined) canvas.setStrokeJoiner(resolveJoiner(stmt.join));
  if (stmt.fill_rule !== undefined) canvas.setFillRule(stmt.fill_rule);
  if (stmt.dashes !== undefined || stmt.dash_offset !== undefined) {
    const dashes = stmt.dashes?.map(parseLength) ?? [...canvas.state.dashes];
    const offset = stmt.dash_offset !== undefined ? parseLength(stmt.dash_offset) : canvas.state.dashOffset;
    canvas.setDashes(offset, ...dashes);
  }
}

export function resolveCapper(name: CapName): Capper {
  switch (name) {
    case "butt":
      return BUTT_CAPPER;
    case "round":
      return ROUND_CAPPER;
    case "square":
      return SQUARE_CAPPER;
  }
}

export function resolveJoiner(join: JoinName | JoinConfig): Joiner {
  if (typeof join === "string") {
    switch (join) {
      case "miter":
        return miterJoiner();
      case "arcs":
        return arcsJoiner();
      case "round":
        return ROUND_JOINER;
      case "bevel":
        return BEVEL_JOINER;
    }
  }
  const fallback = join.fallback === "round" ? ROUND_JOINER : BEVEL_JOINER;
  const limit = join.limit ?? Number.NaN;
  return join.type === "miter" ? miterJoiner(limit, fallback) : arcsJoiner(limit, fallback);
}

/** The statement's path in its own coordinates, or null for style-only statements. */
export function resolveGeometry(stmt: DrawStatement): Path | null {
  if (stmt.path !== undefined) return parsePathData(stmt.path);
  if (stmt.shape !== undefined) return resolveShape(stmt.shape);
  return null;
}

function resolveShape(shape: ShapeConfig): Path {
  switch (shape.type) {
    case "rect":
      return shape.radius !== undefined
        ? roundedRectangle(parseLength(shape.width), parseLength(shape.height), parseLength(shape.radius))
        : rectangle(parseLength(shape.width), parseLength(shape.height));
    case "circle":
      return circle(parseLength(shape.r));
    case "ellipse":
      return ellipse(parseLength(shape.rx), parseLength(shape.ry));
    case "polygon":
      return regularPolygon(shape.sides, parseLength(shape.r));
  }
}
