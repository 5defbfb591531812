import { z } from "zod";
import type { Length } from "../parser/length.js";

// ---- Enums ----

export type CapName = "butt" | "round" | "square";
export type JoinName = "miter" | "round" | "bevel" | "arcs";
export type FillRuleName = "nonzero" | "evenodd";

// ---- Scene interfaces ----

export interface SceneConfig {
  version: string;
  title?: string;
  canvas: CanvasConfig;
  draw: DrawStatement[];
}

export interface CanvasConfig {
  width: Length;
  height: Length;
}

/**
 * One draw statement: style fields update the current style, then the
 * geometry (if any) is drawn at (x, y). A statement without geometry only
 * changes the style for the statements after it.
 */
export interface DrawStatement {
  x?: Length;
  y?: Length;
  path?: string;
  shape?: ShapeConfig;
  fill?: string;
  stroke?: string;
  stroke_width?: Length;
  cap?: CapName;
  join?: JoinName | JoinConfig;
  dashes?: Length[];
  dash_offset?: Length;
  fill_rule?: FillRuleName;
}

export interface JoinConfig {
  type: "miter" | "arcs";
  limit?: number;
  fallback?: "bevel" | "round";
}

export type ShapeConfig =
  | { type: "rect"; width: Length; height: Length; radius?: Length }
  | { type: "circle"; r: Length }
  | { type: "ellipse"; rx: Length; ry: Length }
  | { type: "polygon"; sides: number; r: Length };

// ---- Zod schemas for runtime validation ----

const LengthSchema = z.union([z.string(), z.number()]);

const ShapeSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("rect"),
    width: LengthSchema,
    height: LengthSchema,
    radius: LengthSchema.optional(),
  }),
  z.object({ type: z.literal("circle"), r: LengthSchema }),
  z.object({ type: z.literal("ellipse"), rx: LengthSchema, ry: LengthSchema }),
  z.object({
    type: z.literal("polygon"),
    sides: z.number().int().min(3),
    r: LengthSchema,
  }),
]);

const JoinSchema = z.union([
  z.enum(["miter", "round", "bevel", "arcs"]),
  z.object({
    type: z.enum(["miter", "arcs"]),
    limit: z.number().positive().optional(),
    fallback: z.enum(["bevel", "round"]).optional(),
  }),
]);

const DrawStatementSchema = z
  .object({
    x: LengthSchema.optional(),
    y: LengthSchema.optional(),
    path: z.string().optional(),
    shape: ShapeSchema.optional(),
    fill: z.string().optional(),
    stroke: z.string().optional(),
    stroke_width: LengthSchema.optional(),
    cap: z.enum(["butt", "round", "square"]).optional(),
    join: JoinSchema.optional(),
    dashes: z.array(LengthSchema).optional(),
    dash_offset: LengthSchema.optional(),
    fill_rule: z.enum(["nonzero", "evenodd"]).optional(),
  })
  .strict()
  .refine((s) => s.path === undefined || s.shape === undefined, {
    message: "a draw statement takes either path or shape, not both",
  });

export const SceneConfigSchema = z.object({
  version: z.string(),
  title: z.string().optional(),
  canvas: z.object({ width: LengthSchema, height: LengthSchema }),
  draw: z.array(DrawStatementSchema),
});

// ---- Validation ----

export interface ValidationIssue {
  code: string;
  severity: "error" | "warning";
  message: string;
  /** Index of the draw statement, null for scene-level issues */
  statement: number | null;
  suggestion: string | null;
}

export interface ValidationResult {
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
}
