import { formatLength, parseLength } from "../parser/length.js";
import { parseColor } from "../style/color.js";
import type {
  DrawStatement,
  SceneConfig,
  ValidationIssue,
  ValidationResult,
} from "../types/scene.js";
import { resolveGeometry } from "./canvas-resolver.js";

interface StyleTrack {
  fillVisible: boolean;
  strokeVisible: boolean;
  strokeWidth: number;
}

/**
 * Linter-style validation pass on a parsed scene.
 * Errors are statements that cannot be drawn; warnings are statements that
 * will silently draw nothing.
 */
export function validateScene(scene: SceneConfig): ValidationResult {
  const errors: ValidationIssue[] = [];
  const warnings: ValidationIssue[] = [];

  checkCanvasSize(scene, errors);

  // mirrors the canvas defaults: opaque black fill, no stroke
  const style: StyleTrack = { fillVisible: true, strokeVisible: false, strokeWidth: 1 };
  scene.draw.forEach((stmt, index) => {
    checkStyle(stmt, index, style, errors, warnings);
    checkGeometry(stmt, index, style, errors, warnings);
  });

  return { errors, warnings };
}

function checkCanvasSize(scene: SceneConfig, errors: ValidationIssue[]): void {
  try {
    const width = parseLength(scene.canvas.width);
    const height = parseLength(scene.canvas.height);
    if (width <= 0 || height <= 0) {
      errors.push(issue("invalid-canvas-size", "error", `Canvas size ${formatLength(width)} x ${formatLength(height)} must be positive`, null, null));
    }
  } catch (err) {
    errors.push(issue("invalid-canvas-size", "error", errorMessage(err), null, null));
  }
}

function checkStyle(
  stmt: DrawStatement,
  index: number,
  style: StyleTrack,
  errors: ValidationIssue[],
  warnings: ValidationIssue[],
): void {
  try {
    if (stmt.fill !== undefined) style.fillVisible = parseColor(stmt.fill).a !== 0;
    if (stmt.stroke !== undefined) style.strokeVisible = parseColor(stmt.stroke).a !== 0;
  } catch (err) {
    errors.push(issue("invalid-color", "error", errorMessage(err), index, "Use #rrggbb, #rrggbbaa or a color name"));
  }

  try {
    if (stmt.stroke_width !== undefined) style.strokeWidth = parseLength(stmt.stroke_width);
  } catch (err) {
    errors.push(issue("invalid-length", "error", errorMessage(err), index, null));
  }

  if (stmt.dashes !== undefined) {
    try {
      const dashes = stmt.dashes.map(parseLength);
      if (dashes.some((d) => d < 0)) {
        errors.push(
          issue("negative-dash", "error", "Dash lengths must be non-negative", index, "Remove the minus sign"),
        );
      } else if (dashes.length > 0 && dashes.every((d) => d === 0)) {
        warnings.push(
          issue(
            "zero-dash-pattern",
            "warning",
            "Dash pattern sums to zero and is drawn as a solid line",
            index,
            "Use an empty list for solid strokes",
          ),
        );
      }
    } catch (err) {
      errors.push(issue("invalid-length", "error", errorMessage(err), index, null));
    }
  }
}

function checkGeometry(
  stmt: DrawStatement,
  index: number,
  style: StyleTrack,
  errors: ValidationIssue[],
  warnings: ValidationIssue[],
): void {
  let empty: boolean;
  try {
    const geometry = resolveGeometry(stmt);
    if (geometry === null) return;
    empty = geometry.empty();
  } catch (err) {
    errors.push(issue("invalid-path", "error", errorMessage(err), index, null));
    return;
  }

  if (empty) {
    warnings.push(
      issue("empty-path", "warning", "Path has no drawable segments and is skipped", index, null),
    );
    return;
  }

  const strokeActive = style.strokeVisible && style.strokeWidth > 0;
  if (!style.fillVisible && !strokeActive) {
    warnings.push(
      issue(
        "invisible-draw",
        "warning",
        "Fill is transparent and stroke is inactive: nothing is drawn",
        index,
        "Set a visible fill, or a stroke color with a positive stroke_width",
      ),
    );
  }
}

function issue(
  code: string,
  severity: "error" | "warning",
  message: string,
  statement: number | null,
  suggestion: string | null,
): ValidationIssue {
  return { code, severity, message, statement, suggestion };
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
