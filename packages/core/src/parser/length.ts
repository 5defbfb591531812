import { MM_PER_INCH, MM_PER_PT } from "../geometry/units.js";

export type Length = string | number;

const LENGTH = /^(-?\d+(?:\.\d+)?|-?\.\d+)\s*(mm|cm|in|pt)?$/i;

const MM_PER_UNIT: Record<string, number> = {
  mm: 1,
  cm: 10,
  in: MM_PER_INCH,
  pt: MM_PER_PT,
};

/**
 * Parse a length into millimeters.
 *
 *   12        → 12
 *   "12mm"    → 12
 *   "1.5cm"   → 15
 *   "1in"     → 25.4
 *   "72pt"    → 25.4
 *
 * Bare numbers and unitless strings are already millimeters.
 */
export function parseLength(value: Length): number {
  if (typeof value === "number") {
    return value;
  }

  const trimmed = value.trim();
  if (trimmed === "") {
    throw new Error("Empty length string");
  }

  const match = trimmed.match(LENGTH);
  if (!match) {
    throw new Error(
      `Invalid length string: "${value}". Expected formats: "12", "12mm", "1.5cm", "1in", "72pt"`,
    );
  }

  const unit = (match[2] ?? "mm").toLowerCase();
  return parseFloat(match[1]) * MM_PER_UNIT[unit];
}

/**
 * Format millimeters for display: "25.4mm", "-3mm".
 */
export function formatLength(mm: number): string {
  return `${Number(mm.toFixed(3))}mm`;
}
