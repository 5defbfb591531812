/**
 * Unit conversion constants. All public lengths are millimeters; these are
 * for callers converting to and from other units.
 */
export const MM_PER_PT = 25.4 / 72;
export const PT_PER_MM = 72 / 25.4;
export const MM_PER_INCH = 25.4;
export const INCH_PER_MM = 1 / 25.4;

/** Pixels per millimeter for a resolution given in dots per inch. */
export function resolutionFromDpi(dpi: number): number {
  return dpi * INCH_PER_MM;
}
