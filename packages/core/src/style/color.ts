import type { Color } from "../types/style.js";

export function rgba(r: number, g: number, b: number, a = 255): Color {
  return Object.freeze({
    r: clampChannel(r),
    g: clampChannel(g),
    b: clampChannel(b),
    a: clampChannel(a),
  });
}

export const BLACK = rgba(0, 0, 0);
export const WHITE = rgba(255, 255, 255);
export const TRANSPARENT = rgba(0, 0, 0, 0);

const NAMED_COLORS: Record<string, Color> = {
  black: BLACK,
  white: WHITE,
  red: rgba(255, 0, 0),
  green: rgba(0, 128, 0),
  lime: rgba(0, 255, 0),
  blue: rgba(0, 0, 255),
  yellow: rgba(255, 255, 0),
  cyan: rgba(0, 255, 255),
  magenta: rgba(255, 0, 255),
  gray: rgba(128, 128, 128),
  grey: rgba(128, 128, 128),
  orange: rgba(255, 165, 0),
  transparent: TRANSPARENT,
  none: TRANSPARENT,
};

const HEX = /^#([0-9a-f]{3,4}|[0-9a-f]{6}|[0-9a-f]{8})$/i;

/** Exact component-wise equality. */
export function colorEquals(a: Color, b: Color): boolean {
  return a.r === b.r && a.g === b.g && a.b === b.b && a.a === b.a;
}

/**
 * Parse a color string.
 *
 *   "#f00"       → (255, 0, 0, 255)
 *   "#ff000080"  → (255, 0, 0, 128)
 *   "red"        → (255, 0, 0, 255)
 *   "none"       → (0, 0, 0, 0)
 */
export function parseColor(value: string): Color {
  const trimmed = value.trim().toLowerCase();
  if (Object.hasOwn(NAMED_COLORS, trimmed)) return NAMED_COLORS[trimmed];

  const match = trimmed.match(HEX);
  if (!match) {
    throw new Error(
      `Invalid color "${value}": expected #rgb, #rgba, #rrggbb, #rrggbbaa or a color name`,
    );
  }

  let hex = match[1];
  if (hex.length <= 4) {
    hex = hex
      .split("")
      .map((c) => c + c)
      .join("");
  }
  const channel = (i: number) => parseInt(hex.substring(i * 2, i * 2 + 2), 16);
  return rgba(channel(0), channel(1), channel(2), hex.length === 8 ? channel(3) : 255);
}

/** CSS notation: #rrggbb when opaque, rgba() otherwise. */
export function toCssColor(color: Color): string {
  if (color.a === 255) {
    return `#${hex2(color.r)}${hex2(color.g)}${hex2(color.b)}`;
  }
  const alpha = Number((color.a / 255).toFixed(3));
  return `rgba(${color.r},${color.g},${color.b},${alpha})`;
}

function hex2(value: number): string {
  return value.toString(16).padStart(2, "0");
}

function clampChannel(value: number): number {
  return Math.min(255, Math.max(0, Math.round(value)));
}
