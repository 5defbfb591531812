import { Buffer } from "node:buffer";
import type { Path } from "./geometry/path.js";
import type { Color } from "./types/style.js";

/** Embeddable font file. Identity (not name) distinguishes fonts. */
export interface FontResource {
  readonly name: string;
  readonly mimeType: string;
  readonly data: Uint8Array;
}

/** A run of pre-shaped text in a single font, size and color. */
export interface TextSpan {
  readonly content: string;
  readonly font: FontResource;
  /** Font size in millimeters. */
  readonly size: number;
  readonly color: Color;
  /** Offset of the span's baseline origin from the text origin. */
  readonly x: number;
  readonly y: number;
  /** Glyph outlines in text coordinates (Y-up, origin at the text origin). */
  readonly outline: Path;
}

/**
 * Text as the engine consumes it. Shaping and glyph extraction happen
 * elsewhere; backends either decompose into outlines or, for SVG, emit the
 * spans as text elements referencing the embedded fonts.
 */
export interface TextObject {
  readonly fonts: readonly FontResource[];
  readonly spans: readonly TextSpan[];
  toPaths(): { paths: Path[]; colors: Color[] };
}

export class Text implements TextObject {
  readonly spans: readonly TextSpan[];
  readonly fonts: readonly FontResource[];

  constructor(spans: readonly TextSpan[]) {
    this.spans = [...spans];
    this.fonts = [...new Set(spans.map((s) => s.font))];
  }

  toPaths(): { paths: Path[]; colors: Color[] } {
    const paths: Path[] = [];
    const colors: Color[] = [];
    for (const span of this.spans) {
      if (span.outline.empty()) continue;
      paths.push(span.outline.copy());
      colors.push(span.color);
    }
    return { paths, colors };
  }
}

export function fontDataUri(font: FontResource): string {
  return `data:${font.mimeType};base64,${Buffer.from(font.data).toString("base64")}`;
}
