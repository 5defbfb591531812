import { cssString, n } from "../utils.js";

/**
 * Lightweight SVG document builder. No DOM dependency.
 */
export class SvgDocument {
  private fontFaces: string[] = [];
  private elements: string[] = [];

  constructor(
    private width: number,
    private height: number,
    private background: string | null = null,
  ) {}

  /** Register an `@font-face` rule; emitted once in the header. */
  addFontFace(family: string, src: string): void {
    this.fontFaces.push(`@font-face{font-family:${cssString(family)};src:url(${cssString(src)});}`);
  }

  add(svg: string): void {
    this.elements.push(svg);
  }

  toString(): string {
    const w = n(this.width);
    const h = n(this.height);
    const parts: string[] = [];

    parts.push(
      `<svg xmlns="http://www.w3.org/2000/svg" version="1.1" shape-rendering="geometricPrecision" width="${w}" height="${h}" viewBox="0 0 ${w} ${h}">`,
    );

    if (this.fontFaces.length > 0) {
      parts.push("<defs><style>");
      for (const rule of this.fontFaces) {
        parts.push(rule);
      }
      parts.push("</style></defs>");
    }

    if (this.background !== null) {
      parts.push(`<rect width="${w}" height="${h}" fill="${this.background}"/>`);
    }

    for (const el of this.elements) {
      parts.push(el);
    }

    parts.push("</svg>");
    return parts.join("\n");
  }
}
