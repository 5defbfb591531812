import type { Path } from "./geometry/path.js";
import { DEFAULT_DRAW_STATE, snapshotDrawState } from "./style/draw-state.js";
import type { FontResource, TextObject } from "./text.js";
import type { Capper, Color, DrawState, FillRule, Joiner } from "./types/style.js";

export interface PathLayer {
  readonly kind: "path";
  readonly path: Path;
  readonly state: DrawState;
}

export interface TextLayer {
  readonly kind: "text";
  readonly text: TextObject;
  readonly x: number;
  readonly y: number;
  /** Counter-clockwise rotation in degrees about the text origin. */
  readonly rotation: number;
}

export type Layer = PathLayer | TextLayer;

/**
 * A fixed-size drawing surface recording an append-only stack of layers.
 * Lengths are millimeters, Y increases upward.
 *
 * Exports read the layer stack without locking: do not draw on a canvas
 * while it is being exported.
 */
export class Canvas {
  private readonly layerStack: Layer[] = [];
  private readonly fontSet = new Set<FontResource>();
  private current: DrawState = DEFAULT_DRAW_STATE;

  constructor(
    readonly width: number,
    readonly height: number,
  ) {
    if (!(width > 0) || !(height > 0)) {
      throw new Error(`Invalid canvas size ${width}x${height}: both must be positive`);
    }
  }

  get layers(): readonly Layer[] {
    return this.layerStack;
  }

  get fonts(): ReadonlySet<FontResource> {
    return this.fontSet;
  }

  /** The style applied to the next drawn path. */
  get state(): DrawState {
    return this.current;
  }

  setFillColor(color: Color): void {
    this.update({ fill: color });
  }

  setStrokeColor(color: Color): void {
    this.update({ stroke: color });
  }

  setStrokeWidth(width: number): void {
    this.update({ strokeWidth: width });
  }

  setStrokeCapper(capper: Capper): void {
    this.update({ capper });
  }

  setStrokeJoiner(joiner: Joiner): void {
    this.update({ joiner });
  }

  /** Dash lengths must be non-negative; an empty or all-zero pattern strokes solid. */
  setDashes(offset: number, ...dashes: number[]): void {
    for (const d of dashes) {
      if (!(d >= 0)) {
        throw new Error(`Invalid dash length ${d}: dash lengths must be non-negative`);
      }
    }
    this.update({ dashOffset: offset, dashes });
  }

  setFillRule(fillRule: FillRule): void {
    this.update({ fillRule });
  }

  private update(changes: Partial<DrawState>): void {
    this.current = snapshotDrawState({ ...this.current, ...changes });
  }

  /** Record `path` translated by (x, y). Empty paths are dropped. */
  drawPath(x: number, y: number, path: Path): void {
    if (path.empty()) return;
    const placed = path.translate(x, y);
    if (placed.empty()) return;
    this.layerStack.push({ kind: "path", path: placed, state: this.current });
  }

  /** Record text at (x, y) and register its fonts. Text with no spans is dropped. */
  drawText(x: number, y: number, text: TextObject, rotation = 0): void {
    if (text.spans.length === 0) return;
    for (const font of text.fonts) {
      this.fontSet.add(font);
    }
    this.layerStack.push({ kind: "text", text, x, y, rotation });
  }
}
