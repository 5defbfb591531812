// ---- Color ----

/** 8-bit-per-channel RGBA. Alpha 0 suppresses the paint entirely. */
export interface Color {
  readonly r: number;
  readonly g: number;
  readonly b: number;
  readonly a: number;
}

// ---- Stroke policies ----

export type CapperKind = "butt" | "round" | "square";

export type Capper =
  | { readonly kind: "butt" }
  | { readonly kind: "round" }
  | { readonly kind: "square" };

export interface RoundJoiner {
  readonly kind: "round";
}

export interface BevelJoiner {
  readonly kind: "bevel";
}

/** Joiner used for a corner whose miter (or arcs) spike exceeds the limit. */
export type GapJoiner = RoundJoiner | BevelJoiner;

export interface MiterJoiner {
  readonly kind: "miter";
  /** Ratio of spike length to stroke width; NaN means never clipped. */
  readonly limit: number;
  readonly fallback: GapJoiner;
}

export interface ArcsJoiner {
  readonly kind: "arcs";
  readonly limit: number;
  readonly fallback: GapJoiner;
}

export type Joiner = MiterJoiner | RoundJoiner | BevelJoiner | ArcsJoiner;

export type FillRule = "nonzero" | "evenodd";

// ---- Draw state ----

export interface DrawState {
  readonly fill: Color;
  readonly stroke: Color;
  readonly strokeWidth: number;
  readonly capper: Capper;
  readonly joiner: Joiner;
  readonly dashOffset: number;
  readonly dashes: readonly number[];
  readonly fillRule: FillRule;
}
