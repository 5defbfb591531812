import type {
  ArcsJoiner,
  BevelJoiner,
  Capper,
  DrawState,
  GapJoiner,
  MiterJoiner,
  RoundJoiner,
} from "../types/style.js";
import { BLACK, TRANSPARENT } from "./color.js";

export const BUTT_CAPPER: Capper = Object.freeze({ kind: "butt" });
export const ROUND_CAPPER: Capper = Object.freeze({ kind: "round" });
export const SQUARE_CAPPER: Capper = Object.freeze({ kind: "square" });

export const ROUND_JOINER: RoundJoiner = Object.freeze({ kind: "round" });
export const BEVEL_JOINER: BevelJoiner = Object.freeze({ kind: "bevel" });

export function miterJoiner(
  limit: number = Number.NaN,
  fallback: GapJoiner = BEVEL_JOINER,
): MiterJoiner {
  return Object.freeze({ kind: "miter", limit, fallback });
}

export function arcsJoiner(
  limit: number = Number.NaN,
  fallback: GapJoiner = BEVEL_JOINER,
): ArcsJoiner {
  return Object.freeze({ kind: "arcs", limit, fallback });
}

/** Miter joiner that never clips. */
export const MITER_JOINER: MiterJoiner = miterJoiner();

export const DEFAULT_DRAW_STATE: DrawState = Object.freeze({
  fill: BLACK,
  stroke: TRANSPARENT,
  strokeWidth: 1,
  capper: BUTT_CAPPER,
  joiner: MITER_JOINER,
  dashOffset: 0,
  dashes: Object.freeze([]),
  fillRule: "nonzero",
});

/** Fill is painted iff the fill color is not fully transparent. */
export function fillActive(state: DrawState): boolean {
  return state.fill.a !== 0;
}

/** Stroke is painted iff its color is visible and it has a positive width. */
export function strokeActive(state: DrawState): boolean {
  return state.stroke.a !== 0 && state.strokeWidth > 0;
}

/** Frozen copy of a draw state, safe to store in a layer. */
export function snapshotDrawState(state: DrawState): DrawState {
  return Object.freeze({
    ...state,
    dashes: Object.freeze([...state.dashes]),
  });
}
