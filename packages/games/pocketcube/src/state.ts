import { MalformedCubeError } from "./errors";
import type { MoveName } from "./moves";

export const STICKER_COUNT = 24;
export const STICKERS_PER_FACE = 4;

/**
 * Face blocks in slot order. Slots 0-3 are Front, 4-7 Right and so on;
 * within a block the order is top-left, top-right, bottom-left, bottom-right
 * looking at the face from outside (U seen from above with Back at the top,
 * D seen from below with Front at the top).
 */
export const FACE_ORDER = ["F", "R", "B", "L", "U", "D"] as const;
export type Face = (typeof FACE_ORDER)[number];

export const COLORS = ["w", "o", "y", "r", "b", "g"] as const;
export type Color = (typeof COLORS)[number];

/** Colour of each face on the solved cube */
export const FACE_COLORS: Readonly<Record<Face, Color>> = {
  F: "w",
  R: "o",
  B: "y",
  L: "r",
  U: "b",
  D: "g",
};

/**
 * One colour label per sticker slot. Labels are normally drawn from COLORS,
 * but parsed input is kept as given so that a bad cube is searched (and not
 * solved) rather than rejected.
 */
export type CubeState = readonly string[];

export const SOLVED_STATE: CubeState = Object.freeze(
  FACE_ORDER.flatMap((face) => Array<string>(STICKERS_PER_FACE).fill(FACE_COLORS[face]))
);

/** Key used for visited-set membership; tokens never contain commas */
export function stateKey(state: CubeState): string {
  return state.join(",");
}

export function statesEqual(a: CubeState, b: CubeState): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

export function isSolvedState(state: CubeState): boolean {
  return statesEqual(state, SOLVED_STATE);
}

/** The four stickers of one face, in slot order */
export function faceStickers(state: CubeState, face: Face): string[] {
  const start = FACE_ORDER.indexOf(face) * STICKERS_PER_FACE;
  return state.slice(start, start + STICKERS_PER_FACE);
}

/**
 * True when the cube holds exactly six colours four times each. Moves only
 * permute stickers, so this holds for every state reachable from solved.
 */
export function hasValidColorCounts(state: CubeState): boolean {
  if (state.length !== STICKER_COUNT) return false;
  const counts = new Map<string, number>();
  for (const sticker of state) {
    counts.set(sticker, (counts.get(sticker) ?? 0) + 1);
  }
  if (counts.size !== COLORS.length) return false;
  for (const count of counts.values()) {
    if (count !== STICKERS_PER_FACE) return false;
  }
  return true;
}

/**
 * Parse "[w,w,w,w],[o,o,o,o],..." into a cube state. Brackets and whitespace
 * are ignored; whatever remains must split on commas into 24 stickers.
 */
export function parseCube(text: string): CubeState {
  const cleaned = text.replace(/[[\]\s]/g, "");
  const stickers = cleaned.split(",");
  if (stickers.length !== STICKER_COUNT) {
    throw new MalformedCubeError(stickers.length);
  }
  return stickers;
}

/** Format a cube state as six bracketed face groups, the inverse of parseCube */
export function formatCube(state: CubeState): string {
  return FACE_ORDER.map((face) => `[${faceStickers(state, face).join(",")}]`).join(",");
}

/** The game-specific data stored in GameState.data */
export interface PocketCubeData {
  /** Current sticker layout */
  cube: CubeState;
  /** Moves that produced the starting position (hidden from observation) */
  scramble: MoveName[];
  /** Moves the player has made so far */
  history: MoveName[];
  /** Whether the player has resigned */
  resigned: boolean;
}
