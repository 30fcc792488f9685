import { CubeState, Face, STICKER_COUNT } from "./state";
import { InvalidMoveError } from "./errors";

/**
 * A permutation of the 24 sticker slots, read as
 * `next[i] = previous[permutation[i]]`.
 */
export type Permutation = readonly number[];

export type MoveName = Face | `${Face}2` | `${Face}'`;

/** Quarter turns applied: 1 = clockwise, 2 = half turn, 3 = counter-clockwise */
export type TurnCount = 1 | 2 | 3;

export interface MoveDefinition {
  readonly name: MoveName;
  readonly face: Face;
  readonly turns: TurnCount;
  readonly permutation: Permutation;
}

/**
 * Clockwise quarter turn of each face, seen from outside the cube. Each
 * entry is the slot whose sticker lands in that position. These are derived
 * from rotating the cubies of a 2x2x2 model about the face normal; the
 * derived turns below depend on each having order 4.
 */
const BASE_PERMUTATIONS: Readonly<Record<Face, Permutation>> = {
  F: [2, 0, 3, 1, 18, 5, 19, 7, 8, 9, 10, 11, 12, 20, 14, 21, 16, 17, 15, 13, 6, 4, 22, 23],
  R: [0, 21, 2, 23, 6, 4, 7, 5, 19, 9, 17, 11, 12, 13, 14, 15, 16, 1, 18, 3, 20, 10, 22, 8],
  B: [0, 1, 2, 3, 4, 23, 6, 22, 10, 8, 11, 9, 17, 13, 16, 15, 5, 7, 18, 19, 20, 21, 12, 14],
  L: [16, 1, 18, 3, 4, 5, 6, 7, 8, 22, 10, 20, 14, 12, 15, 13, 11, 17, 9, 19, 0, 21, 2, 23],
  U: [4, 5, 2, 3, 8, 9, 6, 7, 12, 13, 10, 11, 0, 1, 14, 15, 18, 16, 19, 17, 20, 21, 22, 23],
  D: [0, 1, 14, 15, 4, 5, 2, 3, 8, 9, 6, 7, 12, 13, 10, 11, 16, 17, 18, 19, 22, 20, 23, 21],
};

/**
 * Every move in the order the solver expands them. Among equally short
 * solutions the solver returns the first one found in this order.
 */
export const MOVE_ORDER: readonly MoveName[] = [
  "F", "F2", "F'",
  "R", "R2", "R'",
  "B", "B2", "B'",
  "L", "L2", "L'",
  "U", "U2", "U'",
  "D", "D2", "D'",
];

const MOVE_NAMES: ReadonlySet<string> = new Set<string>(MOVE_ORDER);

const INVERSE_TURNS: Readonly<Record<TurnCount, TurnCount>> = { 1: 3, 2: 2, 3: 1 };

/** `(outer ∘ inner)(i) = outer[inner[i]]`: apply `outer`, then `inner` */
export function composePermutations(outer: Permutation, inner: Permutation): Permutation {
  return inner.map((slot) => outer[slot]);
}

export function moveName(face: Face, turns: TurnCount): MoveName {
  switch (turns) {
    case 1:
      return face;
    case 2:
      return `${face}2` as const;
    case 3:
      return `${face}'` as const;
  }
}

function defineMove(face: Face, turns: TurnCount): MoveDefinition {
  const base = BASE_PERMUTATIONS[face];
  let permutation = base;
  for (let n = 1; n < turns; n++) {
    permutation = composePermutations(base, permutation);
  }
  return Object.freeze({
    name: moveName(face, turns),
    face,
    turns,
    permutation: Object.freeze([...permutation]),
  });
}

function defineFace(face: Face): [MoveDefinition, MoveDefinition, MoveDefinition] {
  return [defineMove(face, 1), defineMove(face, 2), defineMove(face, 3)];
}

const [F, F2, F3] = defineFace("F");
const [R, R2, R3] = defineFace("R");
const [B, B2, B3] = defineFace("B");
const [L, L2, L3] = defineFace("L");
const [U, U2, U3] = defineFace("U");
const [D, D2, D3] = defineFace("D");

/** All 18 moves, built once when the module loads */
export const MOVES: Readonly<Record<MoveName, MoveDefinition>> = Object.freeze({
  F, F2, "F'": F3,
  R, R2, "R'": R3,
  B, B2, "B'": B3,
  L, L2, "L'": L3,
  U, U2, "U'": U3,
  D, D2, "D'": D3,
});

/** Move definitions in MOVE_ORDER */
export const MOVE_LIST: readonly MoveDefinition[] = Object.freeze(
  MOVE_ORDER.map((name) => MOVES[name])
);

export function isMoveName(token: string): token is MoveName {
  return MOVE_NAMES.has(token);
}

/** The move that undoes `move`: X and X' swap, X2 undoes itself */
export function inverseMove(move: MoveName): MoveName {
  const { face, turns } = MOVES[move];
  return moveName(face, INVERSE_TURNS[turns]);
}

/** Apply an already-resolved permutation. Total and pure. */
export function applyPermutation(state: CubeState, permutation: Permutation): CubeState {
  const next = new Array<string>(STICKER_COUNT);
  for (let i = 0; i < STICKER_COUNT; i++) {
    next[i] = state[permutation[i]];
  }
  return next;
}

/**
 * Apply one named move. Accepts any string so that tokens from user input
 * can be passed straight through; unknown names throw InvalidMoveError.
 */
export function applyMove(state: CubeState, move: string): CubeState {
  if (!isMoveName(move)) {
    throw new InvalidMoveError(move);
  }
  return applyPermutation(state, MOVES[move].permutation);
}
