import { CubeState, SOLVED_STATE } from "./state";
import { MoveName, MOVE_ORDER, applyMove } from "./moves";
import { SeededRng } from "./prng";

export interface Scramble {
  state: CubeState;
  moves: MoveName[];
}

/**
 * Apply `length` moves drawn uniformly from all 18 to the solved cube.
 * Consecutive moves are not filtered, so a scramble may partly cancel itself.
 */
export function scrambleCube(length: number, rng: SeededRng): Scramble {
  if (!Number.isInteger(length) || length < 0) {
    throw new RangeError(`Scramble length must be a non-negative integer, got ${length}`);
  }

  let state = SOLVED_STATE;
  const moves: MoveName[] = [];
  for (let i = 0; i < length; i++) {
    const move = rng.pick(MOVE_ORDER);
    state = applyMove(state, move);
    moves.push(move);
  }
  return { state, moves };
}
