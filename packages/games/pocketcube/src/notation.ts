import { CubeState } from "./state";
import { MoveName, applyMove, inverseMove, isMoveName } from "./moves";
import { InvalidMoveError } from "./errors";

/**
 * Split a move string such as "R U R' U'" into move names. An apostrophe
 * always ends a token, so "R'U2" reads as R' U2. Throws InvalidMoveError on
 * the first token that is not a move.
 */
export function parseMoveSequence(text: string): MoveName[] {
  const tokens = text
    .replace(/'/g, "' ")
    .split(/\s+/)
    .filter((token) => token !== "");

  return tokens.map((token) => {
    if (!isMoveName(token)) {
      throw new InvalidMoveError(token);
    }
    return token;
  });
}

export function formatMoveSequence(moves: readonly MoveName[]): string {
  return moves.join(" ");
}

/** Apply a move string or list of moves in order */
export function applyMoves(state: CubeState, moves: string | readonly string[]): CubeState {
  const sequence: readonly string[] = typeof moves === "string" ? parseMoveSequence(moves) : moves;
  return sequence.reduce<CubeState>((current, move) => applyMove(current, move), state);
}

/** The sequence that undoes `moves`: reversed, each move inverted */
export function invertSequence(moves: readonly MoveName[]): MoveName[] {
  return [...moves].reverse().map(inverseMove);
}
