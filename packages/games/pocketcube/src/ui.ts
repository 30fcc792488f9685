import { Action } from "@pocketsolve/core";
import { GameUISpec } from "@pocketsolve/engine";
import { Face, STICKER_COUNT, faceStickers } from "./state";
import { isMoveName } from "./moves";

function isCubeArray(value: unknown): value is string[] {
  return (
    Array.isArray(value) &&
    value.length === STICKER_COUNT &&
    value.every((sticker) => typeof sticker === "string")
  );
}

function row(cube: string[], face: Face, top: boolean): string {
  const stickers = faceStickers(cube, face);
  return (top ? stickers.slice(0, 2) : stickers.slice(2)).join(" ");
}

/**
 * Unfolded net with F in the middle:
 *
 *         U
 *     L   F   R   B
 *         D
 */
export function renderNet(cube: string[]): string {
  const pad = "    ";
  const middle = (top: boolean) =>
    (["L", "F", "R", "B"] as const).map((face) => row(cube, face, top)).join(" ");

  return [
    `${pad}${row(cube, "U", true)}`,
    `${pad}${row(cube, "U", false)}`,
    middle(true),
    middle(false),
    `${pad}${row(cube, "D", true)}`,
    `${pad}${row(cube, "D", false)}`,
  ].join("\n");
}

export const PocketCubeUI: GameUISpec = {
  playerLabels: ["Solver"],

  pieces: {
    w: { symbol: "w", label: "white" },
    o: { symbol: "o", label: "orange" },
    y: { symbol: "y", label: "yellow" },
    r: { symbol: "r", label: "red" },
    b: { symbol: "b", label: "blue" },
    g: { symbol: "g", label: "green" },
  },

  inputHint: 'Enter a move (F R B L U D, with 2 or \' e.g. "R\'" or "U2") or "resign"',

  maxTurns: null,

  renderBoard(publicData: Record<string, unknown>): string {
    const cube = publicData.cube;
    if (!isCubeArray(cube)) return "Waiting for game state...";
    return renderNet(cube);
  },

  renderStatus(publicData: Record<string, unknown>): string | null {
    if (publicData.resigned === true) return "You resigned.";
    const moveCount = typeof publicData.moveCount === "number" ? publicData.moveCount : 0;
    if (publicData.solved === true) {
      return `Solved in ${moveCount} move${moveCount === 1 ? "" : "s"}`;
    }
    return moveCount === 0 ? null : `${moveCount} moves made`;
  },

  parseInput(raw: string, _publicData: Record<string, unknown>): Action | null {
    const trimmed = raw.trim();

    if (trimmed.toLowerCase() === "resign") {
      return { type: "resign", data: {} };
    }

    // Face letters are case-insensitive; the suffix is kept as typed
    const move = trimmed.charAt(0).toUpperCase() + trimmed.slice(1);
    if (isMoveName(move)) {
      return { type: "turn", data: { move } };
    }

    return null;
  },

  formatAction(action: Action): string {
    if (action.type === "turn" && typeof action.data.move === "string") {
      return action.data.move;
    }
    return action.type;
  },

  getPlayerLabel(
    _playerId: string,
    _publicData: Record<string, unknown>
  ): string {
    return "Solver";
  },
};
