import {
  GameConfig,
  GameState,
  Action,
  Outcome,
  Observation,
} from "@pocketsolve/core";
import { IGameModule } from "@pocketsolve/engine";
import { PocketCubeUI } from "./ui";
import { PocketCubeData, isSolvedState } from "./state";
import { applyMove } from "./moves";
import {
  isTurnAction,
  isResignAction,
  canAct,
  getLegalActionsForPlayer,
} from "./actions";
import { getObservationForPlayer } from "./observation";
import { scrambleCube } from "./scramble";
import { SeededRng } from "./prng";

export const DEFAULT_SCRAMBLE_LENGTH = 8;
export const MAX_SCRAMBLE_LENGTH = 50;

function readScrambleLength(config: GameConfig): number {
  const setting = config.settings?.scrambleLength;
  if (setting === undefined) return DEFAULT_SCRAMBLE_LENGTH;
  if (
    typeof setting !== "number" ||
    !Number.isInteger(setting) ||
    setting < 1 ||
    setting > MAX_SCRAMBLE_LENGTH
  ) {
    throw new Error(
      `Invalid scrambleLength: ${String(setting)}. Must be an integer from 1 to ${MAX_SCRAMBLE_LENGTH}.`
    );
  }
  return setting;
}

export const PocketCubeModule: IGameModule<PocketCubeData> = {
  gameId: "pocketcube",
  name: "Pocket Cube",
  description:
    "2x2x2 twisty puzzle. Turn the faces until every face shows a single colour.",
  minPlayers: 1,
  maxPlayers: 1,
  ui: PocketCubeUI,

  init(config: GameConfig, players: string[], rngSeed: string): GameState<PocketCubeData> {
    if (players.length !== 1) {
      throw new Error("Pocket cube requires exactly 1 player");
    }

    const scramble = scrambleCube(readScrambleLength(config), new SeededRng(rngSeed));

    return {
      gameId: config.gameId,
      players,
      currentPlayer: players[0],
      turnNumber: 0,
      data: {
        cube: scramble.state,
        scramble: scramble.moves,
        history: [],
        resigned: false,
      },
    };
  },

  validateAction(
    state: GameState<PocketCubeData>,
    playerId: string,
    action: Action
  ): boolean {
    if (!canAct(state, playerId)) return false;
    return isTurnAction(action) || isResignAction(action);
  },

  applyAction(
    state: GameState<PocketCubeData>,
    _playerId: string,
    action: Action
  ): GameState<PocketCubeData> {
    const data = state.data;

    if (isResignAction(action)) {
      return {
        ...state,
        turnNumber: state.turnNumber + 1,
        data: { ...data, resigned: true },
      };
    }

    if (isTurnAction(action)) {
      const { move } = action.data;
      return {
        ...state,
        turnNumber: state.turnNumber + 1,
        data: {
          ...data,
          cube: applyMove(data.cube, move),
          history: [...data.history, move],
        },
      };
    }

    throw new Error("Invalid action type");
  },

  isTerminal(state: GameState<PocketCubeData>): boolean {
    return state.data.resigned || isSolvedState(state.data.cube);
  },

  getOutcome(state: GameState<PocketCubeData>): Outcome {
    const player = state.players[0];

    if (state.data.resigned) {
      return {
        winner: null,
        draw: false,
        scores: { [player]: 0 },
        reason: "resigned",
      };
    }

    if (isSolvedState(state.data.cube)) {
      return {
        winner: player,
        draw: false,
        scores: { [player]: 1 },
        reason: "puzzle_solved",
      };
    }

    return {
      winner: null,
      draw: false,
      scores: {},
      reason: "game_in_progress",
    };
  },

  getObservation(state: GameState<PocketCubeData>, playerId: string): Observation {
    return getObservationForPlayer(state, playerId);
  },

  getLegalActions(state: GameState<PocketCubeData>, playerId: string): Action[] {
    return getLegalActionsForPlayer(state, playerId);
  },
};
