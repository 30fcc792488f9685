import { GameState, Observation } from "@pocketsolve/core";
import { PocketCubeData, isSolvedState } from "./state";

/**
 * The scramble stays out of publicData; only the moves the player made
 * are shown.
 */
export function getObservationForPlayer(
  state: GameState<PocketCubeData>,
  _playerId: string
): Observation {
  const data = state.data;

  return {
    gameId: state.gameId,
    players: state.players,
    currentPlayer: state.currentPlayer,
    turnNumber: state.turnNumber,
    publicData: {
      cube: [...data.cube],
      history: [...data.history],
      moveCount: data.history.length,
      solved: isSolvedState(data.cube),
      resigned: data.resigned,
    },
  };
}
