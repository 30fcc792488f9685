import { Action, GameState } from "@pocketsolve/core";
import { PocketCubeData, isSolvedState } from "./state";
import { MoveName, MOVE_ORDER, isMoveName } from "./moves";

/** Turn one face */
export interface TurnAction extends Action {
  type: "turn";
  data: { move: MoveName };
}

/** Resign action */
export interface ResignAction extends Action {
  type: "resign";
  data: Record<string, unknown>;
}

export function isTurnAction(action: Action): action is TurnAction {
  const move = action.data.move;
  return action.type === "turn" && typeof move === "string" && isMoveName(move);
}

export function isResignAction(action: Action): action is ResignAction {
  return action.type === "resign";
}

export function turn(move: MoveName): TurnAction {
  return { type: "turn", data: { move } };
}

/** True when the player may still act: it is their turn and the puzzle is open */
export function canAct(state: GameState<PocketCubeData>, playerId: string): boolean {
  return (
    state.currentPlayer === playerId &&
    !state.data.resigned &&
    !isSolvedState(state.data.cube)
  );
}

export function getLegalActionsForPlayer(
  state: GameState<PocketCubeData>,
  playerId: string
): Action[] {
  if (!canAct(state, playerId)) return [];

  const actions: Action[] = MOVE_ORDER.map(turn);
  actions.push({ type: "resign", data: {} });
  return actions;
}
