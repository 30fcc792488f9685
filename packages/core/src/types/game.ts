export interface GameConfig {
  gameId: string;
  version: string;
  /** Module-specific settings (e.g. `{ scrambleLength: 8 }`) */
  settings?: Record<string, unknown>;
}

/**
 * Full state of one game. `data` is owned by the game module and is
 * never inspected by the engine beyond hashing it into the transcript.
 */
export interface GameState<TData = unknown> {
  gameId: string;
  players: string[];
  currentPlayer: string;
  turnNumber: number;
  data: TData;
}

export interface Action {
  type: string;
  data: Record<string, unknown>;
}

export interface Outcome {
  winner: string | null;
  draw: boolean;
  scores: Record<string, number>;
  reason: string;
}

/** What a single player is allowed to see of a GameState. */
export interface Observation {
  gameId: string;
  players: string[];
  currentPlayer: string;
  turnNumber: number;
  publicData: Record<string, unknown>;
  privateData?: Record<string, unknown>;
}
