import { GameConfig, GameState, Action, Outcome, Observation } from "@pocketsolve/core";

export interface PieceDisplay {
  /** Character drawn for the piece or sticker (e.g. "■", "w") */
  symbol: string;
  /** Short text label (e.g. "white") */
  label: string;
}

/**
 * Rendering hooks a game module ships so the CLI can draw and drive any
 * game without per-game code.
 */
export interface GameUISpec {
  /** Player role labels in order (e.g. ["Solver"]) */
  playerLabels: string[];

  /** Map of piece/mark identifiers to display info */
  pieces: Record<string, PieceDisplay>;

  /** Hint text shown to the current player (e.g. "Enter a move such as R or U'") */
  inputHint: string;

  /** Max possible turns, or null if unbounded. Used for "move N/M" display. */
  maxTurns: number | null;

  /** Render the board as an ASCII string from publicData. */
  renderBoard(publicData: Record<string, unknown>): string;

  /** Render a one-line status string (e.g. "Solved in 4 moves"), or null if nothing special. */
  renderStatus(publicData: Record<string, unknown>): string | null;

  /** Parse raw user input into an Action, or return null if invalid. */
  parseInput(raw: string, publicData: Record<string, unknown>): Action | null;

  /** Format an Action as a human-readable string for move history (e.g. "R'"). */
  formatAction(action: Action): string;

  /** Get the display label for a player given the observation's publicData. */
  getPlayerLabel(playerId: string, publicData: Record<string, unknown>): string;
}

/**
 * The functions every game module implements. `TData` is the module's own
 * shape for `GameState.data`.
 *
 * Every function must be deterministic given the same inputs, so that a
 * transcript can be replayed and verified.
 */
export interface IGameModule<TData = unknown> {
  /** Unique identifier for this game (e.g., "pocketcube") */
  readonly gameId: string;

  /** Human-readable name */
  readonly name: string;

  /** Short description of the game */
  readonly description: string;

  /** Number of players required */
  readonly minPlayers: number;
  readonly maxPlayers: number;

  /** How clients render this game */
  readonly ui?: GameUISpec;

  /** Initialize a new game state */
  init(config: GameConfig, players: string[], rngSeed: string): GameState<TData>;

  /** Check if an action is valid in the current state */
  validateAction(state: GameState<TData>, playerId: string, action: Action): boolean;

  /** Apply an action and return the new state (must be deterministic) */
  applyAction(state: GameState<TData>, playerId: string, action: Action): GameState<TData>;

  /** Check if the game has ended */
  isTerminal(state: GameState<TData>): boolean;

  /** Get the outcome of a game state (in-progress states report that as the reason) */
  getOutcome(state: GameState<TData>): Outcome;

  /** Get the observable state for a specific player (hides private info) */
  getObservation(state: GameState<TData>, playerId: string): Observation;

  /** Get all legal actions for a player in the current state */
  getLegalActions(state: GameState<TData>, playerId: string): Action[];
}
