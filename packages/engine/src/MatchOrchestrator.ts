import {
  GameState,
  Action,
  Outcome,
  Observation,
  TranscriptEntry,
  MatchTranscript,
  TranscriptBuilder,
} from "@pocketsolve/core";
import { IGameModule } from "./interfaces/IGameModule";

export interface MatchOrchestratorOptions<TData> {
  game: IGameModule<TData>;
  players: string[];
  matchId: string;
  rngSeed?: string;
  settings?: Record<string, unknown>;
}

export interface SubmitResult {
  observation: Observation;
  terminal: boolean;
  outcome?: Outcome;
}

/**
 * Drives a single match: checks turn order, validates actions,
 * applies state transitions and records the transcript.
 */
export class MatchOrchestrator<TData = unknown> {
  private readonly game: IGameModule<TData>;
  private readonly matchId: string;
  private state: GameState<TData>;
  private transcript: TranscriptBuilder;

  constructor(opts: MatchOrchestratorOptions<TData>) {
    this.game = opts.game;
    this.matchId = opts.matchId;

    const config = {
      gameId: opts.game.gameId,
      version: "0.1.0",
      settings: opts.settings,
    };
    this.state = opts.game.init(config, opts.players, opts.rngSeed || "0");
    this.transcript = new TranscriptBuilder(this.matchId, this.game.gameId, this.state);
  }

  getMatchId(): string {
    return this.matchId;
  }

  getState(): GameState<TData> {
    return this.state;
  }

  getCurrentPlayer(): string {
    return this.state.currentPlayer;
  }

  isTerminal(): boolean {
    return this.game.isTerminal(this.state);
  }

  getOutcome(): Outcome {
    return this.game.getOutcome(this.state);
  }

  getObservation(playerId: string): Observation {
    return this.game.getObservation(this.state, playerId);
  }

  getLegalActions(playerId: string): Action[] {
    return this.game.getLegalActions(this.state, playerId);
  }

  getTranscript(): TranscriptEntry[] {
    return this.transcript.getEntries();
  }

  getFullTranscript(): MatchTranscript {
    return this.transcript.getTranscript();
  }

  /**
   * Submit an action. Returns the acting player's new observation, or throws
   * if the match is over, it is not the player's turn or the action is invalid.
   */
  submitAction(playerId: string, action: Action): SubmitResult {
    if (this.isTerminal()) {
      throw new Error("Game is already over");
    }

    if (this.state.currentPlayer !== playerId) {
      throw new Error(
        `Not your turn. Current player: ${this.state.currentPlayer}`
      );
    }

    if (!this.game.validateAction(this.state, playerId, action)) {
      throw new Error("Invalid action");
    }

    this.state = this.game.applyAction(this.state, playerId, action);
    this.transcript.addEntry(playerId, action, this.state);

    const terminal = this.game.isTerminal(this.state);
    const observation = this.game.getObservation(this.state, playerId);

    return {
      observation,
      terminal,
      outcome: terminal ? this.game.getOutcome(this.state) : undefined,
    };
  }
}
