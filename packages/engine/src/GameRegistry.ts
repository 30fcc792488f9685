import { IGameModule } from "./interfaces/IGameModule";

/**
 * In-memory registry of available game modules, keyed by gameId.
 */
export class GameRegistry {
  private games = new Map<string, IGameModule>();

  register(game: IGameModule): void {
    if (this.games.has(game.gameId)) {
      throw new Error(`Game already registered: ${game.gameId}`);
    }
    this.games.set(game.gameId, game);
  }

  get(gameId: string): IGameModule | undefined {
    return this.games.get(gameId);
  }

  /** Like `get`, but throws for an unknown gameId. */
  require(gameId: string): IGameModule {
    const game = this.games.get(gameId);
    if (!game) {
      throw new Error(
        `Unknown game: ${gameId}. Available: ${this.ids().join(", ") || "(none)"}`
      );
    }
    return game;
  }

  list(): IGameModule[] {
    return Array.from(this.games.values());
  }

  ids(): string[] {
    return Array.from(this.games.keys());
  }

  has(gameId: string): boolean {
    return this.games.has(gameId);
  }
}
