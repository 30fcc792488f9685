export { GameRegistry } from "./GameRegistry";
export { MatchOrchestrator } from "./MatchOrchestrator";
export type { MatchOrchestratorOptions, SubmitResult } from "./MatchOrchestrator";
export type { IGameModule, GameUISpec, PieceDisplay } from "./interfaces/IGameModule";
