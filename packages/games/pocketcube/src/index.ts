export { PocketCubeModule, DEFAULT_SCRAMBLE_LENGTH, MAX_SCRAMBLE_LENGTH } from "./rules";
export { PocketCubeUI, renderNet } from "./ui";
export * from "./state";
export * from "./moves";
export * from "./notation";
export * from "./solver";
export * from "./scramble";
export * from "./errors";
export { SeededRng, randomSeed } from "./prng";
export { isTurnAction, isResignAction, turn } from "./actions";
export type { TurnAction, ResignAction } from "./actions";
