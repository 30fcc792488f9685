export * from "./types/game";
export * from "./types/match";
export * from "./libs/Encoding";
export * from "./libs/Crypto";
export { TranscriptBuilder, verifyTranscript } from "./libs/TranscriptBuilder";
