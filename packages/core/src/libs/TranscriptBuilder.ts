import { TranscriptEntry, MatchTranscript } from "../types/match";
import { hashState, chainHash, replayChain } from "./Crypto";

/**
 * Builds a hash-chained record of every action applied during a match.
 * Each entry links to everything before it through `prevHash`.
 */
export class TranscriptBuilder {
  private readonly matchId: string;
  private readonly gameId: string;
  private readonly initialHash: string;
  private entries: TranscriptEntry[] = [];
  private currentHash: string;

  constructor(matchId: string, gameId: string, initialState: unknown) {
    this.matchId = matchId;
    this.gameId = gameId;
    this.initialHash = hashState(initialState);
    this.currentHash = this.initialHash;
  }

  addEntry(
    playerId: string,
    action: unknown,
    newState: unknown,
    timestamp: number = Date.now()
  ): TranscriptEntry {
    const entry: TranscriptEntry = {
      sequence: this.entries.length,
      playerId,
      action,
      stateHash: hashState(newState),
      prevHash: this.currentHash,
      timestamp,
    };

    this.currentHash = chainHash(this.currentHash, entry);
    this.entries.push(entry);

    return entry;
  }

  getEntries(): TranscriptEntry[] {
    return [...this.entries];
  }

  getTranscript(): MatchTranscript {
    return {
      matchId: this.matchId,
      gameId: this.gameId,
      initialHash: this.initialHash,
      entries: this.getEntries(),
      rootHash: this.currentHash,
    };
  }

  getCurrentHash(): string {
    return this.currentHash;
  }

  getEntryCount(): number {
    return this.entries.length;
  }
}

/** True when the transcript's entries chain from its initial hash to its root hash. */
export function verifyTranscript(transcript: MatchTranscript): boolean {
  return replayChain(transcript.initialHash, transcript.entries) === transcript.rootHash;
}
