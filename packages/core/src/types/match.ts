export interface TranscriptEntry {
  sequence: number;
  playerId: string;
  action: unknown;
  /** Hash of the state after the action was applied */
  stateHash: string;
  /** Chain hash of everything before this entry */
  prevHash: string;
  timestamp: number;
}

export interface MatchTranscript {
  matchId: string;
  gameId: string;
  /** Hash of the state the match started from */
  initialHash: string;
  entries: TranscriptEntry[];
  rootHash: string;
}
