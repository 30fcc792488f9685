import { keccak256, toUtf8Bytes } from "ethers";
import { canonicalEncode } from "./Encoding";
import { TranscriptEntry } from "../types/match";

/**
 * Hash any JSON-compatible value using keccak256 over its canonical encoding.
 */
export function hashState(state: unknown): string {
  return keccak256(toUtf8Bytes(canonicalEncode(state)));
}

/**
 * Compute the hash chain link: H(prevHash || canonical(data)).
 */
export function chainHash(prevHash: string, data: unknown): string {
  return keccak256(toUtf8Bytes(prevHash + canonicalEncode(data)));
}

/**
 * Walk a list of transcript entries from `initialHash` and return the final
 * chain hash, or null if an entry's `prevHash` or `sequence` does not line up.
 */
export function replayChain(
  initialHash: string,
  entries: TranscriptEntry[]
): string | null {
  let current = initialHash;
  for (let i = 0; i < entries.length; i++) {
    const entry = entries[i];
    if (entry.sequence !== i || entry.prevHash !== current) return null;
    current = chainHash(current, entry);
  }
  return current;
}
