/**
 * Seedable xorshift32 PRNG. The seed string is hashed into the 32-bit
 * starting state, so the same seed always yields the same scramble.
 */
export class SeededRng {
  private state: number;

  constructor(seed: string) {
    this.state = SeededRng.hashString(seed);
    // short seeds hash to small states whose first outputs are tiny
    for (let i = 0; i < 8; i++) this.next();
  }

  private static hashString(s: string): number {
    let hash = 0;
    for (let i = 0; i < s.length; i++) {
      hash = ((hash << 5) - hash + s.charCodeAt(i)) | 0;
    }
    // xorshift is stuck at 0
    return hash === 0 ? 1 : hash >>> 0;
  }

  /** Next pseudo-random unsigned 32-bit integer */
  next(): number {
    let x = this.state;
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    this.state = x >>> 0;
    return this.state;
  }

  /** Float in [0, 1) */
  nextFloat(): number {
    return this.next() / 4294967296;
  }

  /** Integer in [0, max) */
  nextInt(max: number): number {
    return Math.floor(this.nextFloat() * max);
  }

  /** Uniformly chosen element of a non-empty list */
  pick<T>(items: readonly T[]): T {
    if (items.length === 0) {
      throw new RangeError("Cannot pick from an empty list");
    }
    return items[this.nextInt(items.length)];
  }
}

/** Seed from the wall clock, for callers that do not need reproducible output */
export function randomSeed(): string {
  return `${Date.now()}-${Math.floor(Math.random() * 1e9)}`;
}
