/** Uniform integer source; the only randomness the rule engine consumes. */
export interface RandomSource {
  /** Integer in `[0, maxExclusive)`. */
  nextInt(maxExclusive: number): number;
}

export const mathRandom: RandomSource = {
  nextInt: (maxExclusive) => Math.floor(Math.random() * maxExclusive),
};

/**
 * Deterministic Lehmer LCG, for reproducible resolutions.
 */
export class SeededRandom implements RandomSource {
  private static readonly MODULUS = 2147483647;
  private static readonly MULTIPLIER = 48271;

  private state: number;

  constructor(seed: number) {
    this.state = SeededRandom.normalizeSeed(seed);
  }

  /** Next float in `[0, 1)`. */
  next(): number {
    this.state = (this.state * SeededRandom.MULTIPLIER) % SeededRandom.MODULUS;
    return (this.state - 1) / (SeededRandom.MODULUS - 1);
  }

  nextInt(maxExclusive: number): number {
    return Math.floor(this.next() * maxExclusive);
  }

  private static normalizeSeed(seed: number): number {
    const modulus = SeededRandom.MODULUS;
    let normalized = Math.floor(seed) % modulus;

    if (normalized <= 0) {
      normalized += modulus - 1;
    }

    return normalized;
  }
}

/** Always yields `value` (clamped into range); used to pin rare-outcome draws. */
export function constantRandom(value: number): RandomSource {
  return {
    nextInt: (maxExclusive) => Math.min(Math.max(0, Math.floor(value)), maxExclusive - 1),
  };
}
