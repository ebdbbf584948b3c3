export interface RandomSource {
  /** Uniform integer in [0, bound). */
  nextInt(bound: number): number;
}

export interface RandomState {
  seed: number;
  callCount: number;
}

export class SeededRandom implements RandomSource {
  private seed: number;
  private initialSeed: number;
  private callCount: number = 0;

  constructor(seed: number) {
    this.seed = seed;
    this.initialSeed = seed;
  }

  // Mulberry32 PRNG - fast, good distribution
  next(): number {
    this.callCount++;
    let t = (this.seed += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  nextInt(bound: number): number {
    if (!Number.isInteger(bound) || bound <= 0) {
      throw new RangeError(`nextInt bound must be a positive integer, got ${bound}`);
    }
    return Math.floor(this.next() * bound);
  }

  getState(): RandomState {
    return {
      seed: this.initialSeed,
      callCount: this.callCount,
    };
  }
}

/**
 * Fisher-Yates shuffle. Returns a new array; the input is left untouched.
 */
export function shuffle<T>(items: readonly T[], random: RandomSource): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = random.nextInt(i + 1);
    const tmp = result[i];
    result[i] = result[j];
    result[j] = tmp;
  }
  return result;
}
