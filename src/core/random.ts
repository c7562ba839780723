/**
 * Seeded random number generator (Park-Miller LCG) so that bag shuffles
 * replay identically for the same seed.
 */
export class SeededRandom {
  private seed: number;

  constructor(seed: number) {
    this.seed = seed;
  }

  /** Next value in [0, 1). */
  next(): number {
    const a = 16807;
    const m = 2147483647; // 2^31 - 1

    this.seed = (a * this.seed) % m;
    return this.seed / m;
  }

  /** Current generator state; feeding it back resumes the same sequence. */
  get state(): number {
    return this.seed;
  }
}

export function createSeededRandom(seed: number): SeededRandom {
  const safeSeed = Math.abs(Math.floor(seed)) % 2147483647 || 1;
  return new SeededRandom(safeSeed);
}

export function shuffleInPlace<T>(arr: T[], rng: () => number = Math.random): T[] {
  for (let i = arr.length - 1; i > 0; i -= 1) {
    const j = Math.floor(rng() * (i + 1));
    [arr[i], arr[j]] = [arr[j], arr[i]];
  }
  return arr;
}
