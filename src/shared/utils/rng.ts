/**
 * Small deterministic PRNG (mulberry32) so that AI noise and random play
 * can be replayed from a seed in tests and soak runs.
 */
export class SeededRNG {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  /** Uniform float in [0, 1). */
  next(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  /** Uniform integer in [min, max). */
  nextInt(min: number, max: number): number {
    return min + Math.floor(this.next() * (max - min));
  }
}

export function generateGameSeed(): number {
  return Math.floor(Math.random() * 0x7fffffff);
}
