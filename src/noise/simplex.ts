import alea from 'alea';
import { createNoise2D } from 'simplex-noise';
import type { NoiseFunction2D } from 'simplex-noise';

/**
 * Build a seeded 2D simplex noise function returning values in [-1, 1].
 * The permutation table is drawn from an alea PRNG keyed by the seed,
 * so the same seed always yields the same field.
 */
export function createSeededNoise(seed: number): NoiseFunction2D {
  return createNoise2D(alea(seed));
}

/**
 * Per-render cache of seeded noise functions.
 * Building a permutation table is far more expensive than sampling it,
 * so every render owns one bank and drops it when done.
 */
export class NoiseBank {
  private sources: Map<number, NoiseFunction2D> = new Map();

  sample(x: number, y: number, seed: number): number {
    let source = this.sources.get(seed);
    if (!source) {
      source = createSeededNoise(seed);
      this.sources.set(seed, source);
    }
    return source(x, y);
  }

  get size(): number {
    return this.sources.size;
  }
}

/**
 * One-off sample. Rebuilds the permutation table on every call;
 * loops should go through a NoiseBank instead.
 */
export function noise2d(x: number, y: number, seed: number): number {
  return createSeededNoise(seed)(x, y);
}
