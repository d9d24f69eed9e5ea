/**
 * Seeded random number generation.
 *
 * The environment and every bot own their own SeededRandom so that a
 * given seed reproduces an episode exactly, and search never draws from
 * the live game's stream.
 */

import type { RandomSource } from './types.js';

/**
 * Mulberry32 PRNG with 32-bit state.
 */
export class SeededRandom implements RandomSource {
  private state: number;

  constructor(seed: number = Date.now()) {
    this.state = seed >>> 0;
  }

  /**
   * Restart the stream from a new seed.
   */
  reseed(seed: number): void {
    this.state = seed >>> 0;
  }

  /**
   * Generate next random number in [0, 1).
   */
  next(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let x = this.state;
    x = Math.imul(x ^ (x >>> 15), x | 1);
    x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
    return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
  }
}

/**
 * Uniformly pick one element. Throws on an empty array.
 */
export function pickOne<T>(items: readonly T[], rng: RandomSource): T {
  if (items.length === 0) throw new Error('pickOne called with empty array');
  const idx = Math.floor(rng.next() * items.length);
  return items[Math.min(idx, items.length - 1)];
}
