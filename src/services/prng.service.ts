/**
 * PRNG Service - Seedable Pseudo-Random Number Generator
 *
 * SplitMix64 expands a single 64-bit seed into the two state words of a
 * Xoroshiro128+ generator. The same seed always yields the same sequence,
 * which is what makes fixed-seed runs of the CLI reproducible.
 *
 * References:
 * - SplitMix64: https://prng.di.unimi.it/splitmix64.c
 * - Xoroshiro128+: https://prng.di.unimi.it/xoroshiro128plus.c
 *
 * @example
 * ```typescript
 * const prng = new PRNG(12345n);
 * const roll = prng.nextInt(6);            // 0..5
 * const order = prng.shuffle([0, 1, 2, 3]); // random permutation
 * ```
 */

import type { RandomSource } from '../types/acronym.types.js';

const UINT64_MAX = 0xffffffffffffffffn;
const UINT32_RANGE = 0x100000000;
const GOLDEN_GAMMA = 0x9e3779b97f4a7c15n;
const SPLITMIX64_CONST_1 = 0xbf58476d1ce4e5b9n;
const SPLITMIX64_CONST_2 = 0x94d049bb133111ebn;
const XOROSHIRO_ROTL_A = 24n;
const XOROSHIRO_ROTL_B = 37n;
const XOROSHIRO_SHIFT = 16n;
const BIGINT_64 = 64n;
const BIGINT_32 = 32n;

/**
 * Xoroshiro128+ generator seeded through SplitMix64.
 *
 * All state arithmetic is done on BigInt masked to 64 bits.
 */
export class PRNG implements RandomSource {
  private state0: bigint;
  private state1: bigint;

  /**
   * @param seed - 64-bit seed; wider values are truncated to their low 64 bits
   * @throws {Error} If seed is not a BigInt
   */
  constructor(seed: bigint) {
    if (typeof seed !== 'bigint') {
      throw new Error('seed must be a BigInt');
    }

    let sm = seed & UINT64_MAX;
    sm = (sm + GOLDEN_GAMMA) & UINT64_MAX;
    this.state0 = this.mix(sm);
    sm = (sm + GOLDEN_GAMMA) & UINT64_MAX;
    this.state1 = this.mix(sm);

    // An all-zero state would make the generator emit zeros forever
    if (this.state0 === 0n && this.state1 === 0n) {
      this.state1 = GOLDEN_GAMMA;
    }
  }

  /** SplitMix64 output function. */
  private mix(value: bigint): bigint {
    let z = value;
    z = ((z ^ (z >> 30n)) * SPLITMIX64_CONST_1) & UINT64_MAX;
    z = ((z ^ (z >> 27n)) * SPLITMIX64_CONST_2) & UINT64_MAX;
    return z ^ (z >> 31n);
  }

  private next(): bigint {
    const s0 = this.state0;
    let s1 = this.state1;
    const result = (s0 + s1) & UINT64_MAX;

    s1 ^= s0;
    this.state0 =
      (this.rotl(s0, XOROSHIRO_ROTL_A) ^ s1 ^ (s1 << XOROSHIRO_SHIFT)) &
      UINT64_MAX;
    this.state1 = this.rotl(s1, XOROSHIRO_ROTL_B);

    return result;
  }

  private rotl(x: bigint, k: bigint): bigint {
    return ((x << k) | (x >> (BIGINT_64 - k))) & UINT64_MAX;
  }

  /**
   * Uniform 32-bit unsigned integer, taken from the upper half of the
   * 64-bit output (the low bits of Xoroshiro128+ are the weakest).
   */
  nextUint(): number {
    return Number(this.next() >> BIGINT_32) >>> 0;
  }

  /**
   * Uniform integer in [0, bound).
   *
   * Uses rejection sampling so that every value is exactly equally likely,
   * instead of the slight bias a plain modulo would introduce.
   *
   * @throws {Error} If bound is not an integer in [1, 2^32]
   */
  nextInt(bound: number): number {
    if (!Number.isInteger(bound) || bound < 1 || bound > UINT32_RANGE) {
      throw new Error(`bound must be an integer between 1 and ${UINT32_RANGE}`);
    }

    const limit = UINT32_RANGE - (UINT32_RANGE % bound);
    let value = this.nextUint();
    while (value >= limit) {
      value = this.nextUint();
    }
    return value % bound;
  }

  /**
   * Fisher-Yates shuffle, walking from the last position down to the second
   * and swapping each with a uniformly chosen position at or before it.
   * Returns a new array; the input is left untouched.
   */
  shuffle<T>(array: readonly T[]): T[] {
    const result = [...array];
    for (let i = result.length - 1; i > 0; i--) {
      const j = this.nextInt(i + 1);
      [result[i], result[j]] = [result[j], result[i]];
    }
    return result;
  }
}
