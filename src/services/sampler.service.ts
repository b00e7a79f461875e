/**
 * Letter Sampler Service - Low-repetition random word draws per letter
 *
 * Each letter owns a bucket holding its candidate words, a shuffled
 * permutation of their indices and a cursor into that permutation. Draws
 * consume the permutation in order; once the last entry is consumed the
 * bucket is reshuffled and the cursor reset, so within one pass over a
 * bucket of n words no word repeats.
 *
 * Consecutive passes are shuffled independently: the last word of one pass
 * may equal the first word of the next.
 *
 * @example
 * ```typescript
 * const sampler = new LetterSamplerService(index, new PRNG(7n));
 * sampler.draw('n'); // { kind: 'word', letter: 'n', word: 'nebula' }
 * sampler.draw('z'); // { kind: 'no-match', letter: 'z' } when index has no 'z' words
 * ```
 */

import type {
  BucketStats,
  DrawResult,
  LetterBucket,
  RandomSource,
  WordIndex,
} from '../types/acronym.types.js';
import { logDebug } from '../utils/logger.js';

export class LetterSamplerService {
  private readonly buckets = new Map<string, LetterBucket>();
  private readonly random: RandomSource;

  /**
   * @param index - First-letter word index; buckets are copied, not aliased
   * @param random - Shuffles every permutation
   */
  constructor(index: WordIndex, random: RandomSource) {
    this.random = random;
    for (const [letter, words] of index) {
      if (words.length === 0) continue;
      this.buckets.set(letter, {
        candidates: [...words],
        permutation: [],
        cursor: 0,
        shuffles: 0,
      });
    }
  }

  /**
   * Draws the next word for a letter.
   *
   * @param letter - Bucket key, a single lowercase letter
   * @returns The drawn word, or a no-match result when the bucket is empty
   */
  draw(letter: string): DrawResult {
    const bucket = this.buckets.get(letter);
    if (!bucket) {
      return { kind: 'no-match', letter };
    }

    if (bucket.shuffles === 0) {
      this.reshuffle(letter, bucket);
    }

    const word = bucket.candidates[bucket.permutation[bucket.cursor]];
    bucket.cursor++;

    if (bucket.cursor >= bucket.permutation.length) {
      this.reshuffle(letter, bucket);
    }

    return { kind: 'word', letter, word };
  }

  /**
   * Snapshot of a letter's bucket; candidates is 0 for letters with no words.
   */
  stats(letter: string): BucketStats {
    const bucket = this.buckets.get(letter);
    return {
      letter,
      candidates: bucket ? bucket.candidates.length : 0,
      cursor: bucket ? bucket.cursor : 0,
      shuffles: bucket ? bucket.shuffles : 0,
    };
  }

  private reshuffle(letter: string, bucket: LetterBucket): void {
    const indices = Array.from(bucket.candidates, (_, i) => i);
    bucket.permutation = this.random.shuffle(indices);
    bucket.cursor = 0;
    bucket.shuffles++;

    logDebug('sampler:reshuffle', {
      letter,
      candidates: bucket.candidates.length,
      pass: bucket.shuffles,
    });
  }
}
