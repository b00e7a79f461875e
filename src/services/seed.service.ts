/**
 * Seed Service - PRNG seed derivation
 *
 * A run is seeded either from fresh entropy or from a value the user
 * supplies with --seed / ACRONYMIZE_SEED:
 * - Decimal integer text: used directly, truncated to 64 bits
 * - Any other text: SHA-256 digest, first 64 bits
 */

import crypto from 'crypto';

const HASH_ALGORITHM = 'sha256';
const SEED_ENCODING = 'hex';
const SEED_TO_INT64_CHARS = 16;
const ENTROPY_BYTES = 8;
const UINT64_MAX = 0xffffffffffffffffn;
const DECIMAL_REGEX = /^\d+$/;

export class SeedService {
  /**
   * Derives a 64-bit PRNG seed from user-supplied text.
   *
   * @throws {Error} If seed text is empty or whitespace-only
   *
   * @example
   * ```typescript
   * seeds.fromText('42');        // 42n
   * seeds.fromText('hello');     // first 64 bits of sha256('hello')
   * ```
   */
  fromText(seedText: string): bigint {
    const trimmed = seedText.trim();
    if (trimmed.length === 0) {
      throw new Error('seed must be a non-empty string');
    }

    if (DECIMAL_REGEX.test(trimmed)) {
      return BigInt(trimmed) & UINT64_MAX;
    }

    const digest = crypto
      .createHash(HASH_ALGORITHM)
      .update(trimmed)
      .digest(SEED_ENCODING);
    return this.seedToInt64(digest);
  }

  /** Fresh 64-bit seed from the OS entropy pool. */
  fromEntropy(): bigint {
    return this.seedToInt64(
      crypto.randomBytes(ENTROPY_BYTES).toString(SEED_ENCODING)
    );
  }

  /**
   * Converts the first 16 hex characters of a digest to a BigInt.
   *
   * @throws {Error} If seedHex is shorter than 16 characters
   */
  seedToInt64(seedHex: string): bigint {
    if (seedHex.length < SEED_TO_INT64_CHARS) {
      throw new Error(
        `seedHex must be at least ${SEED_TO_INT64_CHARS} characters long`
      );
    }

    return BigInt('0x' + seedHex.substring(0, SEED_TO_INT64_CHARS));
  }
}
