/**
 * Dictionary Service - First-letter index over a line-oriented wordlist
 *
 * Reads the wordlist once, synchronously, and buckets every entry by the
 * lowercase form of its first character. A single trailing possessive
 * "'s" is trimmed from each entry first, so "dog's" is indexed as "dog".
 *
 * The file is decoded as Latin-1, one character per byte, so entries in any
 * ASCII-compatible encoding reach stdout byte for byte (see processIO).
 *
 * When a needed-letter set is supplied, entries for other letters are
 * skipped. This only saves memory; the sampled output is the same either way.
 *
 * @example
 * ```typescript
 * const dictionary = new DictionaryService();
 * const lines = dictionary.readWordlist('/usr/share/dict/words');
 * const index = dictionary.indexWordlist(lines, new Set(['n', 'a', 's']));
 * index.get('n'); // ['Nab', 'nabob', ...]
 * ```
 */

import fs from 'fs';
import type { WordIndex } from '../types/acronym.types.js';
import { WordlistUnreadableError } from '../utils/error-handler.js';
import { logDebug } from '../utils/logger.js';

export const POSSESSIVE_SUFFIX = "'s";
export const WORDLIST_ENCODING: BufferEncoding = 'latin1';
const LINE_BREAK_REGEX = /\r?\n/;

/**
 * Remove one trailing apostrophe + lowercase "s".
 *
 * @example
 * trimPossessive("dog's")    // "dog"
 * trimPossessive("boss's's") // "boss's"
 * trimPossessive("DOG'S")    // "DOG'S" (uppercase S is left alone)
 */
export function trimPossessive(line: string): string {
  return line.endsWith(POSSESSIVE_SUFFIX)
    ? line.slice(0, -POSSESSIVE_SUFFIX.length)
    : line;
}

/** Lowercase first character of the word, or null for an empty word. */
export function bucketKey(word: string): string | null {
  return word.length > 0 ? word.charAt(0).toLowerCase() : null;
}

export class DictionaryService {
  /**
   * Reads the wordlist and splits it into lines.
   *
   * @throws {WordlistUnreadableError} If the path is missing, is a directory,
   *   or lacks read permission
   */
  readWordlist(path: string): string[] {
    let content: string;
    try {
      fs.accessSync(path, fs.constants.R_OK);
      content = fs.readFileSync(path, WORDLIST_ENCODING);
    } catch (error) {
      throw new WordlistUnreadableError(path, error);
    }

    return content.split(LINE_BREAK_REGEX);
  }

  /**
   * Buckets lines by first letter, preserving file order within each bucket.
   *
   * @param lines - Wordlist lines, one candidate per line
   * @param needed - Letters to keep; every letter is kept when omitted
   */
  buildIndex(lines: Iterable<string>, needed?: ReadonlySet<string>): WordIndex {
    const index: WordIndex = new Map();

    for (const line of lines) {
      const word = trimPossessive(line);
      const key = bucketKey(word);
      if (key === null) continue;
      if (needed && !needed.has(key)) continue;

      const bucket = index.get(key);
      if (bucket) {
        bucket.push(word);
      } else {
        index.set(key, [word]);
      }
    }

    return index;
  }

  /**
   * Indexes lines returned by readWordlist and logs a summary of the buckets.
   */
  indexWordlist(
    lines: readonly string[],
    needed?: ReadonlySet<string>
  ): WordIndex {
    const index = this.buildIndex(lines, needed);

    logDebug('indexWordlist:complete', {
      lines: lines.length,
      needed: needed ? Array.from(needed).sort().join('') : null,
      buckets: Object.fromEntries(
        Array.from(index, ([letter, words]): [string, number] => [
          letter,
          words.length,
        ])
      ),
    });

    return index;
  }
}
