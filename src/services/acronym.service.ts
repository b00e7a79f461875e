/**
 * Acronym Service - Main orchestrator for acronym expansion
 *
 * Coordinates the pipeline that turns input text into one line of random
 * dictionary words per input token:
 * 1. Read the wordlist once; fail if it cannot be opened
 * 2. Tokenize and sanitize the input; fail if it has no letters
 * 3. Index the wordlist, keeping only the letters the input needs
 * 4. Draw one word per letter occurrence through the letter sampler
 * 5. Title-case and join each token's words into a line
 *
 * @example
 * ```typescript
 * const service = new AcronymService(new PRNG(42n));
 * service.expand('NASA rocks', '/usr/share/dict/words');
 * // ['Nebula Arching Sparrow Antic', 'Ruminate Odd Cabin Kettle Salty']
 * ```
 */

import type { RandomSource, Token, WordIndex } from '../types/acronym.types.js';
import { assertValid, validateTokens } from '../validation/input.validation.js';
import { formatToken } from '../utils/formatter.js';
import { logDebug } from '../utils/logger.js';
import { collectNeededLetters, tokenize } from '../utils/tokenizer.js';
import { DictionaryService } from './dictionary.service.js';
import { LetterSamplerService } from './sampler.service.js';

export class AcronymService {
  private readonly random: RandomSource;
  private readonly dictionary: DictionaryService;

  /**
   * @param random - Randomness for every bucket shuffle; pass a seeded PRNG
   *   for reproducible output
   * @param dictionary - Wordlist reader and indexer
   */
  constructor(
    random: RandomSource,
    dictionary: DictionaryService = new DictionaryService()
  ) {
    this.random = random;
    this.dictionary = dictionary;
  }

  /**
   * Tokenizes input text and checks it carries at least one letter.
   *
   * @throws {UsageError} NO_INPUT_LETTERS if no token has a letter
   */
  parseInput(text: string): Token[] {
    const tokens = tokenize(text);
    assertValid(validateTokens(tokens));
    return tokens;
  }

  /**
   * Expands text against the wordlist at the given path.
   *
   * An unreadable wordlist is reported before input without letters.
   *
   * @returns One line per token that has letters, in input order
   * @throws {WordlistUnreadableError} If the wordlist cannot be read
   * @throws {UsageError} If the input has no letters
   */
  expand(text: string, wordlistPath: string): string[] {
    const lines = this.dictionary.readWordlist(wordlistPath);
    const tokens = this.parseInput(text);
    const needed = collectNeededLetters(tokens);
    const index = this.dictionary.indexWordlist(lines, needed);
    return this.expandTokens(tokens, index);
  }

  /**
   * Expands already-parsed tokens against an in-memory index.
   * A fresh sampler is used per call, so buckets start unshuffled.
   */
  expandTokens(tokens: readonly Token[], index: WordIndex): string[] {
    const sampler = new LetterSamplerService(index, this.random);
    const lines: string[] = [];

    for (const token of tokens) {
      const line = formatToken(token, sampler);
      if (line !== null) {
        lines.push(line);
      }
    }

    logDebug('expand:complete', {
      tokens: tokens.length,
      lines: lines.length,
      skipped: tokens.length - lines.length,
    });

    return lines;
  }
}
