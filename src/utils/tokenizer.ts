import type { Token } from '../types/acronym.types.js';

// ASCII whitespace only; NBSP and other Unicode spaces stay inside tokens.
const WHITESPACE_REGEX = /[ \t\n\v\f\r]+/;
const BLANK_REGEX = /^[ \t\n\v\f\r]*$/;
const NON_LETTER_REGEX = /[^A-Za-z]/g;

/**
 * Reduce a raw token to its lowercase ASCII letters.
 * Idempotent: sanitizing an already-sanitized string returns it unchanged.
 *
 * @example
 * sanitizeToken("Don't-Panic!42") // "dontpanic"
 */
export function sanitizeToken(raw: string): string {
  return raw.replace(NON_LETTER_REGEX, '').toLowerCase();
}

/**
 * Split text on runs of ASCII whitespace and sanitize each piece.
 *
 * Tokens that sanitize to nothing are kept in position so that callers can
 * tell how many tokens the input had; they produce no output line.
 */
export function tokenize(text: string): Token[] {
  return text
    .split(WHITESPACE_REGEX)
    .filter((original) => original.length > 0)
    .map((original) => {
      const letters = sanitizeToken(original);
      return { original, letters, length: letters.length };
    });
}

/** True when the text is empty or holds only ASCII whitespace. */
export function isBlank(text: string): boolean {
  return BLANK_REGEX.test(text);
}

/** Distinct letters appearing across all tokens. */
export function collectNeededLetters(tokens: readonly Token[]): Set<string> {
  const needed = new Set<string>();
  for (const token of tokens) {
    for (const letter of token.letters) {
      needed.add(letter);
    }
  }
  return needed;
}

export function countLetters(tokens: readonly Token[]): number {
  return tokens.reduce((total, token) => total + token.length, 0);
}
