/**
 * Output formatting for acronym lines.
 *
 * Words are title-cased by uppercasing only the first character; the rest
 * keeps its dictionary case, so "McIntosh" or "iPhone"-style entries survive.
 */

import type { DrawResult, Token } from '../types/acronym.types.js';

/**
 * Anything that can draw a word for a letter.
 */
export interface LetterDrawer {
  draw(letter: string): DrawResult;
}

export function titleCase(word: string): string {
  if (word.length === 0) return word;
  return word.charAt(0).toUpperCase() + word.slice(1);
}

/** Placeholder for a letter with no dictionary words, e.g. "(no-match:z)". */
export function noMatchPlaceholder(letter: string): string {
  return `(no-match:${letter})`;
}

export function renderDraw(result: DrawResult): string {
  return titleCase(
    result.kind === 'word' ? result.word : noMatchPlaceholder(result.letter)
  );
}

/**
 * Draws one word per letter of the token and joins them with single spaces.
 *
 * @returns The output line, or null when the token has no letters
 */
export function formatToken(token: Token, drawer: LetterDrawer): string | null {
  if (token.length === 0) {
    return null;
  }

  const words: string[] = [];
  for (const letter of token.letters) {
    words.push(renderDraw(drawer.draw(letter)));
  }
  return words.join(' ');
}

/** Joins lines, terminating each with a newline. */
export function formatOutput(lines: readonly string[]): string {
  return lines.map((line) => `${line}\n`).join('');
}
