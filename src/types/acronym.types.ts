/**
 * TypeScript type definitions for the acronym expansion pipeline.
 * These types describe tokens, the first-letter word index, sampler state
 * and the resolved runtime configuration.
 */

/**
 * One whitespace-delimited unit of the input text.
 *
 * @example
 * { original: "N.A.S.A.", letters: "nasa", length: 4 }
 */
export interface Token {
  /** Raw token text as it appeared in the input */
  readonly original: string;
  /** Lowercase ASCII letters left after sanitization (may be empty) */
  readonly letters: string;
  /** Number of letters in `letters` */
  readonly length: number;
}

/**
 * Dictionary words bucketed by lowercase first letter.
 * Words keep their original case and file order.
 */
export type WordIndex = Map<string, string[]>;

/**
 * Per-letter shuffle state owned by the sampler.
 */
export interface LetterBucket {
  /** Candidate words for this letter, in file order */
  readonly candidates: readonly string[];
  /** Current permutation of candidate indices; empty until the first draw */
  permutation: number[];
  /** Position of the next unconsumed entry in `permutation` */
  cursor: number;
  /** Number of permutations generated so far */
  shuffles: number;
}

/** A word drawn for a letter. */
export interface WordDraw {
  kind: 'word';
  letter: string;
  word: string;
}

/** The letter's bucket has no candidates. */
export interface NoMatchDraw {
  kind: 'no-match';
  letter: string;
}

export type DrawResult = WordDraw | NoMatchDraw;

/**
 * Read-only snapshot of a letter bucket, for diagnostics.
 */
export interface BucketStats {
  letter: string;
  candidates: number;
  cursor: number;
  shuffles: number;
}

/**
 * Produces uniformly random permutations.
 */
export interface RandomSource {
  /** New array holding the items in a uniformly random order */
  shuffle<T>(items: readonly T[]): T[];
}

/**
 * Options collected from the command line.
 */
export interface CliOptions {
  /** Explicit wordlist path (-w / --wordlist) */
  wordlist?: string;
  /** Explicit seed (-s / --seed) */
  seed?: string;
  /** Positional arguments forming the input text */
  positionals: string[];
}

/**
 * Fully resolved runtime configuration.
 */
export interface AcronymizeConfig {
  /** Wordlist path after option > env > default resolution */
  wordlistPath: string;
  /** Seed text if one was supplied, otherwise undefined (fresh entropy) */
  seed?: string;
}

/**
 * Output sinks for a CLI run.
 */
export interface CliIO {
  stdout: (chunk: string) => void;
  stderr: (chunk: string) => void;
}
