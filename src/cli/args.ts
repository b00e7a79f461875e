/**
 * Command-line argument parsing.
 *
 * Options are recognised only before the first positional argument; from
 * there on every argument is input text, so words that begin with "-" can
 * still be expanded. "--" ends option parsing explicitly.
 */

import type { CliOptions } from '../types/acronym.types.js';
import { DEFAULT_WORDLIST_PATH, ENV_VARS } from '../utils/config.js';
import { ErrorCode, UsageError } from '../utils/error-handler.js';

export const PROGRAM_NAME = 'acronymize';

export type ParsedArgs =
  | { kind: 'help' }
  | { kind: 'run'; options: CliOptions };

interface ValueOption {
  key: 'wordlist' | 'seed';
  short: string;
  long: string;
}

const VALUE_OPTIONS: readonly ValueOption[] = [
  { key: 'wordlist', short: '-w', long: '--wordlist' },
  { key: 'seed', short: '-s', long: '--seed' },
];

export function usage(): string {
  return `Usage: ${PROGRAM_NAME} [-w WORDLIST] [-s SEED] [text...]

Expand each input word into random dictionary words, one per letter.

Options:
  -w, --wordlist PATH  Use a custom wordlist (default: ${DEFAULT_WORDLIST_PATH})
  -s, --seed SEED      Seed the random generator for reproducible output
  -h, --help           Show this help

Environment:
  ${ENV_VARS.WORDLIST.padEnd(18)}Alternative way to set the wordlist path (overridden by -w)
  ${ENV_VARS.SEED.padEnd(18)}Alternative way to set the seed (overridden by -s)
  ${ENV_VARS.DEBUG.padEnd(18)}Set to "true" for JSON diagnostics on stderr

Notes:
  - Non-alphabetic characters are ignored.
  - Output is one line per input word.
`;
}

/**
 * Parses argv (without the node and script entries).
 *
 * @throws {UsageError} UNKNOWN_OPTION or MISSING_OPTION_VALUE
 *
 * @example
 * ```typescript
 * parseArgs(['-w', 'words.txt', 'Make', 'Acronyms', 'Great']);
 * // { kind: 'run', options: { wordlist: 'words.txt', positionals: ['Make', 'Acronyms', 'Great'] } }
 * ```
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const options: CliOptions = { positionals: [] };
  let i = 0;

  while (i < argv.length) {
    const arg = argv[i];

    if (arg === '--') {
      i++;
      break;
    }
    // A lone "-" or anything without a leading dash starts the input text
    if (!arg.startsWith('-') || arg === '-') {
      break;
    }
    if (arg === '-h' || arg === '--help') {
      return { kind: 'help' };
    }

    const option = VALUE_OPTIONS.find(
      (candidate) =>
        arg === candidate.short ||
        arg === candidate.long ||
        arg.startsWith(`${candidate.long}=`) ||
        (arg.startsWith(candidate.short) && !arg.startsWith('--'))
    );
    if (!option) {
      throw new UsageError(ErrorCode.UNKNOWN_OPTION, `Unknown option: ${arg}`, {
        field: 'argv',
        received: arg,
      });
    }

    if (arg === option.short || arg === option.long) {
      const value = argv[i + 1];
      if (value === undefined) {
        throw new UsageError(
          ErrorCode.MISSING_OPTION_VALUE,
          `Option ${arg} requires an argument`,
          { field: option.key, expected: 'a value' }
        );
      }
      options[option.key] = value;
      i += 2;
      continue;
    }

    options[option.key] = arg.startsWith(`${option.long}=`)
      ? arg.slice(option.long.length + 1)
      : arg.slice(option.short.length);
    i++;
  }

  options.positionals = argv.slice(i);
  return { kind: 'run', options };
}
