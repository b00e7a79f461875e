/**
 * CLI driver: argv + environment in, exit code out.
 *
 * Kept free of process globals so it can be exercised in-process by tests;
 * src/index.ts wires it to the real process.
 */

import type { CliIO } from '../types/acronym.types.js';
import { AcronymService } from '../services/acronym.service.js';
import { PRNG } from '../services/prng.service.js';
import { SeedService } from '../services/seed.service.js';
import { WORDLIST_ENCODING } from '../services/dictionary.service.js';
import { resolveConfig } from '../utils/config.js';
import {
  ExitCode,
  UsageError,
  exitCodeFor,
  formatErrorMessage,
  logError,
  type ExitCodeValue,
} from '../utils/error-handler.js';
import { formatOutput } from '../utils/formatter.js';
import { logDebug } from '../utils/logger.js';
import {
  assertValid,
  validateInputText,
  validateSeed,
} from '../validation/input.validation.js';
import { parseArgs, usage } from './args.js';

/**
 * Process sinks. Stdout is encoded back to Latin-1 so that wordlist bytes,
 * which the dictionary decodes one byte per character, are written unchanged.
 */
export const processIO: CliIO = {
  stdout: (chunk) => {
    process.stdout.write(Buffer.from(chunk, WORDLIST_ENCODING));
  },
  stderr: (chunk) => {
    process.stderr.write(chunk);
  },
};

/**
 * Runs one CLI invocation.
 *
 * Nothing is written to stdout unless every line was produced; on failure
 * stderr gets a message (plus usage for usage errors) and the exit code
 * reflects the failure class.
 */
export function run(
  argv: readonly string[],
  env: Record<string, string | undefined> = process.env,
  io: CliIO = processIO
): ExitCodeValue {
  try {
    const parsed = parseArgs(argv);
    if (parsed.kind === 'help') {
      io.stdout(usage());
      return ExitCode.SUCCESS;
    }

    const { options } = parsed;
    const config = resolveConfig(options, env);
    const text = options.positionals.join(' ');

    assertValid(validateInputText(text));
    assertValid(validateSeed(config.seed));

    const seeds = new SeedService();
    const seed =
      config.seed !== undefined
        ? seeds.fromText(config.seed)
        : seeds.fromEntropy();

    logDebug('run:start', {
      wordlistPath: config.wordlistPath,
      seed: seed.toString(),
      seedSource: config.seed !== undefined ? 'configured' : 'entropy',
    });

    const service = new AcronymService(new PRNG(seed));
    const lines = service.expand(text, config.wordlistPath);

    io.stdout(formatOutput(lines));
    return ExitCode.SUCCESS;
  } catch (error) {
    logError(error, 'run', { argc: argv.length });

    io.stderr(`${formatErrorMessage(error)}\n`);
    if (error instanceof UsageError) {
      io.stderr(`\n${usage()}`);
    }
    return exitCodeFor(error);
  }
}
