/**
 * Runtime configuration resolution.
 *
 * Precedence for every setting: command-line option, then environment
 * variable (including entries loaded from .env), then built-in default.
 */

import type { AcronymizeConfig, CliOptions } from '../types/acronym.types.js';

export const DEFAULT_WORDLIST_PATH = '/usr/share/dict/words';

export const ENV_VARS = {
  WORDLIST: 'WORDLIST',
  SEED: 'ACRONYMIZE_SEED',
  DEBUG: 'DEBUG_ACRONYMIZE',
} as const;

type Env = Record<string, string | undefined>;

/** Environment values count as unset when empty. */
function readEnv(env: Env, name: string): string | undefined {
  const value = env[name];
  return value !== undefined && value.length > 0 ? value : undefined;
}

export function resolveConfig(
  options: Pick<CliOptions, 'wordlist' | 'seed'>,
  env: Env = process.env
): AcronymizeConfig {
  return {
    wordlistPath:
      options.wordlist ??
      readEnv(env, ENV_VARS.WORDLIST) ??
      DEFAULT_WORDLIST_PATH,
    seed: options.seed ?? readEnv(env, ENV_VARS.SEED),
  };
}
