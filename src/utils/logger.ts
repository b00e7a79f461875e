/**
 * Structured diagnostics.
 *
 * Records are single-line JSON objects written to stderr, because stdout
 * carries the acronym output and must stay clean for piping.
 */

import { ENV_VARS } from './config.js';

/**
 * Check if debug logging is enabled via DEBUG_ACRONYMIZE environment variable.
 */
export function isDebugEnabled(): boolean {
  return process.env[ENV_VARS.DEBUG] === 'true';
}

/**
 * Emits a debug record when DEBUG_ACRONYMIZE=true.
 *
 * @example
 * ```typescript
 * logDebug('indexWordlist:complete', { lines: 235886, needed: 'ans' });
 * // {"debug":"indexWordlist:complete","lines":235886,"needed":"ans","timestamp":"..."}
 * ```
 */
export function logDebug(
  debug: string,
  fields: Record<string, unknown> = {}
): void {
  if (!isDebugEnabled()) {
    return;
  }

  // eslint-disable-next-line no-console
  console.error(
    JSON.stringify({
      debug,
      ...fields,
      timestamp: new Date().toISOString(),
    })
  );
}
