/**
 * Error taxonomy and exit-code mapping for the acronymize CLI.
 *
 * Two kinds of failure reach the user:
 * - Usage errors (exit 2): nothing to expand, or the command line is malformed
 * - Runtime errors (exit 1): the wordlist cannot be read, or something unexpected
 *
 * A letter with no dictionary words is not an error; the sampler reports it
 * as a no-match draw and the formatter renders a placeholder.
 */

import { isDebugEnabled } from './logger.js';

/**
 * Machine-readable error codes.
 */
export enum ErrorCode {
  /** No input text was supplied, or it was whitespace only */
  MISSING_INPUT = 'MISSING_INPUT',
  /** Input contained no ASCII letters after sanitization */
  NO_INPUT_LETTERS = 'NO_INPUT_LETTERS',
  /** An option flag that the CLI does not recognise */
  UNKNOWN_OPTION = 'UNKNOWN_OPTION',
  /** An option that takes a value was given none */
  MISSING_OPTION_VALUE = 'MISSING_OPTION_VALUE',
  /** Seed value is empty */
  INVALID_SEED = 'INVALID_SEED',
  /** Wordlist path could not be opened for reading */
  WORDLIST_UNREADABLE = 'WORDLIST_UNREADABLE',
  /** Any failure not covered above */
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/**
 * Error classification, used for exit codes and log detail.
 */
export enum ErrorClass {
  USAGE_ERROR = 'USAGE_ERROR',
  RUNTIME_ERROR = 'RUNTIME_ERROR',
}

/**
 * Process exit codes.
 */
export const ExitCode = {
  SUCCESS: 0,
  RUNTIME_FAILURE: 1,
  USAGE: 2,
} as const;

export type ExitCodeValue = (typeof ExitCode)[keyof typeof ExitCode];

/**
 * Optional structured context attached to an error.
 */
export interface ErrorDetails {
  /** Option or field that caused the error */
  field?: string;
  /** Expected format or value */
  expected?: string;
  /** Actual value received */
  received?: unknown;
  [key: string]: unknown;
}

/**
 * Base class for every error the CLI reports deliberately.
 */
export class AcronymizeError extends Error {
  readonly code: ErrorCode;
  readonly details?: ErrorDetails;

  constructor(
    code: ErrorCode,
    message: string,
    details?: ErrorDetails,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'AcronymizeError';
    this.code = code;
    this.details = details;
  }
}

/**
 * Invalid invocation: reported with usage text, exit code 2.
 */
export class UsageError extends AcronymizeError {
  constructor(code: ErrorCode, message: string, details?: ErrorDetails) {
    super(code, message, details);
    this.name = 'UsageError';
  }
}

/**
 * The configured wordlist cannot be opened: exit code 1, no output.
 */
export class WordlistUnreadableError extends AcronymizeError {
  readonly path: string;

  constructor(path: string, cause?: unknown) {
    super(
      ErrorCode.WORDLIST_UNREADABLE,
      `Wordlist not readable: ${path}`,
      {
        field: 'wordlist',
        received: path,
        reason: cause instanceof Error ? cause.message : undefined,
      },
      { cause }
    );
    this.name = 'WordlistUnreadableError';
    this.path = path;
  }
}

const USAGE_CODES: readonly ErrorCode[] = [
  ErrorCode.MISSING_INPUT,
  ErrorCode.NO_INPUT_LETTERS,
  ErrorCode.UNKNOWN_OPTION,
  ErrorCode.MISSING_OPTION_VALUE,
  ErrorCode.INVALID_SEED,
];

/**
 * Classifies an error code as a usage error or a runtime error.
 */
export function classifyError(code: ErrorCode): ErrorClass {
  return USAGE_CODES.includes(code)
    ? ErrorClass.USAGE_ERROR
    : ErrorClass.RUNTIME_ERROR;
}

/**
 * Extracts the error code from any thrown value.
 * Values that are not AcronymizeError map to INTERNAL_ERROR.
 */
export function errorCodeOf(error: unknown): ErrorCode {
  return error instanceof AcronymizeError ? error.code : ErrorCode.INTERNAL_ERROR;
}

/**
 * Maps any thrown value to the process exit code.
 */
export function exitCodeFor(error: unknown): ExitCodeValue {
  return classifyError(errorCodeOf(error)) === ErrorClass.USAGE_ERROR
    ? ExitCode.USAGE
    : ExitCode.RUNTIME_FAILURE;
}

/**
 * Human-readable one-line message for stderr.
 */
export function formatErrorMessage(error: unknown): string {
  if (error instanceof AcronymizeError) {
    return error.message;
  }
  const message = error instanceof Error ? error.message : String(error);
  return `acronymize: ${message}`;
}

/**
 * Logs an error as a structured JSON record when debug logging is enabled.
 *
 * Runtime errors include the stack trace; usage errors are expected and
 * logged without one.
 */
export function logError(
  error: unknown,
  operation: string,
  metadata?: Record<string, unknown>
): void {
  if (!isDebugEnabled()) {
    return;
  }

  const errorCode = errorCodeOf(error);
  const errorClass = classifyError(errorCode);
  const errorStack = error instanceof Error ? error.stack : undefined;

  const logData = {
    operation,
    errorCode,
    errorClass,
    message: error instanceof Error ? error.message : String(error),
    details: error instanceof AcronymizeError ? error.details : undefined,
    metadata,
    ...(errorClass === ErrorClass.RUNTIME_ERROR && errorStack
      ? { stack: errorStack }
      : {}),
    timestamp: new Date().toISOString(),
  };

  // eslint-disable-next-line no-console
  console.error(`[${errorClass}]`, JSON.stringify(logData));
}
