/**
 * Input validation for the acronymize CLI.
 *
 * Validators return a ValidationResult instead of throwing, so callers can
 * decide how to report every problem; `assertValid` turns the first error
 * into a UsageError.
 */

import type { Token } from '../types/acronym.types.js';
import { ErrorCode, UsageError } from '../utils/error-handler.js';
import { countLetters, isBlank } from '../utils/tokenizer.js';

/**
 * Detailed validation error information.
 */
export interface ValidationError {
  /** Machine-readable error code */
  code: ErrorCode;
  /** Human-readable error message */
  message: string;
  /** Field name that caused the validation error */
  field: string;
  details?: {
    expected?: string;
    received?: unknown;
    [key: string]: unknown;
  };
}

/**
 * Result of a validation operation.
 */
export interface ValidationResult {
  isValid: boolean;
  errors: ValidationError[];
}

/**
 * Checks that some non-whitespace input text was supplied.
 */
export function validateInputText(text: string): ValidationResult {
  if (isBlank(text)) {
    return {
      isValid: false,
      errors: [
        {
          code: ErrorCode.MISSING_INPUT,
          message: 'No input text given.',
          field: 'text',
          details: { expected: 'one or more words', received: text },
        },
      ],
    };
  }
  return { isValid: true, errors: [] };
}

/**
 * Checks that the tokens carry at least one letter between them.
 */
export function validateTokens(tokens: readonly Token[]): ValidationResult {
  if (countLetters(tokens) === 0) {
    return {
      isValid: false,
      errors: [
        {
          code: ErrorCode.NO_INPUT_LETTERS,
          message: 'No alphabetic characters found in input.',
          field: 'text',
          details: {
            expected: 'at least one letter A-Z',
            received: tokens.map((token) => token.original).join(' '),
          },
        },
      ],
    };
  }
  return { isValid: true, errors: [] };
}

/**
 * Checks an explicit seed value. An absent seed is valid (fresh entropy).
 */
export function validateSeed(seed: string | undefined): ValidationResult {
  if (seed !== undefined && seed.trim().length === 0) {
    return {
      isValid: false,
      errors: [
        {
          code: ErrorCode.INVALID_SEED,
          message: 'Seed must not be empty.',
          field: 'seed',
          details: { expected: 'an integer or any non-empty text', received: seed },
        },
      ],
    };
  }
  return { isValid: true, errors: [] };
}

/**
 * Throws a UsageError for the first error in a failed result.
 */
export function assertValid(result: ValidationResult): void {
  const [first] = result.errors;
  if (!result.isValid && first) {
    throw new UsageError(first.code, first.message, {
      field: first.field,
      ...first.details,
    });
  }
}
