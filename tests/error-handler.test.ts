/**
 * Unit tests for error handling utilities.
 *
 * Tests cover:
 * - Error classification (usage vs runtime)
 * - Exit code mapping
 * - Error message formatting
 * - Structured error logging gated by DEBUG_ACRONYMIZE
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  AcronymizeError,
  ErrorClass,
  ErrorCode,
  ExitCode,
  UsageError,
  WordlistUnreadableError,
  classifyError,
  errorCodeOf,
  exitCodeFor,
  formatErrorMessage,
  logError,
} from '../src/utils/error-handler.js';

describe('Error Handler', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
  });

  describe('classifyError', () => {
    it('should classify input and option errors as USAGE_ERROR', () => {
      for (const code of [
        ErrorCode.MISSING_INPUT,
        ErrorCode.NO_INPUT_LETTERS,
        ErrorCode.UNKNOWN_OPTION,
        ErrorCode.MISSING_OPTION_VALUE,
        ErrorCode.INVALID_SEED,
      ]) {
        expect(classifyError(code)).toBe(ErrorClass.USAGE_ERROR);
      }
    });

    it('should classify wordlist and internal errors as RUNTIME_ERROR', () => {
      expect(classifyError(ErrorCode.WORDLIST_UNREADABLE)).toBe(
        ErrorClass.RUNTIME_ERROR
      );
      expect(classifyError(ErrorCode.INTERNAL_ERROR)).toBe(
        ErrorClass.RUNTIME_ERROR
      );
    });
  });

  describe('exitCodeFor', () => {
    it('should return 2 for usage errors', () => {
      const error = new UsageError(ErrorCode.NO_INPUT_LETTERS, 'no letters');
      expect(exitCodeFor(error)).toBe(ExitCode.USAGE);
      expect(exitCodeFor(error)).toBe(2);
    });

    it('should return 1 for an unreadable wordlist', () => {
      expect(exitCodeFor(new WordlistUnreadableError('/nope'))).toBe(1);
    });

    it('should return 1 for unexpected errors and non-Error values', () => {
      expect(exitCodeFor(new Error('boom'))).toBe(1);
      expect(exitCodeFor('boom')).toBe(1);
      expect(errorCodeOf(new TypeError('x'))).toBe(ErrorCode.INTERNAL_ERROR);
    });
  });

  describe('WordlistUnreadableError', () => {
    it('should carry the path, code and cause', () => {
      const cause = new Error('ENOENT: no such file or directory');
      const error = new WordlistUnreadableError('/tmp/words', cause);

      expect(error).toBeInstanceOf(AcronymizeError);
      expect(error.message).toBe('Wordlist not readable: /tmp/words');
      expect(error.code).toBe(ErrorCode.WORDLIST_UNREADABLE);
      expect(error.path).toBe('/tmp/words');
      expect(error.cause).toBe(cause);
      expect(error.details).toMatchObject({
        field: 'wordlist',
        reason: 'ENOENT: no such file or directory',
      });
    });
  });

  describe('formatErrorMessage', () => {
    it('should use the message of known errors as-is', () => {
      expect(formatErrorMessage(new WordlistUnreadableError('/w'))).toBe(
        'Wordlist not readable: /w'
      );
    });

    it('should prefix unexpected errors with the program name', () => {
      expect(formatErrorMessage(new Error('boom'))).toBe('acronymize: boom');
      expect(formatErrorMessage(42)).toBe('acronymize: 42');
    });
  });

  describe('logError', () => {
    it('should stay silent unless debug logging is enabled', () => {
      const spy = vi.spyOn(console, 'error').mockImplementation(() => {});

      logError(new Error('boom'), 'run');
      expect(spy).not.toHaveBeenCalled();
    });

    it('should log runtime errors with a stack trace', () => {
      vi.stubEnv('DEBUG_ACRONYMIZE', 'true');
      const spy = vi.spyOn(console, 'error').mockImplementation(() => {});

      logError(new WordlistUnreadableError('/w'), 'run', { argc: 1 });

      expect(spy).toHaveBeenCalledTimes(1);
      const [label, payload] = spy.mock.calls[0];
      expect(label).toBe('[RUNTIME_ERROR]');
      const record = JSON.parse(String(payload));
      expect(record).toMatchObject({
        operation: 'run',
        errorCode: 'WORDLIST_UNREADABLE',
        errorClass: 'RUNTIME_ERROR',
        message: 'Wordlist not readable: /w',
        metadata: { argc: 1 },
      });
      expect(typeof record.stack).toBe('string');
    });

    it('should log usage errors without a stack trace', () => {
      vi.stubEnv('DEBUG_ACRONYMIZE', 'true');
      const spy = vi.spyOn(console, 'error').mockImplementation(() => {});

      logError(new UsageError(ErrorCode.MISSING_INPUT, 'No input text given.'), 'run');

      const [label, payload] = spy.mock.calls[0];
      expect(label).toBe('[USAGE_ERROR]');
      expect(JSON.parse(String(payload))).not.toHaveProperty('stack');
    });
  });
});
