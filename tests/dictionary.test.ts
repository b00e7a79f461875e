/**
 * Dictionary Service Tests
 *
 * Covers possessive trimming, first-letter bucketing, needed-letter pruning
 * and wordlist reading failures.
 */

import { describe, it, expect, afterEach, beforeEach, vi } from 'vitest';
import fs from 'fs';
import {
  DictionaryService,
  bucketKey,
  trimPossessive,
} from '../src/services/dictionary.service.js';
import {
  ErrorCode,
  WordlistUnreadableError,
} from '../src/utils/error-handler.js';
import { TempWordlists } from './helpers/temp-wordlist.js';

describe('trimPossessive', () => {
  it("should strip a trailing 's", () => {
    expect(trimPossessive("dog's")).toBe('dog');
  });

  it('should strip only one occurrence', () => {
    expect(trimPossessive("boss's")).toBe('boss');
    expect(trimPossessive("boss's's")).toBe("boss's");
  });

  it('should leave other endings alone', () => {
    expect(trimPossessive('dogs')).toBe('dogs');
    expect(trimPossessive("DOG'S")).toBe("DOG'S");
    expect(trimPossessive("o'clock")).toBe("o'clock");
    expect(trimPossessive("dogs'")).toBe("dogs'");
  });

  it("should reduce a bare 's to empty", () => {
    expect(trimPossessive("'s")).toBe('');
  });
});

describe('bucketKey', () => {
  it('should lowercase the first character', () => {
    expect(bucketKey('Apple')).toBe('a');
    expect(bucketKey('apple')).toBe('a');
  });

  it('should return null for empty words', () => {
    expect(bucketKey('')).toBeNull();
  });
});

describe('DictionaryService', () => {
  let dictionary: DictionaryService;
  let temp: TempWordlists;

  beforeEach(() => {
    dictionary = new DictionaryService();
    temp = new TempWordlists();
  });

  afterEach(() => {
    temp.cleanup();
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
  });

  describe('buildIndex()', () => {
    it('should bucket words by lowercase first letter in file order', () => {
      const index = dictionary.buildIndex([
        'apple',
        'Banana',
        'Avocado',
        'berry',
        'apricot',
      ]);

      expect(index.get('a')).toEqual(['apple', 'Avocado', 'apricot']);
      expect(index.get('b')).toEqual(['Banana', 'berry']);
      expect(index.size).toBe(2);
    });

    it('should index trimmed possessives in original case', () => {
      const index = dictionary.buildIndex(["Dog's", "boss's", 'cat']);

      expect(index.get('d')).toEqual(['Dog']);
      expect(index.get('b')).toEqual(['boss']);
    });

    it('should skip empty lines and lines that trim to empty', () => {
      const index = dictionary.buildIndex(['', "'s", 'kiwi', '']);

      expect([...index.keys()]).toEqual(['k']);
    });

    it('should keep only needed letters when a set is supplied', () => {
      const index = dictionary.buildIndex(
        ['apple', 'banana', 'cherry', 'date'],
        new Set(['a', 'c'])
      );

      expect([...index.keys()].sort()).toEqual(['a', 'c']);
      expect(index.has('b')).toBe(false);
    });

    it('should bucket non-letter first characters under their own key', () => {
      const index = dictionary.buildIndex(['3D', '-ish', 'zebra']);

      expect(index.get('3')).toEqual(['3D']);
      expect(index.get('-')).toEqual(['-ish']);
    });

    it('should return the same buckets with or without pruning', () => {
      const lines = ['Alpha', 'beta', "gamma's", 'Aleph', 'bravo'];
      const pruned = dictionary.buildIndex(lines, new Set(['a', 'g']));
      const full = dictionary.buildIndex(lines);

      expect(pruned.get('a')).toEqual(full.get('a'));
      expect(pruned.get('g')).toEqual(full.get('g'));
    });
  });

  describe('readWordlist()', () => {
    it('should split lines and drop carriage returns', () => {
      const path = temp.write('crlf.txt', ['one', "two's", 'three'], '\r\n');

      expect(dictionary.readWordlist(path)).toEqual([
        'one',
        "two's",
        'three',
        '',
      ]);
    });

    it('should throw WordlistUnreadableError for a missing file', () => {
      const path = temp.missing();

      expect(() => dictionary.readWordlist(path)).toThrow(
        WordlistUnreadableError
      );
      expect(() => dictionary.readWordlist(path)).toThrow(
        `Wordlist not readable: ${path}`
      );
    });

    it('should throw WordlistUnreadableError for a directory', () => {
      try {
        dictionary.readWordlist(temp.dir);
        expect.unreachable('readWordlist should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(WordlistUnreadableError);
        if (error instanceof WordlistUnreadableError) {
          expect(error.code).toBe(ErrorCode.WORDLIST_UNREADABLE);
          expect(error.path).toBe(temp.dir);
        }
      }
    });

    it('should throw WordlistUnreadableError without read permission', () => {
      const path = temp.write('locked.txt', ['secret']);
      const denied = Object.assign(new Error('EACCES: permission denied'), {
        code: 'EACCES',
      });
      vi.spyOn(fs, 'accessSync').mockImplementation(() => {
        throw denied;
      });

      try {
        dictionary.readWordlist(path);
        expect.unreachable('readWordlist should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(WordlistUnreadableError);
        if (error instanceof WordlistUnreadableError) {
          expect(error.path).toBe(path);
          expect(error.cause).toBe(denied);
        }
      }
    });

    it('should decode one character per byte', () => {
      // "café" in Latin-1, then "naïve" in UTF-8
      const path = temp.writeBytes('mixed.txt', [
        0x63, 0x61, 0x66, 0xe9, 0x0a, 0x6e, 0x61, 0xc3, 0xaf, 0x76, 0x65, 0x0a,
      ]);

      expect(dictionary.readWordlist(path)).toEqual([
        'caf\u00e9',
        'na\u00c3\u00afve',
        '',
      ]);
    });
  });

  describe('indexWordlist()', () => {
    it('should index lines read from a wordlist file', () => {
      const path = temp.write('words.txt', [
        'Apple',
        'Banana',
        'Cherry',
        "Dog's",
      ]);

      const index = dictionary.indexWordlist(
        dictionary.readWordlist(path),
        new Set(['a', 'd'])
      );

      expect(index.get('a')).toEqual(['Apple']);
      expect(index.get('d')).toEqual(['Dog']);
      expect(index.has('b')).toBe(false);
    });

    it('should log a summary when debug logging is enabled', () => {
      vi.stubEnv('DEBUG_ACRONYMIZE', 'true');
      const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
      const path = temp.write('words.txt', ['Apple', 'avocado', 'Banana']);

      dictionary.indexWordlist(dictionary.readWordlist(path), new Set(['a']));

      expect(spy).toHaveBeenCalledTimes(1);
      const record = JSON.parse(String(spy.mock.calls[0][0]));
      expect(record).toMatchObject({
        debug: 'indexWordlist:complete',
        lines: 4,
        needed: 'a',
        buckets: { a: 2 },
      });
    });
  });
});
