import { pino } from 'pino';
import { afterEach, describe, expect, test, vi } from 'vitest';

import { ValidatorConfigError } from '../../errors';
import { MatchesPattern } from '../pattern';

/**
 * Builds a logger that writes JSON lines into an array.
 */
function createCapturingLogger(level: string) {
  const lines: string[] = [];
  const logger = pino(
    { level },
    {
      write(line: string) {
        lines.push(line);
      }
    }
  );
  return { lines, logger };
}

describe('MatchesPattern', () => {
  const { logger } = createCapturingLogger('silent');
  const isDigits = new MatchesPattern(/\d+/, { logger });

  test('matches at the start of the text only', () => {
    expect(isDigits.test('12px')).toBe(true);
    expect(isDigits.test('px12')).toBe(false);
  });

  test('matches non-strings through their text representation', () => {
    expect(isDigits.test(42)).toBe(true);
    expect(isDigits.test(null)).toBe(false);
    expect(isDigits.normalize(42)).toBe('42');
  });

  test('rejects values without a text representation', () => {
    expect(isDigits.test(Object.create(null))).toBe(false);
  });

  test('ignores global and sticky flags between calls', () => {
    const isA = new MatchesPattern(/a/gy, { logger });
    expect(isA.test('abc')).toBe(true);
    expect(isA.test('abc')).toBe(true);
  });

  test('compiles string sources', () => {
    const isWord = new MatchesPattern('[a-z]+', { logger });
    expect(isWord.test('abc1')).toBe(true);
    expect(isWord.test('1abc')).toBe(false);
  });

  test('refuses invalid sources at construction', () => {
    expect(() => new MatchesPattern('(', { logger })).toThrow(
      ValidatorConfigError
    );
  });

  test('reports the rejected value', () => {
    expect(() => isDigits.normalize('px')).toThrow(
      'MatchesPattern(/\\d+/) cannot coerce "px": must match /\\d+/'
    );
  });

  test('logs each tested value at debug level', () => {
    const capture = createCapturingLogger('debug');
    const traced = new MatchesPattern(/\d+/, { logger: capture.logger });

    traced.test('12');

    expect(capture.lines).toHaveLength(1);
    expect(JSON.parse(capture.lines[0])).toMatchObject({
      level: 20,
      msg: 'testing value against pattern',
      text: '12',
      pattern: '/\\d+/'
    });
  });

  test('stays quiet at the default silent level', () => {
    const capture = createCapturingLogger('silent');
    new MatchesPattern(/\d+/, { logger: capture.logger }).test('12');
    expect(capture.lines).toHaveLength(0);
  });

  describe('without an injected logger', () => {
    afterEach(() => {
      vi.unstubAllEnvs();
    });

    test('constructs and tests under an invalid log level setting', () => {
      vi.stubEnv('ATTR_VALIDATORS_LOG_LEVEL', 'loud');

      const isDigits = new MatchesPattern(/\d+/);
      expect(isDigits.test('12')).toBe(true);
    });
  });
});
