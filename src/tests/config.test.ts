import { describe, expect, test } from 'vitest';

import { LOG_LEVEL_ENV, loadConfig, parseStringEnv } from '../config';
import { ValidatorConfigError } from '../errors';
import { createLogger, createLoggerFromEnv } from '../logger';

describe('loadConfig', () => {
  test('keeps logging silent by default', () => {
    expect(loadConfig({})).toEqual({ logLevel: 'silent' });
  });

  test('reads the level case-insensitively', () => {
    expect(loadConfig({ [LOG_LEVEL_ENV]: ' DEBUG ' })).toEqual({ logLevel: 'debug' });
  });

  test('treats a blank level as unset', () => {
    expect(loadConfig({ [LOG_LEVEL_ENV]: '   ' })).toEqual({ logLevel: 'silent' });
  });

  test('refuses unknown levels', () => {
    expect(() => loadConfig({ [LOG_LEVEL_ENV]: 'loud' })).toThrow(ValidatorConfigError);
    expect(() => loadConfig({ [LOG_LEVEL_ENV]: 'loud' })).toThrow(
      /^Invalid configuration: logLevel: /
    );
  });
});

describe('parseStringEnv', () => {
  test.for([
    ['unset', {}, undefined],
    ['blank', { KEY: ' ' }, undefined],
    ['padded', { KEY: ' value ' }, 'value']
  ] as const)('%s', ([, env, expected]) => {
    expect(parseStringEnv(env, 'KEY')).toBe(expected);
  });
});

describe('createLogger', () => {
  test('applies the configured level', () => {
    const logger = createLogger({ logLevel: 'warn' });
    expect(logger.level).toBe('warn');
  });

  test('reuses the root logger until a configuration is given', () => {
    const first = createLogger({ logLevel: 'error' });
    expect(createLogger()).toBe(first);
    expect(createLogger({ logLevel: 'info' })).not.toBe(first);
  });

  test('falls back to warn on an invalid level instead of throwing', () => {
    const lines: string[] = [];
    const logger = createLoggerFromEnv(
      { [LOG_LEVEL_ENV]: 'loud' },
      {
        write(line: string) {
          lines.push(line);
        }
      }
    );

    expect(logger.level).toBe('warn');
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0])).toMatchObject({
      level: 40,
      name: 'attr-validators',
      variable: 'ATTR_VALIDATORS_LOG_LEVEL',
      msg: 'ignoring invalid logging configuration, using level "warn"'
    });
  });

  test('builds from a valid environment without reporting anything', () => {
    const lines: string[] = [];
    const logger = createLoggerFromEnv(
      { [LOG_LEVEL_ENV]: 'info' },
      {
        write(line: string) {
          lines.push(line);
        }
      }
    );

    expect(logger.level).toBe('info');
    expect(lines).toHaveLength(0);
  });
});
