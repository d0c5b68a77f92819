import type { Logger } from 'pino';

import { Validator, type ValidatorOptions } from '../core/validator';
import { ValidatorConfigError, extractErrorMessage } from '../errors';
import { createLogger } from '../logger';
import { isStringValue } from '../utils/type-guards';

export type PatternOptions = ValidatorOptions & {
  /**
   * Logger receiving a `debug` record per tested value.
   * Defaults to a child of the library logger, which is silent unless
   * `ATTR_VALIDATORS_LOG_LEVEL` says otherwise.
   */
  logger?: Logger;
};

/**
 * Converts a value to the text the pattern is matched against.
 * Returns `undefined` for values whose conversion throws
 * (e.g. `Object.create(null)`).
 */
function toText(value: unknown): string | undefined {
  if (isStringValue(value)) return value;
  try {
    return String(value);
  } catch {
    return undefined;
  }
}

function compilePattern(pattern: RegExp | string): RegExp {
  if (pattern instanceof RegExp) {
    // `g` and `y` make `search` depend on `lastIndex`; drop them.
    return new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ''));
  }
  try {
    return new RegExp(pattern);
  } catch (error) {
    throw new ValidatorConfigError(
      `Invalid pattern ${JSON.stringify(pattern)}: ${extractErrorMessage(error)}`,
      { cause: error }
    );
  }
}

/**
 * Values whose text representation matches a regular expression at its start.
 *
 * The match is anchored at the beginning only: `/\d+/` accepts `"12px"`.
 * Non-strings are matched through `String(value)`, and that text is what
 * `normalize` returns.
 */
export class MatchesPattern extends Validator<string> {
  readonly pattern: RegExp;
  private readonly log: Logger;

  constructor(pattern: RegExp | string, options: PatternOptions = {}) {
    const compiled = compilePattern(pattern);
    super({ ...options, name: options.name ?? `MatchesPattern(${compiled})` });
    this.pattern = compiled;
    this.log = options.logger ?? createLogger().child({ module: 'pattern' });
  }

  protected check(value: unknown): boolean {
    return this.match(value) !== undefined;
  }

  protected coerce(value: unknown): string {
    const text = this.match(value);
    if (text === undefined) {
      throw this.fail(value, `must match ${this.pattern}`);
    }
    return text;
  }

  /**
   * Returns the text of `value` if it matches, otherwise `undefined`.
   */
  private match(value: unknown): string | undefined {
    const text = toText(value);
    this.log.debug(
      { text, pattern: String(this.pattern) },
      'testing value against pattern'
    );
    // The leftmost match starts at 0 iff some match starts at 0.
    return text !== undefined && text.search(this.pattern) === 0
      ? text
      : undefined;
  }
}
