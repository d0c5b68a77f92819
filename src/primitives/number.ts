import { Validator, type ValidatorOptions } from '../core/validator';
import { ValidatorConfigError } from '../errors';
import {
  isBooleanValue,
  isIntegerValue,
  isNumberValue,
  isSafeBigInt,
  isStringValue
} from '../utils/type-guards';

/**
 * Decimal float syntax: optional sign, digits with an optional fraction (or a
 * bare fraction), optional exponent. Single underscores may group digits.
 */
const FLOAT_PATTERN =
  /^[+-]?(?:\d(?:_?\d)*(?:\.(?:\d(?:_?\d)*)?)?|\.\d(?:_?\d)*)(?:[eE][+-]?\d(?:_?\d)*)?$/;

const SPECIAL_FLOAT_PATTERN = /^([+-]?)(inf|infinity|nan)$/i;

const INTEGER_PATTERN = /^[+-]?\d(?:_?\d)*$/;

/**
 * Parses float text. Returns `undefined` when the text is not a float.
 */
export function parseFloatText(text: string): number | undefined {
  const trimmed = text.trim();

  const special = SPECIAL_FLOAT_PATTERN.exec(trimmed);
  if (special) {
    const [, sign, word] = special;
    if (word?.toLowerCase() === 'nan') return NaN;
    return sign === '-' ? -Infinity : Infinity;
  }

  if (!FLOAT_PATTERN.test(trimmed)) return undefined;
  return Number(trimmed.replaceAll('_', ''));
}

/**
 * Parses base-10 integer text. Returns `undefined` when the text is not an
 * integer (`"3.0"` is not) or lies outside the safe integer range, the same
 * bound that applies to bigints.
 */
export function parseIntegerText(text: string): number | undefined {
  const trimmed = text.trim();
  if (!INTEGER_PATTERN.test(trimmed)) return undefined;
  const result = Number(trimmed.replaceAll('_', ''));
  return Number.isSafeInteger(result) ? result : undefined;
}

/**
 * Float coercion: numbers as is, booleans as 0/1, float text.
 */
export function coerceFloat(value: unknown): number | undefined {
  if (isNumberValue(value)) return value;
  if (isBooleanValue(value)) return Number(value);
  if (isStringValue(value)) return parseFloatText(value);
  return undefined;
}

/**
 * Integer coercion: integral numbers as is, other finite numbers truncated
 * toward zero, booleans as 0/1, bigints within the safe range, integer text.
 */
export function coerceInteger(value: unknown): number | undefined {
  if (isIntegerValue(value)) return value;
  if (isNumberValue(value)) {
    return Number.isFinite(value) ? Math.trunc(value) : undefined;
  }
  if (isBooleanValue(value)) return Number(value);
  if (isSafeBigInt(value)) return Number(value);
  if (isStringValue(value)) return parseIntegerText(value);
  return undefined;
}

/**
 * Numbers, or values that coerce to one.
 *
 * Coercion tries float parsing first and falls back to integer coercion, so
 * `"3.5"` gives `3.5`, `"3"` gives `3` and `10n` gives `10`.
 */
export class NumberValidator extends Validator<number> {
  protected check(value: unknown): boolean {
    if (isNumberValue(value)) return true;
    return this.normalizeTest(value);
  }

  protected coerce(value: unknown): number {
    const result = coerceFloat(value) ?? coerceInteger(value);
    if (result === undefined) {
      throw this.fail(value, 'must be a number');
    }
    return result;
  }
}

/**
 * Integers, as integral numbers, bigints or integer strings.
 */
export class IntegerValidator extends Validator<number> {
  protected check(value: unknown): boolean {
    const isCandidate =
      isStringValue(value) || isIntegerValue(value) || isSafeBigInt(value);
    return isCandidate && this.normalizeTest(value);
  }

  protected coerce(value: unknown): number {
    const result = coerceInteger(value);
    if (result === undefined) {
      throw this.fail(value, 'must be an integer');
    }
    return result;
  }
}

/**
 * Numbers within the inclusive range `[min, max]`, after number coercion.
 */
export class NumberInRange extends NumberValidator {
  constructor(
    readonly min: number,
    readonly max: number,
    options: ValidatorOptions = {}
  ) {
    super({ ...options, name: options.name ?? `NumberInRange(${min}, ${max})` });

    if (Number.isNaN(min) || Number.isNaN(max) || min > max) {
      throw new ValidatorConfigError(
        `NumberInRange needs min <= max, got [${min}, ${max}].`
      );
    }
  }

  protected override check(value: unknown): boolean {
    return this.normalizeTest(value);
  }

  protected override coerce(value: unknown): number {
    const result = super.coerce(value);
    if (!(this.min <= result && result <= this.max)) {
      throw this.fail(value, `must be between ${this.min} and ${this.max}`);
    }
    return result;
  }
}
