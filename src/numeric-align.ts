import { ValidatorConfigError } from './errors';
import { isRecord } from './guards';
import { isIntegerValue, isStringValue } from './utils/type-guards';

/**
 * Text anchor that aligns a column of numbers on their decimal point.
 */
export type NumericAlign = {
  readonly kind: 'numeric';

  /**
   * Character to align on; the last occurrence in the text is used.
   */
  readonly decimalPoint: string;

  /**
   * Number of characters expected after the decimal point.
   */
  readonly decimalLength: number;
};

/**
 * Creates a frozen {@link NumericAlign} anchor.
 *
 * @throws {ValidatorConfigError} If `decimalPoint` is empty or
 * `decimalLength` is not a non-negative integer.
 */
export function numericAlign(decimalPoint = '.', decimalLength = 0): NumericAlign {
  if (decimalPoint.length === 0) {
    throw new ValidatorConfigError('numericAlign needs a decimal point character.');
  }
  if (!Number.isInteger(decimalLength) || decimalLength < 0) {
    throw new ValidatorConfigError(
      `numericAlign needs a non-negative integer decimal length, got ${decimalLength}.`
    );
  }
  const anchor: NumericAlign = { kind: 'numeric', decimalPoint, decimalLength };
  return Object.freeze(anchor);
}

/**
 * Type guard for {@link NumericAlign}.
 */
export function isNumericAlign(value: unknown): value is NumericAlign {
  return (
    isRecord(value) &&
    value.kind === 'numeric' &&
    isStringValue(value.decimalPoint) &&
    value.decimalPoint.length > 0 &&
    isIntegerValue(value.decimalLength) &&
    value.decimalLength >= 0
  );
}
