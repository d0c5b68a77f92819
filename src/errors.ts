/**
 * Error types raised by validators.
 *
 * Failure channels
 * ----------------
 * 1. Boolean rejection: `test` never throws; an unsatisfied constraint is `false`.
 * 2. Coercion failure: `normalize` throws {@link CoercionError}.
 * 3. Construction misuse: constructors throw {@link ValidatorConfigError}
 *    immediately, never at `test` time.
 */

/**
 * Safely extracts an error message from an unknown thrown value.
 *
 * @param error
 *   Anything caught by a `catch` clause.
 * @returns
 *   The `message` of an `Error`, otherwise `String(error)`.
 */
export function extractErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Renders a value for error messages without ever throwing.
 *
 * `String(value)` throws for objects without a prototype, for proxies with
 * throwing traps and for symbols inside template literals.
 */
export function describeValue(value: unknown): string {
  if (typeof value === 'string') return JSON.stringify(value);
  if (typeof value === 'symbol') return value.toString();
  if (typeof value === 'function') return `[function ${value.name || 'anonymous'}]`;
  if (Array.isArray(value)) return `array(${value.length})`;
  try {
    return String(value);
  } catch {
    return `[${typeof value}]`;
  }
}

/**
 * Raised by `normalize` when a value has no canonical form under a validator.
 */
export class CoercionError extends Error {
  override readonly name = 'CoercionError';

  /**
   * The value that could not be coerced.
   */
  readonly value: unknown;

  /**
   * Display name of the validator that rejected the value.
   */
  readonly validatorName: string;

  constructor(
    validatorName: string,
    value: unknown,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super(
      `${validatorName} cannot coerce ${describeValue(value)}: ${reason}`,
      options
    );
    this.validatorName = validatorName;
    this.value = value;
  }
}

/**
 * Raised when a validator (or the configuration) is constructed with
 * arguments that can never describe a valid constraint.
 */
export class ValidatorConfigError extends Error {
  override readonly name = 'ValidatorConfigError';
}

/**
 * Raised by `validateAttribute` when a value is rejected for a named attribute.
 */
export class AttributeValueError extends Error {
  override readonly name = 'AttributeValueError';

  constructor(
    readonly attributeName: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`Invalid value for "${attributeName}": ${message}`, options);
  }
}
