export type Guard<T> = (value: unknown) => value is T;

/**
 * A value exposing an invocation capability.
 *
 * Functions, arrow functions, bound methods and class constructors all
 * qualify; the check is `typeof value === "function"`.
 */
export type Callable = (...args: never[]) => unknown;

/**
 * Mapping of JavaScript `typeof` results to corresponding TypeScript types.
 * Used by the {@link is} factory.
 */
type PrimitiveTypeMap = {
  boolean: boolean;
  number: number;
  bigint: bigint;
  string: string;
  symbol: symbol;
  undefined: undefined;
  function: Callable;
};

/**
 * Creates a guard for a built-in `typeof` check.
 *
 * @template T  One of the keys of {@link PrimitiveTypeMap}.
 * @param type  The type keyword to compare against `typeof value`.
 * @returns     A guard that returns `true` iff `typeof value === type`.
 */
export function is<T extends keyof PrimitiveTypeMap>(
  type: T
): Guard<PrimitiveTypeMap[T]> {
  return (value: unknown): value is PrimitiveTypeMap[T] =>
    typeof value === type;
}

/** Guard verifying the value is a string. */
export const isStringValue = is('string');

/** Guard verifying the value is a number (including NaN/Infinity). */
export const isNumberValue = is('number');

/** Guard verifying the value is a boolean. */
export const isBooleanValue = is('boolean');

/** Guard verifying the value is a bigint. */
export const isBigIntValue = is('bigint');

/** Guard verifying the value is callable. */
export const isCallableValue = is('function');

/**
 * Guard verifying the value is an integral number.
 *
 * JavaScript has no separate integer type, so `3.0` qualifies: it is the
 * same value as `3`.
 */
export function isIntegerValue(value: unknown): value is number {
  return isNumberValue(value) && Number.isInteger(value);
}

/**
 * Guard verifying a bigint fits in a double without losing precision.
 */
export function isSafeBigInt(value: unknown): value is bigint {
  return (
    isBigIntValue(value) &&
    value <= BigInt(Number.MAX_SAFE_INTEGER) &&
    value >= BigInt(Number.MIN_SAFE_INTEGER)
  );
}
