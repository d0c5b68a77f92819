/**
 * Determines whether a value is "absent".
 *
 * Attribute values arrive from untyped callers, where both `null` and
 * `undefined` mean "no value". Every validator that accepts absence accepts
 * both.
 *
 * @param value
 *   Candidate runtime value.
 * @returns
 *   `true` if `value` is `null` or `undefined`; otherwise `false`.
 */
export function isAbsent(value: unknown): value is null | undefined {
  return value === null || value === undefined;
}

/**
 * Checks whether a value is a sequence.
 *
 * Only arrays are sequences. Strings are deliberately excluded: a string is
 * a scalar attribute value, never a list of characters.
 *
 * @typeParam T  Assumed element type (defaults to `unknown`).
 * @param value  Value to test.
 * @returns      `true` if `value` is an array.
 */
export function isSequence<T = unknown>(value: unknown): value is readonly T[] {
  return Array.isArray(value);
}

/**
 * Narrowing helper for "object-like" values.
 *
 * Many type guards start from `unknown`. This helper provides a safe first step:
 * it checks that the value is a non-null object so properties can be read without
 * runtime errors and without type assertions.
 *
 * @param value
 *   Unknown value to test.
 * @returns
 *   `true` if `value` is a non-null object; otherwise `false`.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Checks whether an object carries a brand symbol set to `true`.
 *
 * Brands are registered with `Symbol.for`, so a value created by one copy of
 * this library is recognized by another copy loaded side by side.
 *
 * @param value
 *   Unknown value to test.
 * @param brand
 *   The brand symbol to look for.
 * @returns
 *   `true` if `value` is an object whose `brand` property is `true`.
 */
export function hasBrand<B extends symbol>(
  value: unknown,
  brand: B
): value is Record<B, true> {
  return typeof value === 'object' && value !== null && brand in value
    ? Reflect.get(value, brand) === true
    : false;
}
