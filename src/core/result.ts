import type { CoercionError } from '../errors';

/**
 * Represents a successful normalization.
 *
 * Note:
 * `value` may legitimately be `null` or `undefined` (e.g. under `NoneOr`);
 * this is distinct from failure (`success: false`).
 */
export type NormalizeSuccess<T> = {
  /**
   * Discriminant flag indicating the coercion succeeded.
   */
  success: true;

  /**
   * The canonical value.
   */
  value: T;
};

/**
 * Represents a failed normalization.
 */
export type NormalizeFailure = {
  /**
   * Discriminant flag indicating the coercion failed.
   */
  success: false;

  /**
   * Why the value has no canonical form.
   */
  error: CoercionError;
};

/**
 * Discriminated union representing the outcome of `safeNormalize`.
 *
 * Pattern:
 * - `success: true`  => a canonical value is available
 * - `success: false` => coercion failed, with the error that `normalize` threw
 */
export type NormalizeResult<T = unknown> = NormalizeSuccess<T> | NormalizeFailure;

/**
 * Constructs a successful normalization result.
 */
export function normalized<T>(value: T): NormalizeSuccess<T> {
  return { success: true, value };
}

/**
 * Constructs a failed normalization result.
 */
export function rejected(error: CoercionError): NormalizeFailure {
  return { success: false, error };
}
