import type { StandardSchemaV1 } from '@standard-schema/spec';

import { type DerivedValue, isDerivedValue } from '../deferred/derived-value';
import { CoercionError, extractErrorMessage } from '../errors';
import type { Guard } from '../utils/type-guards';
import { type NormalizeResult, normalized, rejected } from './result';

/**
 * Vendor tag reported through the Standard Schema interface.
 */
export const VENDOR = 'attr-validators';

export type ValidatorOptions = {
  /**
   * Display name used by `toString()` and in error messages.
   * Defaults to the class name.
   */
  name?: string;

  /**
   * Whether derived values (e.g. `inherit`) are accepted without testing.
   * Defaults to `true`.
   */
  acceptDeferred?: boolean;
};

/**
 * What `normalize` can produce: the canonical value, or a derived value
 * passed through untouched for a resolver to work out later.
 */
export type Normalized<T> = T | DerivedValue;

/**
 * Base contract of every validator.
 *
 * Subclasses supply two hooks:
 * - `check`: does the value satisfy the constraint, possibly after coercion?
 * - `coerce`: produce the canonical form, or throw via {@link Validator.fail}.
 *
 * The public methods wrap those hooks with the uniform semantics:
 *
 * | method          | deferred value           | other values                       |
 * |-----------------|--------------------------|------------------------------------|
 * | `test`          | `acceptDeferred`         | `check`, any throw becomes `false` |
 * | `normalize`     | returned untouched       | `coerce`                           |
 * | `normalizeTest` | `acceptDeferred`         | `true` iff `coerce` returns        |
 *
 * Instances are immutable once constructed and may be shared freely.
 *
 * Every validator is also a Standard Schema V1 object (`~standard`), so it can be
 * handed to any library that consumes Standard Schema.
 *
 * @template T - Canonical type produced by `normalize`.
 */
export abstract class Validator<T = unknown>
  implements StandardSchemaV1<unknown, Normalized<T>>
{
  readonly name: string;
  readonly acceptDeferred: boolean;

  constructor(options: ValidatorOptions = {}) {
    this.name = options.name ?? this.constructor.name;
    this.acceptDeferred = options.acceptDeferred ?? true;
  }

  /**
   * Decides whether `value` is acceptable. Never called with a derived value.
   */
  protected abstract check(value: unknown): boolean;

  /**
   * Produces the canonical form of `value`. Never called with a derived value.
   *
   * @throws {CoercionError} When `value` has no canonical form.
   */
  protected abstract coerce(value: unknown): T;

  /**
   * Returns whether `value` satisfies the constraint. Total: never throws.
   */
  test(value: unknown): boolean {
    if (isDerivedValue(value)) return this.acceptDeferred;

    try {
      return this.check(value);
    } catch {
      // A hostile value (throwing getter, revoked proxy) is simply rejected.
      return false;
    }
  }

  /**
   * Coerces `value` into its canonical form.
   *
   * @throws {CoercionError} When no canonical form exists.
   */
  normalize(value: unknown): Normalized<T> {
    if (isDerivedValue(value)) {
      if (this.acceptDeferred) return value;
      throw this.fail(value, 'derived values are not accepted');
    }
    return this.coerce(value);
  }

  /**
   * Returns `true` iff {@link Validator.normalize} succeeds.
   *
   * Every thrown value counts as failure, not only {@link CoercionError}:
   * coercion paths can also surface `TypeError`/`RangeError` from the values
   * themselves.
   */
  normalizeTest(value: unknown): boolean {
    try {
      this.normalize(value);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Non-throwing variant of {@link Validator.normalize}.
   */
  safeNormalize(value: unknown): NormalizeResult<Normalized<T>> {
    try {
      return normalized(this.normalize(value));
    } catch (error) {
      return rejected(
        error instanceof CoercionError
          ? error
          : this.fail(value, extractErrorMessage(error), error)
      );
    }
  }

  /**
   * Returns `test` as a standalone function, e.g. for `Array.prototype.filter`.
   */
  asPredicate(): (value: unknown) => boolean {
    return value => this.test(value);
  }

  get '~standard'(): StandardSchemaV1.Props<unknown, Normalized<T>> {
    return {
      version: 1,
      vendor: VENDOR,
      validate: value => {
        const result = this.safeNormalize(value);
        return result.success
          ? { value: result.value }
          : { issues: [{ message: result.error.message }] };
      }
    };
  }

  toString(): string {
    return this.name;
  }

  /**
   * Builds the error `coerce` implementations throw.
   */
  protected fail(value: unknown, reason: string, cause?: unknown): CoercionError {
    return new CoercionError(
      this.name,
      value,
      reason,
      cause === undefined ? undefined : { cause }
    );
  }
}

/**
 * Adapts a plain type guard to the validator contract.
 *
 * No coercion: accepted values normalize to themselves.
 */
export class GuardValidator<T> extends Validator<T> {
  constructor(
    private readonly guard: Guard<T>,
    options: ValidatorOptions = {}
  ) {
    super({ ...options, name: options.name ?? (guard.name || 'guard') });
  }

  protected check(value: unknown): boolean {
    return this.guard(value);
  }

  protected coerce(value: unknown): T {
    if (this.guard(value)) return value;
    throw this.fail(value, `rejected by ${this.name}`);
  }
}

/**
 * Anything a combinator accepts as a child: a validator or a type guard.
 */
export type Check<T = unknown> = Validator<T> | Guard<T>;

/**
 * Lifts a {@link Check} to a {@link Validator}.
 */
export function toValidator<T>(check: Check<T>): Validator<T> {
  return check instanceof Validator ? check : new GuardValidator(check);
}
