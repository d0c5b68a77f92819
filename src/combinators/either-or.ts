import {
  type Check,
  type Normalized,
  Validator,
  type ValidatorOptions,
  toValidator
} from '../core/validator';
import { ValidatorConfigError } from '../errors';
import { isSequence } from '../guards';

/**
 * Logical "or" over validators.
 *
 * Children are tried in order and the first one that accepts wins; order
 * only matters for side effects (such as a pattern validator's debug log)
 * and for which child normalizes the value.
 *
 * A single check may be passed in place of a list.
 */
export class EitherOr<T> extends Validator<Normalized<T>> {
  readonly validators: readonly Validator<T>[];

  constructor(
    checks: Check<T> | readonly Check<T>[],
    options: ValidatorOptions = {}
  ) {
    const validators = isSequence<Check<T>>(checks)
      ? checks.map(check => toValidator(check))
      : [toValidator(checks)];

    super({
      ...options,
      name:
        options.name ??
        `EitherOr(${validators.map(validator => validator.name).join(', ')})`
    });

    if (validators.length === 0) {
      throw new ValidatorConfigError(`${this.name} needs at least one check.`);
    }
    this.validators = Object.freeze(validators);
  }

  protected check(value: unknown): boolean {
    return this.validators.some(validator => validator.test(value));
  }

  protected coerce(value: unknown): Normalized<T> {
    const accepting = this.validators.find(validator => validator.test(value));
    if (!accepting) {
      throw this.fail(value, 'no alternative accepts the value');
    }
    return accepting.normalize(value);
  }
}
