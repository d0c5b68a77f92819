import {
  type Check,
  type Normalized,
  Validator,
  type ValidatorOptions,
  toValidator
} from '../core/validator';
import { isAbsent } from '../guards';

/**
 * Makes a check optional: `null` and `undefined` are always accepted, and
 * normalize to themselves.
 */
export class NoneOr<T> extends Validator<Normalized<T> | null | undefined> {
  readonly validator: Validator<T>;

  constructor(check: Check<T>, options: ValidatorOptions = {}) {
    const validator = toValidator(check);
    super({ ...options, name: options.name ?? `NoneOr(${validator.name})` });
    this.validator = validator;
  }

  protected check(value: unknown): boolean {
    return isAbsent(value) || this.validator.test(value);
  }

  protected coerce(value: unknown): Normalized<T> | null | undefined {
    if (isAbsent(value)) return value;
    return this.validator.normalize(value);
  }
}
