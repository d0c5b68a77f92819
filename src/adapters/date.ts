import { Validator, type ValidatorOptions } from '../core/validator';
import { extractErrorMessage } from '../errors';
import { isAbsent } from '../guards';
import type { DateAdapter } from './types';

/**
 * Calendar dates of an external date type, or raw values that type can be
 * built from. Absent values are rejected.
 */
export class NormalDateValidator<D> extends Validator<D> {
  constructor(
    private readonly dates: DateAdapter<D>,
    options: ValidatorOptions = {}
  ) {
    super(options);
  }

  protected check(value: unknown): boolean {
    if (this.dates.isDate(value)) return true;
    return !isAbsent(value) && this.normalizeTest(value);
  }

  protected coerce(value: unknown): D {
    if (this.dates.isDate(value)) return value;
    if (isAbsent(value)) throw this.fail(value, 'a date is required');

    try {
      return this.dates.fromValue(value);
    } catch (error) {
      throw this.fail(value, `not a date (${extractErrorMessage(error)})`, error);
    }
  }
}
