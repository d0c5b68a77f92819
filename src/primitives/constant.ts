import { Validator, type ValidatorOptions } from '../core/validator';

/**
 * Accepts every value. Used as a neutral element when composing validators.
 */
export class Anything extends Validator<unknown> {
  protected check(): boolean {
    return true;
  }

  protected coerce(value: unknown): unknown {
    return value;
  }
}

/**
 * Rejects every value, derived values included.
 */
export class Nothing extends Validator<never> {
  constructor(options: Omit<ValidatorOptions, 'acceptDeferred'> = {}) {
    super({ ...options, acceptDeferred: false });
  }

  protected check(): boolean {
    return false;
  }

  protected coerce(value: unknown): never {
    throw this.fail(value, 'no value is accepted');
  }
}
