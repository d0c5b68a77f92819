import { Validator, type ValidatorOptions } from '../core/validator';

/**
 * Anything usable on the right-hand side of `instanceof`.
 */
export type Constructor<T> = abstract new (...args: never[]) => T;

/**
 * Instances of a given class (or of its subclasses).
 *
 * @example
 * ```ts
 * const isDate = new InstanceOf(Date);
 * isDate.test(new Date()); // true
 * ```
 */
export class InstanceOf<T> extends Validator<T> {
  constructor(
    readonly type: Constructor<T>,
    options: ValidatorOptions = {}
  ) {
    super({ ...options, name: options.name ?? `InstanceOf(${type.name})` });
  }

  protected check(value: unknown): boolean {
    return value instanceof this.type;
  }

  protected coerce(value: unknown): T {
    if (value instanceof this.type) return value;
    throw this.fail(value, `must be an instance of ${this.type.name}`);
  }
}
