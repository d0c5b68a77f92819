import { Validator } from '../core/validator';
import { ValidatorConfigError, describeValue } from '../errors';

function isValueList<T>(value: T | readonly T[]): value is readonly T[] {
  return Array.isArray(value);
}

/**
 * SameValueZero, the equality of `Array.prototype.includes`: like `===`,
 * except that `NaN` equals `NaN`.
 */
function sameValueZero(a: unknown, b: unknown): boolean {
  return a === b || (Number.isNaN(a) && Number.isNaN(b));
}

/**
 * Accepts either a single list argument or singleton arguments, never both.
 */
function collectValues<T>(args: ReadonlyArray<T | readonly T[]>): readonly T[] {
  const [first, ...rest] = args;

  if (args.length === 0) {
    throw new ValidatorConfigError('OneOf needs at least one allowed value.');
  }

  if (isValueList(first)) {
    if (rest.length > 0) {
      throw new ValidatorConfigError(
        'OneOf takes either singleton arguments or a single list argument, not both.'
      );
    }
    return [...first];
  }

  const values: T[] = [];
  for (const arg of args) {
    if (isValueList(arg)) {
      throw new ValidatorConfigError(
        'OneOf takes either singleton arguments or a single list argument, not both.'
      );
    }
    values.push(arg);
  }
  return values;
}

/**
 * Membership in a fixed set of literals.
 *
 * Usage:
 * ```ts
 * const isMood = new OneOf('happy', 'sad');
 * // or
 * const isMood = new OneOf(['happy', 'sad']);
 *
 * isMood.test('sad');    // true
 * isMood.test('grumpy'); // false
 * ```
 *
 * No coercion: `normalize` returns the matching allowed literal.
 */
export class OneOf<T> extends Validator<T> {
  readonly values: readonly T[];

  constructor(values: readonly T[]);
  constructor(...values: T[]);
  constructor(...args: Array<T | readonly T[]>) {
    const values = Object.freeze(collectValues(args));
    super({ name: `OneOf(${values.map(describeValue).join(', ')})` });
    this.values = values;
  }

  protected check(value: unknown): boolean {
    return this.indexOf(value) !== -1;
  }

  protected coerce(value: unknown): T {
    const index = this.indexOf(value);
    if (index === -1) throw this.fail(value, 'not an allowed value');
    return this.values[index];
  }

  private indexOf(value: unknown): number {
    return this.values.findIndex(allowed => sameValueZero(allowed, value));
  }
}
