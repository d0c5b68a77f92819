import { Validator } from '../core/validator';
import {
  type Callable,
  isCallableValue,
  isStringValue
} from '../utils/type-guards';

/**
 * Text values. No coercion: `42` is not a string.
 */
export class StringValidator extends Validator<string> {
  protected check(value: unknown): boolean {
    return isStringValue(value);
  }

  protected coerce(value: unknown): string {
    if (isStringValue(value)) return value;
    throw this.fail(value, 'must be a string');
  }
}

/**
 * Values exposing an invocation capability (see {@link Callable}).
 */
export class CallableValidator extends Validator<Callable> {
  protected check(value: unknown): boolean {
    return isCallableValue(value);
  }

  protected coerce(value: unknown): Callable {
    if (isCallableValue(value)) return value;
    throw this.fail(value, 'must be callable');
  }
}
