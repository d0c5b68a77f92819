import {
  type Check,
  type Normalized,
  Validator,
  type ValidatorOptions,
  toValidator
} from '../core/validator';
import { ValidatorConfigError, extractErrorMessage } from '../errors';
import { isAbsent, isSequence } from '../guards';

/**
 * Largest length accepted by default.
 */
export const MAX_SEQUENCE_LENGTH = 0x7fffffff;

export type SequenceOptions = ValidatorOptions & {
  /**
   * Whether an empty array is accepted, regardless of `lo`/`hi`.
   * Defaults to `true`.
   */
  emptyOK?: boolean;

  /**
   * Whether `null`/`undefined` is accepted. Defaults to `false`.
   */
  noneOK?: boolean;

  /**
   * Inclusive lower bound on the length of a non-empty array. Defaults to `0`.
   */
  lo?: number;

  /**
   * Inclusive upper bound on the length of a non-empty array.
   * Defaults to {@link MAX_SEQUENCE_LENGTH}.
   */
  hi?: number;
};

/**
 * What {@link SequenceOf} normalizes to: a fresh array of normalized
 * elements, or the absent value itself when `noneOK` is set.
 */
export type SequenceOutput<T> = Array<Normalized<T>> | null | undefined;

function isLengthBound(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

/**
 * Homogeneous arrays with length bounds.
 *
 * Decision order:
 * 1. Not an array: accepted only if absent and `noneOK`.
 * 2. Empty array: accepted iff `emptyOK` (bounds do not apply).
 * 3. Non-empty array: `lo <= length <= hi` and every element passes the
 *    element check.
 *
 * @example
 * ```ts
 * const isXYCoord = new SequenceOf(isNumber, { emptyOK: false, lo: 2, hi: 2 });
 * isXYCoord.test([1, 2]);    // true
 * isXYCoord.test([1, 2, 3]); // false
 * ```
 */
export class SequenceOf<T> extends Validator<SequenceOutput<T>> {
  readonly element: Validator<T>;
  readonly emptyOK: boolean;
  readonly noneOK: boolean;
  readonly lo: number;
  readonly hi: number;

  constructor(element: Check<T>, options: SequenceOptions = {}) {
    const validator = toValidator(element);
    super({
      ...options,
      name: options.name ?? `SequenceOf(${validator.name})`
    });

    this.element = validator;
    this.emptyOK = options.emptyOK ?? true;
    this.noneOK = options.noneOK ?? false;
    this.lo = options.lo ?? 0;
    this.hi = options.hi ?? MAX_SEQUENCE_LENGTH;

    if (!isLengthBound(this.lo) || !isLengthBound(this.hi) || this.lo > this.hi) {
      throw new ValidatorConfigError(
        `${this.name} needs integer bounds with 0 <= lo <= hi, got [${this.lo}, ${this.hi}].`
      );
    }
  }

  protected check(value: unknown): boolean {
    if (!isSequence(value)) return this.noneOK && isAbsent(value);
    if (value.length === 0) return this.emptyOK;
    if (!this.hasAllowedLength(value)) return false;
    // Holes read as `undefined` and go through the element check too.
    return Array.from(value).every(element => this.element.test(element));
  }

  protected coerce(value: unknown): SequenceOutput<T> {
    if (!isSequence(value)) {
      if (this.noneOK && isAbsent(value)) return value;
      throw this.fail(value, 'must be an array');
    }

    if (value.length === 0) {
      if (this.emptyOK) return [];
      throw this.fail(value, 'must not be empty');
    }

    if (!this.hasAllowedLength(value)) {
      throw this.fail(
        value,
        `length ${value.length} is outside [${this.lo}, ${this.hi}]`
      );
    }

    return Array.from(value, (element, index) => {
      try {
        return this.element.normalize(element);
      } catch (error) {
        throw this.fail(
          value,
          `element ${index}: ${extractErrorMessage(error)}`,
          error
        );
      }
    });
  }

  private hasAllowedLength(value: readonly unknown[]): boolean {
    return this.lo <= value.length && value.length <= this.hi;
  }
}
