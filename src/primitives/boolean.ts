import { Validator } from '../core/validator';
import { isAbsent } from '../guards';
import {
  isBooleanValue,
  isNumberValue,
  isStringValue
} from '../utils/type-guards';

const TRUE_WORDS: ReadonlySet<string> = new Set(['YES', 'TRUE']);
const FALSE_WORDS: ReadonlySet<string> = new Set(['NO', 'FALSE']);

/**
 * Boolean flags, including their common spellings.
 *
 * Accepted directly: `true`, `false`, `0`, `1`.
 * Coerced: `"yes"`/`"true"` and `"no"`/`"false"` in any case, and absence
 * (`null`/`undefined`), which means `false`.
 */
export class BooleanValidator extends Validator<boolean> {
  protected check(value: unknown): boolean {
    if (isBooleanValue(value)) return true;
    if (isNumberValue(value)) return value === 0 || value === 1;
    return this.normalizeTest(value);
  }

  protected coerce(value: unknown): boolean {
    if (isBooleanValue(value)) return value;
    if (value === 0 || value === 1) return value === 1;
    if (isAbsent(value)) return false;

    if (isStringValue(value)) {
      const word = value.toUpperCase();
      if (TRUE_WORDS.has(word)) return true;
      if (FALSE_WORDS.has(word)) return false;
    }

    throw this.fail(value, 'must be boolean');
  }
}
