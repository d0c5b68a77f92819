import { Validator, type ValidatorOptions } from '../core/validator';
import { extractErrorMessage } from '../errors';
import { isStringValue } from '../utils/type-guards';
import type { CodecAdapter } from './types';

/**
 * Codec registry backed by the WHATWG Encoding label table of `TextDecoder`.
 *
 * Labels are matched case-insensitively and resolve to the canonical encoding
 * name (`"UTF8"` gives `"utf-8"`, `"latin1"` gives `"windows-1252"`).
 * Unknown labels make the `TextDecoder` constructor throw a `RangeError`.
 */
export const textDecoderCodecs: CodecAdapter = {
  lookup(name: string): string {
    return new TextDecoder(name).encoding;
  }
};

/**
 * Names of known text codecs. `normalize` returns the canonical name.
 */
export class CodecValidator extends Validator<string> {
  constructor(
    private readonly codecs: CodecAdapter,
    options: ValidatorOptions = {}
  ) {
    super(options);
  }

  protected check(value: unknown): boolean {
    return isStringValue(value) && this.normalizeTest(value);
  }

  protected coerce(value: unknown): string {
    if (!isStringValue(value)) {
      throw this.fail(value, 'must be a codec name');
    }
    try {
      return this.codecs.lookup(value);
    } catch (error) {
      throw this.fail(
        value,
        `unknown codec (${extractErrorMessage(error)})`,
        error
      );
    }
  }
}
