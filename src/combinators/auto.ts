import {
  type Check,
  type Normalized,
  Validator,
  type ValidatorOptions,
  toValidator
} from '../core/validator';
import { hasBrand, isRecord } from '../guards';

/**
 * Discriminant brand of auto markers, registered globally like the derived
 * value brand.
 */
const AUTO_KIND: unique symbol = Symbol.for('attr-validators.auto');

/**
 * Marker meaning "work this out automatically".
 *
 * A marker may carry settings for whatever computes the automatic value,
 * e.g. `createAuto({ includeZero: true })` on an axis range.
 */
export type AutoMarker = {
  readonly [AUTO_KIND]: true;
  readonly settings: Readonly<Record<string, unknown>>;
};

/**
 * An attribute that holds either a concrete value or the auto marker.
 * Consumers branch with {@link isAutoMarker}.
 */
export type AutoValue<T> = T | AutoMarker;

/**
 * Creates a frozen auto marker carrying `settings`.
 */
export function createAuto(settings: Record<string, unknown> = {}): AutoMarker {
  const marker: AutoMarker = {
    [AUTO_KIND]: true,
    settings: Object.freeze({ ...settings })
  };
  return Object.freeze(marker);
}

/**
 * The canonical auto marker, without settings.
 */
export const auto: AutoMarker = createAuto();

/**
 * Type guard for {@link AutoMarker}.
 */
export function isAutoMarker(value: unknown): value is AutoMarker {
  if (!hasBrand(value, AUTO_KIND)) return false;
  return 'settings' in value && isRecord(value.settings);
}

/**
 * Accepts auto markers only.
 */
export class Auto extends Validator<AutoMarker> {
  protected check(value: unknown): boolean {
    return isAutoMarker(value);
  }

  protected coerce(value: unknown): AutoMarker {
    if (isAutoMarker(value)) return value;
    throw this.fail(value, 'must be an auto marker');
  }
}

/**
 * Accepts an auto marker, or whatever the wrapped check accepts.
 */
export class AutoOr<T> extends Validator<AutoValue<Normalized<T>>> {
  readonly validator: Validator<T>;

  constructor(check: Check<T>, options: ValidatorOptions = {}) {
    const validator = toValidator(check);
    super({ ...options, name: options.name ?? `AutoOr(${validator.name})` });
    this.validator = validator;
  }

  protected check(value: unknown): boolean {
    return isAutoMarker(value) || this.validator.test(value);
  }

  protected coerce(value: unknown): AutoValue<Normalized<T>> {
    if (isAutoMarker(value)) return value;
    return this.validator.normalize(value);
  }
}
