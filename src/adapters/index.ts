import { GuardValidator } from '../core/validator';
import { NoneOr } from '../combinators/none-or';
import { SequenceOf } from '../combinators/sequence-of';
import type { Guard } from '../utils/type-guards';
import { CodecValidator, textDecoderCodecs } from './codec';
import { NormalDateValidator } from './date';
import type {
  CodecAdapter,
  ColorAdapter,
  DateAdapter,
  ShapeAdapter
} from './types';

export type DomainAdapters<C, S, U, D> = {
  color: ColorAdapter<C>;
  shapes: ShapeAdapter<S, U>;
  date: DateAdapter<D>;

  /**
   * Defaults to {@link textDecoderCodecs}.
   */
  codec?: CodecAdapter;
};

export type DomainValidators<C, S, U, D> = Readonly<{
  isColor: GuardValidator<C>;
  isColorOrNone: NoneOr<C>;
  isListOfColors: SequenceOf<C>;
  isValidChild: GuardValidator<S | U>;
  isShape: GuardValidator<S | U>;
  isValidChildOrNone: NoneOr<S | U>;
  isNoneOrShape: NoneOr<S | U>;
  isListOfShapes: SequenceOf<S>;
  isNormalDate: NormalDateValidator<D>;
  isCodec: CodecValidator;
}>;

/**
 * Builds the validators that depend on external domain types.
 *
 * The domain types themselves live outside this library; each adapter only
 * contributes a capability check (or a constructor that fails cleanly), which
 * is plugged into the regular combinators.
 *
 * @example
 * ```ts
 * const domain = createDomainValidators({
 *   color: { isColor: (value): value is Color => value instanceof Color },
 *   shapes: { isShape, isUserNode },
 *   date: { isDate, fromValue: value => new NormalDate(value) }
 * });
 * domain.isColorOrNone.test(null); // true
 * ```
 */
export function createDomainValidators<C, S, U, D>(
  adapters: DomainAdapters<C, S, U, D>
): DomainValidators<C, S, U, D> {
  const { color, shapes, date, codec = textDecoderCodecs } = adapters;

  const isColor = new GuardValidator<C>(color.isColor, { name: 'isColor' });

  const isChildNode: Guard<S | U> = (value): value is S | U =>
    shapes.isShape(value) || shapes.isUserNode(value);
  const isValidChild = new GuardValidator<S | U>(isChildNode, { name: 'isValidChild' });
  const isValidChildOrNone = new NoneOr<S | U>(isValidChild, {
    name: 'isValidChildOrNone'
  });

  return Object.freeze({
    isColor,
    isColorOrNone: new NoneOr<C>(isColor, { name: 'isColorOrNone' }),
    isListOfColors: new SequenceOf<C>(isColor, { name: 'isListOfColors' }),
    isValidChild,
    isShape: isValidChild,
    isValidChildOrNone,
    isNoneOrShape: isValidChildOrNone,
    isListOfShapes: new SequenceOf<S>(shapes.isShape, { name: 'isListOfShapes' }),
    isNormalDate: new NormalDateValidator(date, { name: 'isNormalDate' }),
    isCodec: new CodecValidator(codec, { name: 'isCodec' })
  });
}
