import { CodecValidator, textDecoderCodecs } from './adapters/codec';
import { Auto } from './combinators/auto';
import { EitherOr } from './combinators/either-or';
import { NoneOr } from './combinators/none-or';
import { OneOf } from './combinators/one-of';
import { SequenceOf } from './combinators/sequence-of';
import type { Validator } from './core/validator';
import { type NumericAlign, isNumericAlign } from './numeric-align';
import { BooleanValidator } from './primitives/boolean';
import { Anything, Nothing } from './primitives/constant';
import { IntegerValidator, NumberValidator } from './primitives/number';
import { CallableValidator, StringValidator } from './primitives/string';
import type { Callable } from './utils/type-guards';

/**
 * The generic constraint for validator registries: attribute-facing names
 * mapped to validators of any output type.
 */
export type ValidatorRegistryConstraint = Record<string, Validator<unknown>>;

/**
 * Creates a frozen validator registry with strict type inference.
 *
 * The registry object and every validator in it are frozen, so the
 * registry can be handed out as a shared, read-only reference. Specific
 * validator types are preserved for downstream tooling.
 *
 * @template T - The specific registry shape (inferred).
 * @param registry - The map of names to validators.
 * @returns The same registry, frozen.
 */
export function defineValidatorRegistry<T extends ValidatorRegistryConstraint>(
  registry: T
): Readonly<T> {
  for (const validator of Object.values(registry)) {
    Object.freeze(validator);
  }
  return Object.freeze(registry);
}

export const isAuto = new Auto({ name: 'isAuto' });
export const isBoolean = new BooleanValidator({ name: 'isBoolean' });
export const isString = new StringValidator({ name: 'isString' });
export const isCodec = new CodecValidator(textDecoderCodecs, { name: 'isCodec' });
export const isNumber = new NumberValidator({ name: 'isNumber' });
export const isInt = new IntegerValidator({ name: 'isInt' });
export const isNoneOrInt = new NoneOr(isInt, { name: 'isNoneOrInt' });
export const isNumberOrNone = new NoneOr(isNumber, { name: 'isNumberOrNone' });
export const isTextAnchor = new OneOf('start', 'middle', 'end', 'boxauto');
export const isTextAnchorOrNumeric = new EitherOr<string | NumericAlign>(
  [isTextAnchor, isNumericAlign],
  { name: 'isTextAnchorOrNumeric' }
);
export const isListOfNumbers = new SequenceOf(isNumber, {
  name: 'isListOfNumbers'
});
export const isListOfNumbersOrNone = new SequenceOf(isNumber, {
  name: 'isListOfNumbersOrNone',
  noneOK: true
});
export const isListOfStrings = new SequenceOf(isString, {
  name: 'isListOfStrings'
});
export const isListOfStringsOrNone = new SequenceOf(isString, {
  name: 'isListOfStringsOrNone',
  noneOK: true
});
export const isTransform = new SequenceOf(isNumber, {
  name: 'isTransform',
  emptyOK: false,
  lo: 6,
  hi: 6
});
export const isAnything = new Anything({ name: 'isAnything' });
export const isNothing = new Nothing({ name: 'isNothing' });
export const isXYCoord = new SequenceOf(isNumber, {
  name: 'isXYCoord',
  emptyOK: false,
  lo: 2,
  hi: 2
});
export const isBoxAnchor = new OneOf(
  'nw', 'n', 'ne', 'w', 'c', 'e', 'sw', 's', 'se', 'autox', 'autoy'
);
export const isNoneOrString = new NoneOr(isString, { name: 'isNoneOrString' });
export const isStringOrNone = new NoneOr(isString, { name: 'isStringOrNone' });
export const isNoneOrListOfNoneOrStrings = new SequenceOf(isNoneOrString, {
  name: 'isNoneOrListOfNoneOrStrings',
  noneOK: true
});
export const isListOfNoneOrString = new SequenceOf(isNoneOrString, {
  name: 'isListOfNoneOrString'
});
export const isNoneOrListOfNoneOrNumbers = new SequenceOf(isNumberOrNone, {
  name: 'isNoneOrListOfNoneOrNumbers',
  noneOK: true
});
export const isCallable = new CallableValidator({ name: 'isCallable' });
export const isStringOrCallable = new EitherOr<string | Callable>(
  [isString, isCallable],
  { name: 'isStringOrCallable' }
);
export const isStringOrCallableOrNone = new NoneOr(isStringOrCallable, {
  name: 'isStringOrCallableOrNone'
});

/**
 * The standard validators, by name.
 */
export const validators = defineValidatorRegistry({
  isAuto,
  isBoolean,
  isString,
  isCodec,
  isNumber,
  isInt,
  isNoneOrInt,
  isNumberOrNone,
  isTextAnchor,
  isTextAnchorOrNumeric,
  isListOfNumbers,
  isListOfNumbersOrNone,
  isListOfStrings,
  isListOfStringsOrNone,
  isTransform,
  isAnything,
  isNothing,
  isXYCoord,
  isBoxAnchor,
  isNoneOrString,
  isStringOrNone,
  isNoneOrListOfNoneOrStrings,
  isListOfNoneOrString,
  isNoneOrListOfNoneOrNumbers,
  isCallable,
  isStringOrCallable,
  isStringOrCallableOrNone
});

export type ValidatorName = keyof typeof validators;
