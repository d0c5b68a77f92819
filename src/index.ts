export {
  type Check,
  GuardValidator,
  type Normalized,
  VENDOR,
  Validator,
  type ValidatorOptions,
  toValidator
} from './core/validator';
export {
  type NormalizeFailure,
  type NormalizeResult,
  type NormalizeSuccess,
  normalized,
  rejected
} from './core/result';
export {
  AttributeValueError,
  CoercionError,
  ValidatorConfigError,
  describeValue,
  extractErrorMessage
} from './errors';

export { Anything, Nothing } from './primitives/constant';
export { BooleanValidator } from './primitives/boolean';
export {
  IntegerValidator,
  NumberInRange,
  NumberValidator,
  coerceFloat,
  coerceInteger,
  parseFloatText,
  parseIntegerText
} from './primitives/number';
export { CallableValidator, StringValidator } from './primitives/string';
export { type PatternOptions, MatchesPattern } from './primitives/pattern';
export { type Constructor, InstanceOf } from './primitives/instance-of';

export { OneOf } from './combinators/one-of';
export {
  MAX_SEQUENCE_LENGTH,
  type SequenceOptions,
  type SequenceOutput,
  SequenceOf
} from './combinators/sequence-of';
export { EitherOr } from './combinators/either-or';
export { NoneOr } from './combinators/none-or';
export {
  Auto,
  type AutoMarker,
  AutoOr,
  type AutoValue,
  auto,
  createAuto,
  isAutoMarker
} from './combinators/auto';

export {
  DerivedValue,
  Inherit,
  type ResolutionContext,
  inherit,
  isDerivedValue,
  isInherit
} from './deferred/derived-value';
export {
  type AttributeValue,
  type ConcreteValue,
  type DeferredValue,
  classifyAttributeValue,
  resolveAttributeValue
} from './deferred/attribute-value';

export type {
  CodecAdapter,
  ColorAdapter,
  DateAdapter,
  ShapeAdapter
} from './adapters/types';
export { CodecValidator, textDecoderCodecs } from './adapters/codec';
export { NormalDateValidator } from './adapters/date';
export {
  type DomainAdapters,
  type DomainValidators,
  createDomainValidators
} from './adapters';

export { type NumericAlign, isNumericAlign, numericAlign } from './numeric-align';
export { validateAttribute } from './validator';
export { type LogLevel, type ValidatorsConfig, loadConfig } from './config';
export { createLogger, createLoggerFromEnv } from './logger';
export type { Callable, Guard } from './utils/type-guards';

export * from './registry';
