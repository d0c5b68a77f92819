import {
  type DerivedValue,
  type ResolutionContext,
  isDerivedValue
} from './derived-value';

/**
 * An attribute value that is known now.
 */
export type ConcreteValue<T> = {
  kind: 'concrete';
  value: T;
};

/**
 * An attribute value that a resolver must work out later.
 */
export type DeferredValue = {
  kind: 'deferred';

  /**
   * The sentinel that was assigned (e.g. `inherit`).
   */
  source: DerivedValue;

  /**
   * The attribute the sentinel was assigned to; passed to `resolve`.
   */
  attributeName: string;
};

/**
 * Discriminated union separating concrete values from deferred ones.
 *
 * Consumers branch on `kind` instead of comparing against sentinel
 * identities, and resolution becomes a separate pass over the `deferred`
 * variants.
 */
export type AttributeValue<T = unknown> = ConcreteValue<T> | DeferredValue;

/**
 * Wraps a stored attribute value into an {@link AttributeValue}.
 *
 * @param value
 *   The value as stored on the object (possibly a derived value).
 * @param attributeName
 *   Name of the attribute holding `value`.
 */
export function classifyAttributeValue<T>(
  value: T | DerivedValue,
  attributeName: string
): AttributeValue<T> {
  if (isDerivedValue(value)) {
    return { kind: 'deferred', source: value, attributeName };
  }
  return { kind: 'concrete', value };
}

/**
 * Resolution pass for a single attribute.
 *
 * Concrete values are returned as is; deferred values are handed to their
 * sentinel together with the resolver's context.
 */
export function resolveAttributeValue<T>(
  attributeValue: AttributeValue<T>,
  context: ResolutionContext
): unknown {
  switch (attributeValue.kind) {
    case 'concrete':
      return attributeValue.value;
    case 'deferred':
      return attributeValue.source.resolve(
        context,
        attributeValue.attributeName
      );
  }
}
