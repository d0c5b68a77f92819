import type { StandardSchemaV1 } from '@standard-schema/spec';

import { type DerivedValue, isDerivedValue } from './deferred/derived-value';
import { AttributeValueError } from './errors';

/**
 * Renders a Standard Schema issue path as `a.b.0`.
 */
function formatIssuePath(
  path: StandardSchemaV1.Issue['path']
): string | undefined {
  if (!path || path.length === 0) return undefined;
  return path
    .map(segment => String(typeof segment === 'object' ? segment.key : segment))
    .join('.');
}

/**
 * Checks a value about to be assigned to an attribute, using any Standard
 * Schema V1 validator: the validators of this library, or Zod, Valibot,
 * ArkType and others.
 *
 * About `~standard`:
 * - It returns an object (`{ value }` or `{ issues }`) instead of throwing,
 *   which gives one code path for every library.
 * - Library-specific methods (like `.parse`) are ignored.
 *
 * Derived values (e.g. `inherit`) are returned unresolved without consulting
 * the schema; a resolver works them out later.
 *
 * @param schema - The Standard Schema to validate against.
 * @param value - The candidate attribute value.
 * @param attributeName - The attribute name (used for error reporting).
 * @returns The normalized value, or the derived value itself.
 *
 * @throws {AttributeValueError}
 * - If the schema object is invalid (missing `~standard`).
 * - If the schema validates asynchronously (assignment is synchronous).
 * - If validation fails (issues reported by the schema).
 */

/**
 * Public Overload:
 * Ties the return type to the schema's output type.
 *
 * Implementation Note - Overloads:
 * Inside the body the schema is only known to be *some* Standard Schema, so
 * results are `unknown`; the overload keeps the body free of `as` assertions.
 */
export function validateAttribute<S extends StandardSchemaV1>(
  schema: S,
  value: unknown,
  attributeName: string
): StandardSchemaV1.InferOutput<S> | DerivedValue;

export function validateAttribute(
  schema: StandardSchemaV1,
  value: unknown,
  attributeName: string
): unknown {
  if (isDerivedValue(value)) {
    return value;
  }

  // Guards against plain objects or malformed configurations being treated as schemas.
  if (!('~standard' in schema)) {
    throw new AttributeValueError(
      attributeName,
      'the validator is not a Standard Schema (missing "~standard").'
    );
  }

  const result = schema['~standard'].validate(value);

  if (result instanceof Promise) {
    throw new AttributeValueError(
      attributeName,
      'asynchronous validation is not supported.'
    );
  }

  const [firstIssue] = result.issues ?? [];
  if (firstIssue) {
    const issuePath = formatIssuePath(firstIssue.path);
    throw new AttributeValueError(
      attributeName,
      issuePath ? `at "${issuePath}": ${firstIssue.message}` : firstIssue.message
    );
  }

  // Some validators only report issues and do not return a decoded `value`.
  if ('value' in result) {
    return result.value;
  }

  return value;
}
