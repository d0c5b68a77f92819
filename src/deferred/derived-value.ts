import { hasBrand } from '../guards';

/**
 * Discriminant brand used to identify derived values.
 *
 * `Symbol.for` registers the brand globally, so a value created by one copy
 * of this library (e.g. a nested dependency) is still recognized by the
 * validators of another copy.
 */
const DERIVED_VALUE_KIND: unique symbol = Symbol.for(
  'attr-validators.deferred.derived_value'
);

/**
 * What a resolver hands to {@link DerivedValue.resolve}.
 *
 * The context encapsulates the ancestor chain of the object owning the
 * attribute (e.g. the stack of parent nodes during a drawing pass). How it
 * walks that chain is up to the resolver.
 */
export interface ResolutionContext {
  /**
   * Returns the currently effective value of `attributeName`, as seen from the
   * node being resolved.
   */
  getStateValue(attributeName: string): unknown;
}

/**
 * A "magic" value that works itself out later.
 *
 * Validators accept derived values structurally, without testing them: the
 * real value only exists once a resolver supplies a {@link ResolutionContext}.
 * Resolution is a separate pass owned by the resolver; validators never call
 * {@link DerivedValue.resolve}.
 */
export abstract class DerivedValue {
  readonly [DERIVED_VALUE_KIND] = true;

  /**
   * Short tag naming the resolution strategy (e.g. `"inherit"`).
   */
  abstract readonly kind: string;

  /**
   * Computes the concrete value of `attributeName` within `context`.
   */
  abstract resolve(context: ResolutionContext, attributeName: string): unknown;

  toString(): string {
    return this.kind;
  }
}

/**
 * Picks up the value of the same attribute from the enclosing context, e.g.
 *
 * ```ts
 * chart.categoryAxis.labels.fontName = inherit;
 * ```
 *
 * takes whatever `fontName` is in effect further up the drawing.
 */
export class Inherit extends DerivedValue {
  readonly kind = 'inherit';

  resolve(context: ResolutionContext, attributeName: string): unknown {
    return context.getStateValue(attributeName);
  }
}

/**
 * The canonical "inherit" sentinel.
 */
export const inherit: Inherit = Object.freeze(new Inherit());

/**
 * Type guard for {@link DerivedValue}.
 *
 * Checks the brand and the presence of a `resolve` method, rather than
 * `instanceof`, so derived values from another copy of the library qualify.
 */
export function isDerivedValue(value: unknown): value is DerivedValue {
  if (!hasBrand(value, DERIVED_VALUE_KIND)) return false;
  return 'resolve' in value && typeof value.resolve === 'function';
}

/**
 * Type guard for the "inherit" strategy.
 */
export function isInherit(value: unknown): value is Inherit {
  return isDerivedValue(value) && value.kind === 'inherit';
}
