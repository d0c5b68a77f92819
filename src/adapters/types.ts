import type { Guard } from '../utils/type-guards';

/**
 * Capability check against an external color model.
 */
export interface ColorAdapter<C> {
  isColor: Guard<C>;
}

/**
 * Capability checks against an external graphics node hierarchy.
 *
 * A valid child of a drawing or group is either a shape or a user node.
 */
export interface ShapeAdapter<S, U> {
  isShape: Guard<S>;
  isUserNode: Guard<U>;
}

/**
 * Bridge to an external calendar-date type.
 */
export interface DateAdapter<D> {
  isDate: Guard<D>;

  /**
   * Builds a date from a raw value (e.g. `"20240131"` or `20240131`).
   *
   * @throws When the value does not describe a date.
   */
  fromValue(value: unknown): D;
}

/**
 * Bridge to an external text-codec registry.
 */
export interface CodecAdapter {
  /**
   * Resolves a codec name or alias to its canonical name.
   *
   * @throws When no codec is registered under `name`.
   */
  lookup(name: string): string;
}
