import { describe, expect, test, vi } from 'vitest';

import { StringValidator } from '../../primitives/string';
import {
  classifyAttributeValue,
  resolveAttributeValue
} from '../attribute-value';
import {
  DerivedValue,
  Inherit,
  type ResolutionContext,
  inherit,
  isDerivedValue,
  isInherit
} from '../derived-value';

/**
 * Resolves to the enclosing value scaled by a factor, e.g. "twice the
 * parent's font size".
 */
class Scaled extends DerivedValue {
  readonly kind = 'scaled';

  constructor(readonly factor: number) {
    super();
  }

  resolve(context: ResolutionContext, attributeName: string): unknown {
    const base = context.getStateValue(attributeName);
    return typeof base === 'number' ? base * this.factor : undefined;
  }
}

function createContext(state: Record<string, unknown>) {
  const getStateValue = vi.fn((attributeName: string) => state[attributeName]);
  const context: ResolutionContext = { getStateValue };
  return { context, getStateValue };
}

describe('inherit', () => {
  test('is a frozen derived value', () => {
    expect(isDerivedValue(inherit)).toBe(true);
    expect(isInherit(inherit)).toBe(true);
    expect(inherit).toBeInstanceOf(Inherit);
    expect(Object.isFrozen(inherit)).toBe(true);
  });

  test('renders as its kind', () => {
    expect(String(inherit)).toBe('inherit');
  });

  test('resolves to the enclosing value of the same attribute', () => {
    const { context, getStateValue } = createContext({ fontName: 'serif' });

    expect(inherit.resolve(context, 'fontName')).toBe('serif');
    expect(getStateValue).toHaveBeenCalledWith('fontName');
  });
});

describe('isDerivedValue', () => {
  test('recognizes custom strategies', () => {
    const twice = new Scaled(2);
    expect(isDerivedValue(twice)).toBe(true);
    expect(isInherit(twice)).toBe(false);
  });

  test('recognizes derived values from another copy of the library', () => {
    const foreign = {
      [Symbol.for('attr-validators.deferred.derived_value')]: true,
      kind: 'inherit',
      resolve: () => 'resolved'
    };
    expect(isDerivedValue(foreign)).toBe(true);
    expect(isInherit(foreign)).toBe(true);
  });

  test.for([
    ['the string inherit', 'inherit'],
    ['a branded object without resolve', { [Symbol.for('attr-validators.deferred.derived_value')]: true }],
    ['a plain object', { kind: 'inherit' }],
    ['null', null]
  ] as const)('rejects %s', ([, value]) => {
    expect(isDerivedValue(value)).toBe(false);
  });

  test('custom strategies are accepted by validators without testing', () => {
    const isString = new StringValidator();
    const twice = new Scaled(2);
    expect(isString.test(twice)).toBe(true);
    expect(isString.normalize(twice)).toBe(twice);
  });
});

describe('attribute values', () => {
  test('classifies concrete values', () => {
    expect(classifyAttributeValue(12, 'fontSize')).toEqual({
      kind: 'concrete',
      value: 12
    });
  });

  test('classifies derived values as deferred', () => {
    expect(classifyAttributeValue(inherit, 'fontSize')).toEqual({
      kind: 'deferred',
      source: inherit,
      attributeName: 'fontSize'
    });
  });

  test('resolves concrete values without the context', () => {
    const { context, getStateValue } = createContext({});

    expect(
      resolveAttributeValue(classifyAttributeValue('red', 'fillColor'), context)
    ).toBe('red');
    expect(getStateValue).not.toHaveBeenCalled();
  });

  test('resolves deferred values through their strategy', () => {
    const { context } = createContext({ fontSize: 10 });

    expect(
      resolveAttributeValue(classifyAttributeValue(inherit, 'fontSize'), context)
    ).toBe(10);
    expect(
      resolveAttributeValue(
        classifyAttributeValue(new Scaled(1.5), 'fontSize'),
        context
      )
    ).toBe(15);
  });
});
