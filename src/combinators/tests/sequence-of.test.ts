import { describe, expect, test, vi } from 'vitest';

import { inherit } from '../../deferred/derived-value';
import { CoercionError, ValidatorConfigError } from '../../errors';
import { NumberValidator } from '../../primitives/number';
import { StringValidator } from '../../primitives/string';
import type { TestScenario } from '../../tests/types';
import { NoneOr } from '../none-or';
import { SequenceOf } from '../sequence-of';

const isNumber = new NumberValidator({ name: 'isNumber' });

describe('SequenceOf', () => {
  const isXYCoord = new SequenceOf(isNumber, { emptyOK: false, lo: 2, hi: 2 });

  test('derives its name from the element validator', () => {
    expect(isXYCoord.name).toBe('SequenceOf(isNumber)');
  });

  const scenarios: TestScenario<unknown, boolean>[] = [
    {
      id: 'PAIR',
      description: 'two numbers fit the bounds',
      input: [1, 2],
      expected: true
    },
    {
      id: 'PAIR_OF_TEXT',
      description: 'elements are tested after coercion',
      input: ['1', '2.5'],
      expected: true
    },
    {
      id: 'TOO_LONG',
      description: 'three numbers exceed the upper bound',
      input: [1, 2, 3],
      expected: false
    },
    {
      id: 'TOO_SHORT',
      description: 'one number misses the lower bound',
      input: [1],
      expected: false
    },
    {
      id: 'EMPTY',
      description: 'an empty array is rejected when emptyOK is off',
      input: [],
      expected: false
    },
    {
      id: 'BAD_ELEMENT',
      description: 'one failing element rejects the array',
      input: [1, 'x'],
      expected: false
    },
    {
      id: 'SPARSE',
      description: 'holes count as undefined elements',
      input: new Array(2),
      expected: false
    },
    {
      id: 'STRING',
      description: 'strings are not sequences',
      input: '12',
      expected: false
    },
    {
      id: 'ABSENT',
      description: 'absence is rejected when noneOK is off',
      input: null,
      expected: false
    },
    {
      id: 'DEFERRED_ELEMENT',
      description: 'elements may be deferred',
      input: [inherit, 2],
      expected: true
    }
  ];

  test.for(scenarios)('[$id] $description', ({ input, expected }) => {
    expect(isXYCoord.test(input)).toBe(expected);
  });

  test('skips the bounds for an empty array when emptyOK is on', () => {
    const isPolyline = new SequenceOf(isNumber, { lo: 4 });
    expect(isPolyline.test([])).toBe(true);
    expect(isPolyline.test([1, 2])).toBe(false);
    expect(isPolyline.normalize([])).toEqual([]);
  });

  test('accepts both absent values when noneOK is on', () => {
    const isOptionalList = new SequenceOf(isNumber, { noneOK: true });
    expect(isOptionalList.test(null)).toBe(true);
    expect(isOptionalList.test(undefined)).toBe(true);
    expect(isOptionalList.normalize(null)).toBeNull();
    expect(isOptionalList.normalize(undefined)).toBeUndefined();
  });

  test('normalizes every element into a fresh array', () => {
    const input = ['1', 2];
    const output = isXYCoord.normalize(input);
    expect(output).toEqual([1, 2]);
    expect(output).not.toBe(input);
    expect(input).toEqual(['1', 2]);
  });

  test('reports a hole as an undefined element', () => {
    const isListOfNumbers = new SequenceOf(isNumber);
    const gappy = [1, , 3];

    expect(isListOfNumbers.test(gappy)).toBe(false);
    expect(() => isListOfNumbers.normalize(gappy)).toThrow(
      'element 1: isNumber cannot coerce undefined: must be a number'
    );
  });

  test('normalizes holes into a dense array', () => {
    const isOptionalNumbers = new SequenceOf(new NoneOr(isNumber));
    const output = isOptionalNumbers.normalize(new Array(2));
    expect(output).toEqual([undefined, undefined]);
    expect(Array.isArray(output) && 0 in output).toBe(true);
  });

  test('names the failing element', () => {
    let caught: unknown;
    try {
      isXYCoord.normalize([1, 'x']);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(CoercionError);
    expect(caught).toHaveProperty(
      'message',
      'SequenceOf(isNumber) cannot coerce array(2): element 1: isNumber cannot coerce "x": must be a number'
    );
    expect(caught).toHaveProperty('cause.validatorName', 'isNumber');
  });

  test('reports length and shape failures', () => {
    expect(() => isXYCoord.normalize([1, 2, 3])).toThrow(
      'length 3 is outside [2, 2]'
    );
    expect(() => isXYCoord.normalize([])).toThrow('must not be empty');
    expect(() => isXYCoord.normalize('12')).toThrow('must be an array');
  });

  test('passes a deferred sequence through without visiting elements', () => {
    const element = new StringValidator();
    const spy = vi.spyOn(element, 'test');
    const isNames = new SequenceOf(element);

    expect(isNames.test(inherit)).toBe(true);
    expect(isNames.normalize(inherit)).toBe(inherit);
    expect(spy).not.toHaveBeenCalled();
  });

  test.for([
    { lo: 3, hi: 2 },
    { lo: -1 },
    { hi: 1.5 },
    { lo: Number.NaN }
  ])('refuses the bounds %o', bounds => {
    expect(() => new SequenceOf(isNumber, bounds)).toThrow(ValidatorConfigError);
  });
});
