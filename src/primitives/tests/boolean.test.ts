import { describe, expect, test } from 'vitest';

import { inherit } from '../../deferred/derived-value';
import { CoercionError } from '../../errors';
import type { TestScenario } from '../../tests/types';
import { BooleanValidator } from '../boolean';

const isBoolean = new BooleanValidator({ name: 'isBoolean' });

describe('BooleanValidator', () => {
  describe('normalize', () => {
    const scenarios: Array<TestScenario<unknown, boolean>> = [
      {
        id: 'Upper Yes',
        description: '"YES" coerces to true.',
        input: 'YES',
        expected: true
      },
      {
        id: 'Lower True',
        description: 'Words are matched case-insensitively.',
        input: 'true',
        expected: true
      },
      {
        id: 'Upper No',
        description: '"NO" coerces to false.',
        input: 'NO',
        expected: false
      },
      {
        id: 'Mixed False',
        description: '"False" coerces to false.',
        input: 'False',
        expected: false
      },
      {
        id: 'Null',
        description: 'Absence means false.',
        input: null,
        expected: false
      },
      {
        id: 'Undefined',
        description: 'Undefined is absence too.',
        input: undefined,
        expected: false
      },
      {
        id: 'One',
        description: 'The number 1 becomes true.',
        input: 1,
        expected: true
      },
      {
        id: 'Zero',
        description: 'The number 0 becomes false.',
        input: 0,
        expected: false
      },
      {
        id: 'Native',
        description: 'Booleans are returned as is.',
        input: false,
        expected: false
      }
    ];

    test.for(scenarios)('[$id] $description', ({ input, expected }) => {
      expect(isBoolean.normalize(input)).toBe(expected);
    });

    test('rejects other words with a CoercionError', () => {
      expect(() => isBoolean.normalize('maybe')).toThrow(CoercionError);
      expect(() => isBoolean.normalize('maybe')).toThrow(
        'isBoolean cannot coerce "maybe": must be boolean'
      );
    });

    test('does not trim surrounding whitespace', () => {
      expect(isBoolean.normalizeTest(' yes')).toBe(false);
    });
  });

  describe('test', () => {
    const scenarios: Array<TestScenario<unknown, boolean>> = [
      { id: 'True', description: 'Native boolean.', input: true, expected: true },
      { id: 'One', description: 'Numeric 1.', input: 1, expected: true },
      { id: 'Two', description: 'Other numbers are not flags.', input: 2, expected: false },
      { id: 'Yes', description: 'Coercible word.', input: 'yes', expected: true },
      { id: 'Maybe', description: 'Unknown word.', input: 'maybe', expected: false },
      { id: 'Null', description: 'Absence coerces to false.', input: null, expected: true },
      { id: 'Object', description: 'Objects are not flags.', input: {}, expected: false },
      { id: 'Inherit', description: 'Deferred values are accepted.', input: inherit, expected: true }
    ];

    test.for(scenarios)('[$id] $description', ({ input, expected }) => {
      expect(isBoolean.test(input)).toBe(expected);
    });
  });
});
