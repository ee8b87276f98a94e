import { describe, expect, test } from 'vitest';

import type { TestScenario } from '../../tests/types';
import { resolveScenarioInput } from '../../tests/test-utils';
import { type EnumSource, enumKeys, enumValues, smartEnum } from '../smart-enum';

enum Color {
  Red,
  Green,
  Blue
}

enum Direction {
  Up = 'UP',
  Down = 'DOWN'
}

enum Level {
  Low = 1,
  High = 10
}

enum Offset {
  Back = -1,
  Stay = 0,
  Half = 0.5
}

type Listing = { keys: string[]; values: string[] };

describe('enum helpers', () => {
  const scenarios: Array<TestScenario<EnumSource, Listing>> = [
    {
      id: 'Numeric Enum',
      description: 'Reverse mappings are not members; values are stringified.',
      input: Color,
      expected: { keys: ['Red', 'Green', 'Blue'], values: ['0', '1', '2'] }
    },
    {
      id: 'String Enum',
      description: 'String members keep their declared values.',
      input: Direction,
      expected: { keys: ['Up', 'Down'], values: ['UP', 'DOWN'] }
    },
    {
      id: 'Initialized Numeric Enum',
      description: 'Explicit numeric initializers are reported as strings.',
      input: Level,
      expected: { keys: ['Low', 'High'], values: ['1', '10'] }
    },
    {
      id: 'Negative And Fractional Values',
      description: 'Reverse mappings under non-index keys are not members.',
      input: Offset,
      expected: { keys: ['Back', 'Stay', 'Half'], values: ['-1', '0', '0.5'] }
    },
    {
      id: 'Numeric-Looking Member Names',
      description: 'Literal members named like numbers are kept.',
      input: { '404': 'missing', ok: 'fine' },
      expected: { keys: ['404', 'ok'], values: ['missing', 'fine'] }
    },
    {
      id: 'Literal Object',
      description: 'Plain constant objects list members in declaration order.',
      input: { Draft: 'draft', Published: 'published' },
      expected: { keys: ['Draft', 'Published'], values: ['draft', 'published'] }
    }
  ];

  test.for(scenarios)('[$id] $description', ({ input, expected }) => {
    const source = resolveScenarioInput(input);
    const wrapped = smartEnum(source);

    expect({ keys: enumKeys(source), values: enumValues(source) }).toStrictEqual(
      expected
    );
    expect({ keys: wrapped.keys(), values: wrapped.values() }).toStrictEqual(
      expected
    );
  });
});

describe('smartEnum', () => {
  test('exposes the members', () => {
    const Status = smartEnum({ Active: 'active', Closed: 'closed' });

    expect(Status.Active).toBe('active');
    expect(Status.Closed).toBe('closed');
  });

  test('keeps the reverse mapping of numeric enums', () => {
    const Palette = smartEnum(Color);

    expect(Palette.Green).toBe(Color.Green);
    expect(Palette[2]).toBe('Blue');
  });

  test('the accessors are not enumerable', () => {
    const Status = smartEnum({ Active: 'active', Closed: 'closed' });

    expect(Object.keys(Status)).toStrictEqual(['Active', 'Closed']);
    expect({ ...Status }).toStrictEqual({ Active: 'active', Closed: 'closed' });
  });

  test('is frozen', () => {
    const Status = smartEnum({ Active: 'active' });

    expect(Object.isFrozen(Status)).toBe(true);
    expect(Reflect.set(Status, 'Active', 'changed')).toBe(false);
    expect(Status.Active).toBe('active');
  });

  test('accessors return fresh arrays', () => {
    const Status = smartEnum({ Active: 'active', Closed: 'closed' });
    Status.keys().pop();
    Status.values().length = 0;

    expect(Status.keys()).toStrictEqual(['Active', 'Closed']);
    expect(Status.values()).toStrictEqual(['active', 'closed']);
  });

  test.for(['keys', 'values'])(
    'rejects a member named "%s"',
    name => {
      expect(() => smartEnum({ [name]: 1 })).toThrowError(
        `[SmartEnum] Member name "${name}" is reserved for the accessor of the same name.`
      );
    }
  );
});
