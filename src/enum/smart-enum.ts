import type { ValueOf } from 'type-fest';

import { isNumber, isString } from '../utils/type-guards';

/**
 * Anything that can back a smart enum: a native TypeScript `enum` object or a
 * literal object of string/number constants.
 */
export type EnumSource = Readonly<Record<string, string | number>>;

/**
 * Member names of an enum source.
 *
 * Numeric native enums also carry a reverse mapping under the printed member
 * values (`Color[0] === "Red"`); those keys are not members and are excluded.
 */
export type MemberName<E> = Extract<Exclude<keyof E, number>, string>;

/**
 * Union of the member values of an enum source.
 */
export type MemberValue<E> = ValueOf<E, MemberName<E>>;

/**
 * The convenience accessors a smart enum adds to its members.
 */
export interface SmartEnumAccessors<E> {
  /** Member names, in declaration order. */
  keys(): MemberName<E>[];
  /** Member values converted to strings, in declaration order. */
  values(): string[];
}

/**
 * A frozen closed set of named constants plus {@link SmartEnumAccessors}.
 */
export type SmartEnum<E> = Readonly<E> & SmartEnumAccessors<E>;

const RESERVED_NAMES: ReadonlySet<string> = new Set(['keys', 'values']);

/**
 * Whether `key` is the reverse-mapping entry a numeric native enum emits for
 * one of its members: `source[key]` names a member whose value prints as
 * `key` (`Offset["-1"] === "Back"`, `Offset.Back === -1`).
 */
function isReverseMapping(source: EnumSource, key: string): boolean {
  const member = source[key];
  if (!isString(member) || !Object.hasOwn(source, member)) return false;

  const value = source[member];
  return isNumber(value) && String(value) === key;
}

function isMemberName<E extends EnumSource>(
  source: E,
  key: string
): key is MemberName<E> {
  return Object.hasOwn(source, key) && !isReverseMapping(source, key);
}

/**
 * Lists the member names of an enum source, in declaration order.
 *
 * ```ts
 * enum Color { Red, Green }
 * enumKeys(Color); // ['Red', 'Green']
 * ```
 */
export function enumKeys<E extends EnumSource>(source: E): MemberName<E>[] {
  return Object.keys(source).filter((key): key is MemberName<E> =>
    isMemberName(source, key)
  );
}

/**
 * Lists the member values of an enum source as strings, in declaration order.
 *
 * ```ts
 * enum Color { Red, Green }
 * enumValues(Color); // ['0', '1']
 * ```
 */
export function enumValues<E extends EnumSource>(source: E): string[] {
  return enumKeys(source).map(key => String(source[key]));
}

/**
 * Wraps an enum source as a frozen {@link SmartEnum}.
 *
 * The members (and, for numeric native enums, the reverse mapping) are copied
 * as-is; `keys()` and `values()` are attached as non-enumerable members, so
 * `Object.keys` and spreading still see only the enum's own entries.
 *
 * ```ts
 * const Status = smartEnum({ Active: 'active', Closed: 'closed' });
 * Status.Active;   // 'active'
 * Status.keys();   // ['Active', 'Closed']
 * Status.values(); // ['active', 'closed']
 * ```
 *
 * @throws Error if a member is named `keys` or `values`.
 */
export function smartEnum<const E extends EnumSource>(source: E): SmartEnum<E> {
  const names = enumKeys(source);

  for (const name of names) {
    if (RESERVED_NAMES.has(name)) {
      throw new Error(
        `[SmartEnum] Member name "${name}" is reserved for the accessor of the same name.`
      );
    }
  }

  const values = names.map(name => String(source[name]));

  const members = {
    ...source,
    keys: () => [...names],
    values: () => [...values]
  };

  for (const accessor of RESERVED_NAMES) {
    Object.defineProperty(members, accessor, { enumerable: false });
  }

  Object.freeze(members);
  return members;
}
