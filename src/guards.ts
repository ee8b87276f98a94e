import type { Named, PlainObjectRecord } from './types/primitives';
import { isFunction, isString } from './utils/type-guards';

/**
 * Whether `value` is a mapping literal: an object whose prototype is
 * `Object.prototype` (`{}`) or `null` (`Object.create(null)`).
 *
 * Arrays, dates, maps, class instances and attribute mappings (`QDict`,
 * whose prototype is `QDict.prototype`) are not. The merge policies rely on
 * that split to tell a nested attribute mapping from a nested plain one.
 */
export function isPlainObject(value: unknown): value is PlainObjectRecord {
  if (!isObjectLike(value)) return false;

  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

/**
 * Any non-null object, so that properties can be read through `Reflect.get`.
 */
export function isObjectLike(value: unknown): value is object {
  return typeof value === 'object' && value !== null;
}

/**
 * Checks whether a value carries a declared name usable as a registry key.
 *
 * Accepted shapes:
 * 1. Functions and classes: `Function.prototype.name` (non-empty).
 *    Anonymous functions report `""` and are rejected.
 * 2. Objects with an own or inherited string `name` property.
 */
export function isNamed(value: unknown): value is Named {
  if (!isFunction(value) && !isObjectLike(value)) return false;

  const name: unknown = Reflect.get(value, 'name');
  return isString(name) && name.length > 0;
}

/**
 * Reads the declared name of a value handed to a `register` operation.
 *
 * @param registryName - Shown in the error message, e.g. `QList`.
 * @throws TypeError if the value has no non-empty string `name`.
 */
export function declaredNameOf(item: unknown, registryName: string): string {
  if (!isNamed(item)) {
    throw new TypeError(
      `[${registryName}] Cannot register a value without a declared name (got ${describeValue(item)}).`
    );
  }
  return item.name;
}

/**
 * Short description of a value for error messages.
 */
export function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (isFunction(value)) return 'a function';
  if (Array.isArray(value)) return 'an array';
  return typeof value;
}
