/**
 * A runtime check that doubles as a TypeScript narrowing.
 * `QDict#attr` accepts one to type the value it returns.
 */
export type Guard<T> = (value: unknown) => value is T;

/**
 * `typeof` keywords checked by this package, and the types they narrow to.
 */
type TypeofNarrowing = {
  string: string;
  number: number;
  function: (...args: never[]) => unknown;
};

/**
 * Builds a guard from a `typeof` keyword.
 *
 * ```ts
 * const isText = is('string');
 * isText('a'); // true
 * ```
 */
export function is<K extends keyof TypeofNarrowing>(
  keyword: K
): Guard<TypeofNarrowing[K]> {
  return (value: unknown): value is TypeofNarrowing[K] =>
    typeof value === keyword;
}

/** `typeof value === 'string'`. */
export const isString = is('string');

/** `typeof value === 'number'`; `NaN` and infinities pass. */
export const isNumber = is('number');

/** Functions and classes. */
export const isFunction = is('function');

/**
 * Guard verifying the value is `null` or `undefined`.
 *
 * This is the "absent" marker shared by the property helpers: a cleared weak
 * slot, a reset cache and an unset field all read as one of these two.
 */
export function isAbsent(value: unknown): value is null | undefined {
  return value === null || value === undefined;
}

/**
 * Lifts an element guard to arrays: passes for arrays (empty ones included)
 * whose every element passes `elementGuard`.
 */
export function isArrayOf<T>(elementGuard: Guard<T>): Guard<T[]> {
  return (value: unknown): value is T[] =>
    Array.isArray(value) && value.every(element => elementGuard(element));
}
