import type { Named } from '../types/primitives';
import { declaredNameOf } from '../guards';

/**
 * Ordered list with out-of-range-safe reads and name registration.
 *
 * `QList` is a real `Array` subclass: indexing, `length`, iteration and every
 * array method keep working, and methods that create arrays (`map`, `filter`,
 * `slice`, …) return `QList` instances through `Symbol.species`.
 *
 * Usage:
 * ```ts
 * const manifest = new QList<string>();
 *
 * @manifest.register
 * class Point {}
 *
 * manifest.register(parsePoint);
 * String(manifest);       // "[Point, parsePoint]"
 * manifest.get(5, 'n/a'); // "n/a"
 * ```
 *
 * @template T - The element type.
 */
export class QList<T> extends Array<T> {
  /**
   * Reads the element at `index`, or `undefined` when the index is outside
   * `0 <= index < length`.
   */
  get(index: number): T | undefined;

  /**
   * Reads the element at `index`, or returns `defaultValue` exactly (including
   * `null`/`undefined`) when the index is outside `0 <= index < length`.
   */
  get<D>(index: number, defaultValue: D): T | D;

  get<D>(index: number, defaultValue?: D): T | D | undefined {
    // Negative indices never wrap around, and non-integers never coerce to a
    // neighbouring slot.
    if (!Number.isInteger(index) || index < 0 || index >= this.length) {
      return defaultValue;
    }
    return this[index];
  }

  /**
   * Appends the declared name of `item` and returns `item` unchanged.
   *
   * Exposed as a getter returning a bound function so that both call forms
   * reach this list:
   * - `list.register(fn)`
   * - `@list.register class Foo {}` (decorators are invoked without a receiver)
   *
   * The declared name must be assignable to the element type, so registration
   * type-checks on `QList<string>` and is rejected on e.g. `QList<number>`.
   *
   * @throws TypeError if `item` has no non-empty string `name`.
   */
  get register(): <I extends Named<T>>(item: I) => I {
    return item => {
      declaredNameOf(item, 'QList');
      this.push(item.name);
      return item;
    };
  }

  /**
   * Renders the list as `[a, b, c]` using each element's string conversion.
   */
  override toString(): string {
    return '[' + Array.from(this, element => String(element)).join(', ') + ']';
  }
}
