import { isAbsent } from '../utils/type-guards';

/**
 * A value computed on first demand and memoized until reset.
 *
 * Lifecycle:
 * 1. Empty: nothing stored; the next `get()` runs `compute`.
 * 2. Filled: by the first `get()` (computed) or by `set()` (overwritten);
 *    further reads return the stored value without recomputation.
 * 3. Reset: `reset()` (or `set(undefined)`) returns the holder to Empty.
 *
 * Limitation:
 * `null` and `undefined` double as the "empty" marker. A computation that
 * legitimately yields either cannot be memoized and runs again on every read.
 *
 * @template T - The type of the computed value.
 */
export class LazyValue<T> {
  private stored: T | undefined;

  constructor(private readonly compute: () => T) {}

  /** Whether a value is currently stored. */
  get hasValue(): boolean {
    return !isAbsent(this.stored);
  }

  /**
   * Returns the stored value, computing and storing it first when empty.
   */
  get(): T {
    const current = this.stored;
    if (!isAbsent(current)) return current;

    const computed = this.compute();
    this.stored = computed;
    return computed;
  }

  /**
   * Overwrites the stored value without running the computation.
   */
  set(value: T | undefined): void {
    this.stored = value;
  }

  /**
   * Discards the stored value; the next read recomputes.
   */
  reset(): void {
    this.stored = undefined;
  }
}

/**
 * Creates a {@link LazyValue} whose computation is `compute(...args)`, with
 * the arguments fixed now and the call deferred to the first read.
 *
 * ```ts
 * const table = lazyValueWith(buildLookupTable, 'en', { caseSensitive: false });
 * table.get(); // buildLookupTable('en', { caseSensitive: false })
 * ```
 */
export function lazyValueWith<A extends readonly unknown[], T>(
  compute: (...args: A) => T,
  ...args: A
): LazyValue<T> {
  return new LazyValue(() => compute(...args));
}
