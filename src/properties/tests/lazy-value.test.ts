import { describe, expect, test, vi } from 'vitest';

import { LazyValue, lazyValueWith } from '../lazy-value';

describe('LazyValue', () => {
  test('computes on the first read only', () => {
    const compute = vi.fn(() => 42);
    const lazy = new LazyValue(compute);

    expect(compute).not.toHaveBeenCalled();
    expect(lazy.get()).toBe(42);
    expect(lazy.get()).toBe(42);
    expect(compute).toHaveBeenCalledTimes(1);
  });

  test('hasValue follows the lifecycle', () => {
    const lazy = new LazyValue(() => 'ready');

    expect(lazy.hasValue).toBe(false);
    lazy.get();
    expect(lazy.hasValue).toBe(true);
    lazy.reset();
    expect(lazy.hasValue).toBe(false);
  });

  test('set overwrites without computing', () => {
    const compute = vi.fn(() => 1);
    const lazy = new LazyValue(compute);
    lazy.set(5);

    expect(lazy.get()).toBe(5);
    expect(compute).not.toHaveBeenCalled();
  });

  test('reset forces a recomputation', () => {
    let runs = 0;
    const lazy = new LazyValue(() => ++runs);

    expect(lazy.get()).toBe(1);
    lazy.reset();
    expect(lazy.get()).toBe(2);
  });

  test('setting undefined empties the holder', () => {
    const lazy = new LazyValue(() => 'computed');
    lazy.set('manual');
    lazy.set(undefined);

    expect(lazy.get()).toBe('computed');
  });

  test('null results are recomputed on every read', () => {
    const compute = vi.fn((): string | null => null);
    const lazy = new LazyValue(compute);

    expect(lazy.get()).toBeNull();
    expect(lazy.get()).toBeNull();
    expect(compute).toHaveBeenCalledTimes(2);
  });
});

describe('lazyValueWith', () => {
  test('calls the computation with the fixed arguments', () => {
    const compute = vi.fn((base: number, exponent: number) => base ** exponent);
    const lazy = lazyValueWith(compute, 2, 10);

    expect(compute).not.toHaveBeenCalled();
    expect(lazy.get()).toBe(1024);
    expect(lazy.get()).toBe(1024);
    expect(compute).toHaveBeenCalledTimes(1);
    expect(compute).toHaveBeenCalledWith(2, 10);
  });

  test('returns a LazyValue', () => {
    expect(lazyValueWith((text: string) => text.length, 'abc')).toBeInstanceOf(
      LazyValue
    );
  });
});
