import { isAbsent } from '../utils/type-guards';
import { LazyValue } from './lazy-value';

type MemberKey = string | symbol;

/**
 * Holders of every cached member of an instance (or of a class, for static
 * members), keyed by member name. Backs the overwrite and reset helpers.
 */
const holderRegistry = new WeakMap<object, Map<MemberKey, LazyValue<unknown>>>();

function registerHolder(
  owner: object,
  key: MemberKey,
  holder: LazyValue<unknown>
): void {
  let holders = holderRegistry.get(owner);
  if (!holders) {
    holders = new Map();
    holderRegistry.set(owner, holders);
  }
  holders.set(key, holder);
}

function lookupHolder(owner: object, key: MemberKey): LazyValue<unknown> {
  const holder = holderRegistry.get(owner)?.get(key);
  if (!holder) {
    throw new TypeError(
      `[CachedProperty] "${String(key)}" is not a cached property of this object.`
    );
  }
  return holder;
}

/**
 * Per-decorator holder table: one {@link LazyValue} per owner, created on
 * demand and announced to the shared registry.
 */
function createHolderTable<This extends object, V>(
  key: MemberKey,
  computeFor: (owner: This) => V
): (owner: This) => LazyValue<V> {
  const holders = new WeakMap<This, LazyValue<V>>();

  return owner => {
    let holder = holders.get(owner);
    if (!holder) {
      holder = new LazyValue(() => computeFor(owner));
      holders.set(owner, holder);
      registerHolder(owner, key, holder);
    }
    return holder;
  };
}

/**
 * Getter decorator: runs the getter once per instance and memoizes the result.
 *
 * ```ts
 * class Report {
 *   @cachedProperty
 *   get summary(): string {
 *     return expensiveSummary(this);
 *   }
 * }
 * ```
 *
 * The cache can be replaced or cleared with {@link overwriteCachedProperty}
 * and {@link resetCachedProperty}. A getter returning `null` or `undefined`
 * runs again on every read.
 */
export function cachedProperty<This extends object, V>(
  getter: (this: This) => V,
  context: ClassGetterDecoratorContext<This, V>
): (this: This) => V {
  const holderFor = createHolderTable<This, V>(context.name, owner =>
    getter.call(owner)
  );

  context.addInitializer(function () {
    holderFor(this);
  });

  return function (this: This): V {
    return holderFor(this).get();
  };
}

/**
 * Auto-accessor decorator factory: the first read computes
 * `compute(instance, ...args)`; assignment overwrites the cached value and
 * assigning `undefined` resets it. An initializer, when present, seeds the
 * cache.
 *
 * ```ts
 * class Grid {
 *   constructor(readonly cells: number[]) {}
 *
 *   @cachedPropertyWith((grid: Grid, scale: number) => sum(grid.cells) * scale, 10)
 *   accessor weight: number | undefined;
 * }
 *
 * grid.weight;             // computed once
 * grid.weight = undefined; // recomputed on the next read
 * ```
 */
export function cachedPropertyWith<
  This extends object,
  V,
  A extends readonly unknown[]
>(compute: (instance: This, ...args: A) => V, ...args: A) {
  return function (
    _target: ClassAccessorDecoratorTarget<This, V | undefined>,
    context: ClassAccessorDecoratorContext<This, V | undefined>
  ): ClassAccessorDecoratorResult<This, V | undefined> {
    const holderFor = createHolderTable<This, V>(context.name, owner =>
      compute(owner, ...args)
    );

    context.addInitializer(function () {
      holderFor(this);
    });

    return {
      get(this: This) {
        return holderFor(this).get();
      },
      set(this: This, value: V | undefined) {
        holderFor(this).set(value);
      },
      init(this: This, value: V | undefined) {
        if (!isAbsent(value)) holderFor(this).set(value);
        return value;
      }
    };
  };
}

/**
 * Replaces the cached value of a member decorated with {@link cachedProperty}
 * or {@link cachedPropertyWith}, without running its computation.
 *
 * @throws TypeError if `key` is not a cached member of `instance`.
 */
export function overwriteCachedProperty<
  T extends object,
  K extends keyof T & MemberKey
>(instance: T, key: K, value: T[K]): void {
  lookupHolder(instance, key).set(value);
}

/**
 * Clears the cached value of a member; the next read recomputes it.
 *
 * @throws TypeError if `key` is not a cached member of `instance`.
 */
export function resetCachedProperty<
  T extends object,
  K extends keyof T & MemberKey
>(instance: T, key: K): void {
  lookupHolder(instance, key).reset();
}
