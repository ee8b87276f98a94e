/**
 * A plain mapping keyed by attribute names.
 *
 * Symbol keys are left out: attribute mappings only ever hold string keys,
 * and merges walk plain sources with `Object.entries`, which skips symbols.
 */
export type PlainObjectRecord = Record<string, unknown>;

/**
 * Anything with a declared name, as accepted by the `register` operations.
 *
 * Functions and classes satisfy it through `Function.prototype.name`; other
 * objects by declaring a `name` property.
 *
 * @template N - The type of the declared name.
 */
export type Named<N = string> = { readonly name: N };

/**
 * A `[key, value]` pair as produced by `Object.entries` and `Map#entries`.
 */
export type EntryPair<V = unknown> = readonly [key: string, value: V];
