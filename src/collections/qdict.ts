import { inspect } from 'node:util';

import type { EntryPair, PlainObjectRecord } from '../types/primitives';
import type { Guard } from '../utils/type-guards';
import { MissingAttributeError } from '../errors';
import { describeValue, isPlainObject } from '../guards';
import { ENTRIES, createAttributeHandler } from './attribute-proxy';
import { type UpdateOptions, normalizeUpdateOptions } from './update-options';

/**
 * Anything an attribute mapping accepts as a merge source:
 * another `QDict`, or a plain object (see `isPlainObject`).
 */
export type MappingSource = QDict | PlainObjectRecord;

/**
 * Accepted constructor input: a mapping, or `[key, value]` pairs
 * (e.g. a `Map<string, unknown>` or the result of `Object.entries`).
 */
export type QDictInit = MappingSource | Iterable<EntryPair>;

/**
 * Attribute view: every string property of a `QDict` is typed as `unknown`.
 *
 * Reads of absent entries throw at runtime, so the type carries
 * no `undefined`; use `has`, `get` or `attr(key, guard)` for narrowing.
 */
export interface QDict {
  [attribute: string]: unknown;
}

/**
 * Simple attribute dictionary.
 *
 * Entries live in a private `Map` and are exposed as properties through a
 * Proxy (see `createAttributeHandler`).
 *
 * Usage:
 * ```ts
 * const d = new QDict({ a: 'some', b: 'thing' });
 * d.a;          // 'some'
 * d.c = 1235;
 * d.toRecord(); // { a: 'some', b: 'thing', c: 1235 }
 * d.missing;    // throws MissingAttributeError
 * ```
 */
export class QDict implements Iterable<[string, unknown]> {
  readonly [ENTRIES] = new Map<string, unknown>();

  constructor(init?: QDictInit) {
    if (init instanceof QDict || isPlainObject(init)) {
      this.update(init);
    } else if (init !== undefined) {
      for (const [key, value] of init) this[ENTRIES].set(key, value);
    }

    return new Proxy(this, createAttributeHandler<QDict>());
  }

  get size(): number {
    return this[ENTRIES].size;
  }

  /**
   * Item lookup with an optional fallback (never throws).
   */
  get(key: string, defaultValue?: unknown): unknown {
    const entries = this[ENTRIES];
    return entries.has(key) ? entries.get(key) : defaultValue;
  }

  set(key: string, value: unknown): this {
    this[ENTRIES].set(key, value);
    return this;
  }

  has(key: string): boolean {
    return this[ENTRIES].has(key);
  }

  delete(key: string): boolean {
    return this[ENTRIES].delete(key);
  }

  clear(): void {
    this[ENTRIES].clear();
  }

  keys(): IterableIterator<string> {
    return this[ENTRIES].keys();
  }

  values(): IterableIterator<unknown> {
    return this[ENTRIES].values();
  }

  entries(): IterableIterator<[string, unknown]> {
    return this[ENTRIES].entries();
  }

  [Symbol.iterator](): IterableIterator<[string, unknown]> {
    return this.entries();
  }

  /**
   * Explicit property-style accessor.
   *
   * @throws MissingAttributeError if `key` is not an entry.
   */
  attr(key: string): unknown;

  /**
   * Explicit property-style accessor with a runtime type check.
   *
   * ```ts
   * const port = config.attr('port', isNumber); // number
   * ```
   *
   * @throws MissingAttributeError if `key` is not an entry.
   * @throws TypeError if the stored value does not satisfy `guard`.
   */
  attr<T>(key: string, guard: Guard<T>): T;

  attr<T>(key: string, guard?: Guard<T>): unknown {
    const entries = this[ENTRIES];
    if (!entries.has(key)) throw new MissingAttributeError(key);

    const value = entries.get(key);
    if (guard && !guard(value)) {
      throw new TypeError(
        `Attribute "${key}" holds ${describeValue(value)}, which does not match the requested type.`
      );
    }
    return value;
  }

  /**
   * Creates a new mapping holding the same entries (shallow), then merges
   * `add` into it additively when given. The original is left untouched.
   */
  copy(add?: MappingSource): QDict {
    const result = new QDict();
    result.update(this);
    if (add) result.update(add);
    return result;
  }

  /**
   * Additive combination (`a + b`): a copy of this mapping overwritten by the
   * entries of `other`. Neither operand is mutated.
   */
  plus(other: MappingSource): QDict {
    return this.copy().update(other);
  }

  /**
   * Merges `source` into this mapping in place.
   *
   * The policy is selected by two switches (see {@link UpdateOptions}):
   *
   * | recursive | addKeys | behavior                                                 |
   * |-----------|---------|----------------------------------------------------------|
   * | `false`   | `true`  | Plain merge-overwrite of every source entry.             |
   * | `false`   | `false` | Refresh keys this mapping already holds; drop the rest.  |
   * | `true`    | `true`  | Additive deep merge (nested mappings merged, not replaced). |
   * | `true`    | `false` | Deep refresh along this mapping's own keys.              |
   *
   * Sources that are not mappings (`null`, arrays, class instances, …) are
   * ignored.
   *
   * @param source - The mapping to merge from.
   * @param options - Merge policy overrides.
   * @returns This mapping.
   */
  update(source: unknown, options: Partial<UpdateOptions> = {}): this {
    if (!isMapping(source)) return this;

    const resolved = normalizeUpdateOptions(options);
    if (!resolved.recursive) {
      mergeShallow(this, source, resolved.addKeys);
    } else if (resolved.addKeys) {
      mergeDeepAdditive(this, source, resolved);
    } else {
      mergeDeepRefresh(this, source);
    }
    return this;
  }

  /**
   * Plain-object snapshot of the entries (values are not copied).
   */
  toRecord(): PlainObjectRecord {
    return Object.fromEntries(this[ENTRIES]);
  }

  toJSON(): PlainObjectRecord {
    return this.toRecord();
  }

  /**
   * Renders the entries as `{a: 'some', b: 2}`.
   */
  toString(): string {
    const parts = Array.from(
      this[ENTRIES],
      ([key, value]) => `${key}: ${inspect(value)}`
    );
    return '{' + parts.join(', ') + '}';
  }

  [inspect.custom](): string {
    return this.toString();
  }
}

/**
 * Sentinel for "key not present in the source", distinct from a stored
 * `undefined`.
 */
const MISSING = Symbol('smart-primitives.qdict.missing');

function isMapping(value: unknown): value is MappingSource {
  return value instanceof QDict || isPlainObject(value);
}

function entriesOf(source: MappingSource): EntryPair[] {
  return source instanceof QDict
    ? Array.from(source.entries())
    : Object.entries(source);
}

function readEntry(
  source: MappingSource,
  key: string
): unknown | typeof MISSING {
  if (source instanceof QDict) {
    return source.has(key) ? source.get(key) : MISSING;
  }
  return Object.hasOwn(source, key) ? source[key] : MISSING;
}

/**
 * Merges the entries of a mapping into a plain object in place (one level).
 */
function assignInto(target: PlainObjectRecord, source: MappingSource): void {
  for (const [key, value] of entriesOf(source)) target[key] = value;
}

/**
 * Non-recursive policies.
 *
 * - Additive: every source entry overwrites.
 * - Refresh: iterates the target's keys (snapshot) and pulls replacement
 *   values from the source; keys only the source holds are never introduced.
 */
function mergeShallow(
  target: QDict,
  source: MappingSource,
  addKeys: boolean
): void {
  if (addKeys) {
    for (const [key, value] of entriesOf(source)) target.set(key, value);
    return;
  }

  for (const key of Array.from(target.keys())) {
    const incoming = readEntry(source, key);
    if (incoming !== MISSING) target.set(key, incoming);
  }
}

/**
 * Recursive additive policy, applied per source key:
 *
 * 1. Conversion: with `convertToQDict`, a plain-object value is wrapped as a
 *    `QDict` first.
 * 2. Nested attribute mapping: when the target already holds a `QDict` under
 *    the key, the value is merged into it with the same options. A value that
 *    is not a mapping leaves the nested `QDict` unchanged.
 * 3. Nested plain object: when the target holds a plain object and the value
 *    is a mapping, the value's entries are assigned into it (one level).
 * 4. Otherwise the value overwrites.
 */
function mergeDeepAdditive(
  target: QDict,
  source: MappingSource,
  options: UpdateOptions
): void {
  for (const [key, incoming] of entriesOf(source)) {
    // 1. Conversion
    const value =
      options.convertToQDict && isPlainObject(incoming)
        ? new QDict(incoming)
        : incoming;

    if (target.has(key)) {
      const current = target.get(key);

      // 2. Nested attribute mapping
      if (current instanceof QDict) {
        current.update(value, options);
        continue;
      }

      // 3. Nested plain object
      if (isPlainObject(current) && isMapping(value)) {
        assignInto(current, value);
        continue;
      }
    }

    // 4. Overwrite
    target.set(key, value);
  }
}

/**
 * Recursive refresh policy, applied per target key:
 *
 * 1. Keys missing from the source keep their value.
 * 2. Nested attribute mapping: refreshed recursively (still without adding
 *    keys, and without conversion).
 * 3. Nested plain object: a mapping value is assigned into it (one level);
 *    any other value leaves it unchanged.
 * 4. Otherwise the source value overwrites.
 */
function mergeDeepRefresh(target: QDict, source: MappingSource): void {
  for (const [key, current] of Array.from(target.entries())) {
    const incoming = readEntry(source, key);

    // 1. Missing from source
    if (incoming === MISSING) continue;

    // 2. Nested attribute mapping
    if (current instanceof QDict) {
      current.update(incoming, { recursive: true, addKeys: false });
      continue;
    }

    // 3. Nested plain object
    if (isPlainObject(current)) {
      if (isMapping(incoming)) assignInto(current, incoming);
      continue;
    }

    // 4. Overwrite
    target.set(key, incoming);
  }
}
