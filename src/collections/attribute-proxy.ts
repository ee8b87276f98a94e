import { MissingAttributeError } from '../errors';

/**
 * Slot holding the entries of an attribute mapping.
 *
 * Symbol-keyed so that no attribute name can ever collide with it.
 */
export const ENTRIES = Symbol('smart-primitives.qdict.entries');

/**
 * The structural contract the attribute handler operates on.
 */
export type EntryStore = { readonly [ENTRIES]: Map<string, unknown> };

/**
 * Property names the JavaScript runtime probes on arbitrary objects.
 *
 * `await value` and `Promise.resolve(value)` read `then`; a mapping that threw
 * for it could never be returned from an async function. Absent entries under
 * these names read as `undefined` instead of failing.
 */
const PROTOCOL_PROBES: ReadonlySet<string> = new Set(['then']);

/**
 * Creates the Proxy handler that exposes the entries of an {@link EntryStore}
 * as properties.
 *
 * Resolution order for `proxy[property]`:
 *
 * 1. Members (Structural Precedence):
 *    Symbols and names reachable on the target or its prototype chain
 *    (`get`, `copy`, `update`, `constructor`, …) resolve to the member.
 *    Entries under those names stay reachable through `get(key)`.
 *
 * 2. Entries (Item Lookup):
 *    Any other string is looked up in the entry store.
 *
 * 3. Miss (Strict Absence):
 *    A string that is neither a member nor an entry throws
 *    {@link MissingAttributeError}; there is no `undefined` fallback.
 *
 * Writes, `in`, `delete`, `Object.keys` and property descriptors all route
 * string keys to the entry store, so spread, `JSON.stringify` and
 * `Object.entries` observe the entries and nothing else.
 *
 * @template T - The concrete store type (the mapping class).
 * @returns A handler suitable for `new Proxy(store, handler)`.
 */
export function createAttributeHandler<T extends EntryStore>(): ProxyHandler<T> {
  return {
    get(target, property, receiver) {
      // 1. Members
      if (typeof property === 'symbol' || property in target) {
        return Reflect.get(target, property, receiver);
      }

      // 2. Entries
      const entries = target[ENTRIES];
      if (entries.has(property)) return entries.get(property);

      // 3. Miss
      if (PROTOCOL_PROBES.has(property)) return undefined;
      throw new MissingAttributeError(property);
    },

    set(target, property, value, receiver) {
      if (typeof property === 'symbol') {
        return Reflect.set(target, property, value, receiver);
      }
      target[ENTRIES].set(property, value);
      return true;
    },

    has(target, property) {
      if (typeof property === 'string' && target[ENTRIES].has(property)) {
        return true;
      }
      return Reflect.has(target, property);
    },

    deleteProperty(target, property) {
      if (typeof property === 'symbol') {
        return Reflect.deleteProperty(target, property);
      }
      target[ENTRIES].delete(property);
      return true;
    },

    ownKeys(target) {
      return Array.from(target[ENTRIES].keys());
    },

    getOwnPropertyDescriptor(target, property) {
      const entries = target[ENTRIES];
      if (typeof property === 'string' && entries.has(property)) {
        // Reported as configurable: the property does not exist on the
        // target, and Proxy invariants forbid reporting it otherwise.
        return {
          value: entries.get(property),
          writable: true,
          enumerable: true,
          configurable: true
        };
      }
      return Reflect.getOwnPropertyDescriptor(target, property);
    }
  };
}
