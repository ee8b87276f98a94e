import type { Named } from '../types/primitives';
import { declaredNameOf } from '../guards';
import { QDict } from './qdict';

/**
 * Attribute mapping that indexes objects by their declared name.
 *
 * Where `QList#register` records only the name, `ObjectDict#register` stores
 * the object itself under that name:
 *
 * ```ts
 * const symbols = new ObjectDict();
 *
 * @symbols.register
 * class Point {}
 *
 * symbols.Point === Point; // true
 * ```
 */
export class ObjectDict extends QDict {
  /**
   * Stores `item` under `item.name` (overwriting any previous entry) and
   * returns it unchanged. Bound, so it also works as a class decorator.
   *
   * @throws TypeError if `item` has no non-empty string `name`.
   */
  get register(): <I extends Named>(item: I) => I {
    return item => {
      this.set(declaredNameOf(item, 'ObjectDict'), item);
      return item;
    };
  }
}
