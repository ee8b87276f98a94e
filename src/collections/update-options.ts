export type UpdateOptions = {
  /**
   * Descend into nested mappings instead of replacing them.
   *
   * - `false`: every source entry is a leaf; values are copied by reference.
   * - `true`: when both sides of a key hold mappings, the source mapping is
   *   merged into the existing one (which is mutated in place).
   *
   * @default false
   */
  recursive: boolean;

  /**
   * Allow the update to introduce keys the target does not hold yet.
   *
   * - `true`: Additive merge (every source key is written).
   * - `false`: Refresh only. Keys of the target are looked up in the source
   *   and overwritten when found; source keys unknown to the target are
   *   dropped silently, at every depth.
   *
   * @default true
   */
  addKeys: boolean;

  /**
   * Wrap plain-object source values as `QDict` before storing them.
   *
   * Only consulted when `recursive` and `addKeys` are both `true`. Conversion
   * is one level deep: the wrapped mapping keeps its own nested plain objects
   * as they are.
   *
   * @default false
   */
  convertToQDict: boolean;
};

/**
 * Fills in the documented defaults for an `update` call.
 *
 * @param options - Caller overrides.
 * @returns The complete option set.
 */
export function normalizeUpdateOptions(
  options: Partial<UpdateOptions>
): UpdateOptions {
  return {
    recursive: options.recursive ?? false,
    addKeys: options.addKeys ?? true,
    convertToQDict: options.convertToQDict ?? false
  };
}
