import { isAbsent } from '../utils/type-guards';

/**
 * Change hook of a weak property, called after every assignment with the
 * owning instance and the assigned value. Its return value is ignored.
 */
export type WeakPropertyHook<This, V> = (
  instance: This,
  value: V | undefined
) => void;

/**
 * Auto-accessor decorator factory for a property that holds its value through
 * a `WeakRef`.
 *
 * - Read: the referent while it is alive, `undefined` once it has been
 *   collected or the slot was cleared.
 * - Write: replaces the reference (`undefined` or `null` clears it), then
 *   calls `hook(instance, value)`.
 *
 * An initializer value is stored without calling the hook.
 *
 * ```ts
 * class TreeNode {
 *   @weakPropertyWith((node: TreeNode, parent: TreeNode | undefined) =>
 *     parent?.children.add(node)
 *   )
 *   accessor parent: TreeNode | undefined;
 *
 *   readonly children = new Set<TreeNode>();
 * }
 * ```
 */
export function weakPropertyWith<This extends object, V extends object>(
  hook?: WeakPropertyHook<This, V>
) {
  return function (
    _target: ClassAccessorDecoratorTarget<This, V | undefined>,
    _context: ClassAccessorDecoratorContext<This, V | undefined>
  ): ClassAccessorDecoratorResult<This, V | undefined> {
    const references = new WeakMap<This, WeakRef<V>>();

    const store = (instance: This, value: V | null | undefined): void => {
      if (isAbsent(value)) {
        references.delete(instance);
      } else {
        references.set(instance, new WeakRef(value));
      }
    };

    return {
      get(this: This) {
        return references.get(this)?.deref();
      },
      set(this: This, value: V | undefined) {
        store(this, value);
        hook?.(this, value);
      },
      init(this: This, value: V | undefined) {
        store(this, value);
        return undefined;
      }
    };
  };
}

/**
 * Auto-accessor decorator for a weakly referenced property without a change
 * hook. See {@link weakPropertyWith}.
 *
 * ```ts
 * class Listener {
 *   @weakProperty
 *   accessor source: EventSource | undefined;
 * }
 * ```
 */
export function weakProperty<This extends object, V extends object>(
  target: ClassAccessorDecoratorTarget<This, V | undefined>,
  context: ClassAccessorDecoratorContext<This, V | undefined>
): ClassAccessorDecoratorResult<This, V | undefined> {
  return weakPropertyWith<This, V>()(target, context);
}
