import { describe, expect, test, vi } from 'vitest';

import { nextTick } from '../../tests/test-utils';
import { weakProperty, weakPropertyWith } from '../weak-property';

class Peer {
  constructor(readonly label: string) {}
}

class Holder {
  @weakProperty
  accessor peer: Peer | undefined;
}

class SelfReferencing {
  @weakProperty
  accessor self: SelfReferencing | undefined;
}

const collectGarbage = globalThis.gc;

/**
 * Assigns a peer that nothing else references.
 */
function attachTemporaryPeer(holder: Holder): void {
  holder.peer = new Peer('temporary');
}

function createSelfReferencing(): WeakRef<SelfReferencing> {
  const instance = new SelfReferencing();
  instance.self = instance;
  return new WeakRef(instance);
}

describe('weakProperty', () => {
  test('reads back the assigned object', () => {
    const holder = new Holder();
    const peer = new Peer('a');
    holder.peer = peer;

    expect(holder.peer).toBe(peer);
  });

  test('reads undefined before any assignment', () => {
    expect(new Holder().peer).toBeUndefined();
  });

  test('assigning undefined clears the slot', () => {
    const holder = new Holder();
    holder.peer = new Peer('a');
    holder.peer = undefined;

    expect(holder.peer).toBeUndefined();
  });

  test('instances hold separate references', () => {
    const first = new Holder();
    const second = new Holder();
    const peer = new Peer('a');
    first.peer = peer;

    expect(first.peer).toBe(peer);
    expect(second.peer).toBeUndefined();
  });

  test('an initializer value is stored', () => {
    const shared = new Peer('shared');

    class Seeded {
      @weakProperty
      accessor peer: Peer | undefined = shared;
    }

    expect(new Seeded().peer).toBe(shared);
  });

  test.runIf(collectGarbage !== undefined)(
    'keeps answering while the referent is alive',
    async () => {
      const holder = new Holder();
      const peer = new Peer('kept');
      holder.peer = peer;

      await nextTick();
      collectGarbage?.();

      expect(holder.peer).toBe(peer);
    }
  );

  test.runIf(collectGarbage !== undefined)(
    'reads undefined once the referent is collected',
    async () => {
      const holder = new Holder();
      attachTemporaryPeer(holder);

      await nextTick();
      collectGarbage?.();

      expect(holder.peer).toBeUndefined();
    }
  );

  test.runIf(collectGarbage !== undefined)(
    'a self reference does not keep the instance alive',
    async () => {
      const probe = createSelfReferencing();

      await nextTick();
      collectGarbage?.();

      expect(probe.deref()).toBeUndefined();
    }
  );
});

describe('weakPropertyWith', () => {
  test('calls the hook with the instance and the value on every write', () => {
    const hook = vi.fn<(instance: Observed, value: Peer | undefined) => void>();

    class Observed {
      @weakPropertyWith(hook)
      accessor peer: Peer | undefined;
    }

    const observed = new Observed();
    const peer = new Peer('a');
    observed.peer = peer;
    observed.peer = undefined;

    expect(hook).toHaveBeenCalledTimes(2);
    expect(hook.mock.calls[0][0]).toBe(observed);
    expect(hook.mock.calls[0][1]).toBe(peer);
    expect(hook.mock.calls[1][0]).toBe(observed);
    expect(hook.mock.calls[1][1]).toBeUndefined();
  });

  test('the hook sees the new value already stored', () => {
    const seen: Array<string | undefined> = [];

    class Child {
      @weakPropertyWith((child: Child, _parent: Peer | undefined) => {
        seen.push(child.parent?.label);
      })
      accessor parent: Peer | undefined;
    }

    const parent = new Peer('root');
    const child = new Child();
    child.parent = parent;

    expect(seen).toStrictEqual(['root']);
  });

  test('an initializer does not call the hook', () => {
    const hook = vi.fn<(instance: Quiet, value: Peer | undefined) => void>();
    const initial = new Peer('initial');

    class Quiet {
      @weakPropertyWith(hook)
      accessor peer: Peer | undefined = initial;
    }

    expect(new Quiet().peer).toBe(initial);
    expect(hook).not.toHaveBeenCalled();
  });
});
