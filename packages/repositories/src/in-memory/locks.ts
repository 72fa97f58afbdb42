// Keyed mutex for in-memory per-entity serialization
//
// Waiters on the same key are served in arrival order. Different keys never
// wait on each other.

/**
 * Releases a held lock. Calling it more than once has no further effect.
 */
export type Release = () => void;

export class KeyedMutex<K> {
  private tails = new Map<K, Promise<void>>();

  /**
   * Wait for the lock on `key` and return its release function.
   */
  async acquire(key: K): Promise<Release> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let unlock: () => void = () => {};
    const held = new Promise<void>((resolve) => {
      unlock = resolve;
    });
    const tail = previous.then(() => held);
    this.tails.set(key, tail);

    await previous;

    let released = false;
    return () => {
      if (released) return;
      released = true;
      unlock();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    };
  }

  /**
   * Whether anyone holds or waits for the lock on `key`.
   */
  isLocked(key: K): boolean {
    return this.tails.has(key);
  }
}
