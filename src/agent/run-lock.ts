/**
 * RunLock - Keyed mutual exclusion for conversation turns.
 *
 * A second `acquire` on a held key waits until the holder releases.
 */
export class RunLock {
  private locks = new Map<string, Promise<void>>();

  /**
   * Resolves with the release function once the key is free
   */
  async acquire(key: string): Promise<() => void> {
    let held = this.locks.get(key);
    while (held) {
      await held;
      held = this.locks.get(key);
    }

    let release: () => void = () => {};
    const promise = new Promise<void>((resolve) => {
      release = () => {
        if (this.locks.get(key) === promise) {
          this.locks.delete(key);
        }
        resolve();
      };
    });

    this.locks.set(key, promise);
    return release;
  }

  isLocked(key: string): boolean {
    return this.locks.has(key);
  }

  get lockedKeys(): string[] {
    return [...this.locks.keys()];
  }
}
