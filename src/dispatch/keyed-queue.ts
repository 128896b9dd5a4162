/**
 * Keyed Serial Queue
 *
 * Tasks sharing a key run one after another in arrival order; tasks under
 * different keys run concurrently. A failed task does not block the ones
 * queued behind it; its rejection reaches only its own caller.
 */
export class KeyedSerialQueue {
  private readonly tails = new Map<string, Promise<void>>();

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);

    const release = (): void => {
      if (this.tails.get(key) === tail) this.tails.delete(key);
    };
    const tail: Promise<void> = result.then(release, release);
    this.tails.set(key, tail);

    return result;
  }

  /** Resolves once no key has queued or running work */
  async onIdle(): Promise<void> {
    while (this.tails.size > 0) {
      await Promise.all(this.tails.values());
    }
  }

  /** Number of keys with queued or running work */
  get activeKeys(): number {
    return this.tails.size;
  }
}
