/**
 * Per-key mutual exclusion.
 *
 * Tasks sharing a key run one at a time in arrival order; tasks with
 * different keys never wait on each other. In-process only: writers in
 * other processes are caught by the store's expected-version check.
 */
export class KeyedLock {
  private readonly _tails = new Map<string, Promise<void>>();

  async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this._tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this._tails.set(key, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (this._tails.get(key) === tail) {
        this._tails.delete(key);
      }
    }
  }

  /** Number of keys with a task running or queued. */
  get activeKeys(): number {
    return this._tails.size;
  }
}
