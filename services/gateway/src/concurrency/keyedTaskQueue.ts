export type Task<T> = () => Promise<T> | T;

const noop = () => undefined;

/**
 * Runs tasks one at a time per key, in submission order.
 * Tasks under different keys never wait on each other.
 * A key's queue is dropped once it has no pending work.
 */
export class KeyedTaskQueue<K> {
  private readonly tails = new Map<K, Promise<void>>();

  push<T>(key: K, task: Task<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const run = previous.then(() => task());
    // the tail only tracks completion; failures stay with the caller of `run`
    const tail = run.then(noop, noop);
    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) this.tails.delete(key);
    });
    return run;
  }

  /** Number of keys with queued or running tasks. */
  pendingKeys(): number {
    return this.tails.size;
  }
}
