// Promise-chain serialization
//
// Single-process only. A deployment running several host processes against
// the same store must hold the per-id lock in the store instead.

/**
 * Runs tasks one at a time, in submission order.
 * A failed task does not block the ones queued behind it.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private waiting = 0;

  /** Tasks submitted but not yet settled */
  get pending(): number {
    return this.waiting;
  }

  enqueue<T>(task: () => Promise<T>): Promise<T> {
    this.waiting++;
    const result = this.tail.then(task);
    this.tail = result.then(
      () => {
        this.waiting--;
      },
      () => {
        this.waiting--;
      }
    );
    return result;
  }

  /**
   * Resolves once everything submitted so far has settled.
   */
  drain(): Promise<void> {
    return this.tail;
  }
}

/**
 * One SerialQueue per key, created on demand and dropped when idle.
 * Different keys never wait on each other.
 */
export class KeyedMutex {
  private queues = new Map<string, SerialQueue>();

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    let queue = this.queues.get(key);
    if (!queue) {
      queue = new SerialQueue();
      this.queues.set(key, queue);
    }

    const owner = queue;
    const result = owner.enqueue(task);
    void owner.drain().then(() => {
      if (owner.pending === 0 && this.queues.get(key) === owner) {
        this.queues.delete(key);
      }
    });
    return result;
  }

  /** Whether any task for `key` is running or queued */
  isLocked(key: string): boolean {
    return (this.queues.get(key)?.pending ?? 0) > 0;
  }
}
