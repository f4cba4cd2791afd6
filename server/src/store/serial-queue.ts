/**
 * Keyed FIFO lanes.
 *
 * Tasks submitted under the same key run one at a time in submission order;
 * tasks under different keys never wait on each other. A lane exists only
 * while it has queued work.
 */

export class KeyedSerialQueue {
  private tails = new Map<string, Promise<void>>();

  run<T>(key: string, task: () => T | Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);

    // The lane only tracks completion; the caller observes the task's outcome.
    const tail: Promise<void> = result.then(
      () => this.release(key, tail),
      () => this.release(key, tail),
    );
    this.tails.set(key, tail);
    return result;
  }

  /** Number of keys with queued or running work */
  get activeLanes(): number {
    return this.tails.size;
  }

  /** Resolves once every lane that exists right now has drained */
  async idle(): Promise<void> {
    await Promise.all([...this.tails.values()]);
  }

  private release(key: string, tail: Promise<void>): void {
    if (this.tails.get(key) === tail) {
      this.tails.delete(key);
    }
  }
}
