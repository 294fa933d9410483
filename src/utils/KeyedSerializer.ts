/**
 * Runs tasks FIFO per key; different keys run concurrently.
 *
 * Ordering is fixed at `run()` call time, so callers must enqueue in arrival
 * order before awaiting anything.
 */
export class KeyedSerializer {
  private readonly tails = new Map<string, Promise<void>>();

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);

    // Tail never rejects; a failed task must not block its successors.
    const tail = result.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);

    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });

    return result;
  }

  /** Keys with queued or running work */
  get activeKeys(): number {
    return this.tails.size;
  }
}
