/**
 * Per-key serial execution.
 *
 * Work enqueued under the same key runs one item at a time, in enqueue order;
 * different keys do not wait on each other. Used to keep agent turns of one
 * Slack thread in dispatch order.
 */
export class KeyedSerialQueue {
  private tails = new Map<string, Promise<void>>();

  get activeKeys(): number {
    return this.tails.size;
  }

  enqueue<T>(key: string, work: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(work);
    // the next item waits for this one whether it succeeded or not
    const tail = result.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });
    return result;
  }
}
