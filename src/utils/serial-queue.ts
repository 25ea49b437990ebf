/**
 * Serial Queue
 * Runs async tasks one at a time, in submission order.
 */

export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();

  run<T>(task: () => Promise<T> | T): Promise<T> {
    const result = this.tail.then(task);
    // Keep the chain alive when a task rejects; the caller still sees the rejection
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
