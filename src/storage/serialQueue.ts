/**
 * Runs async tasks one after another. Used as the single writer in front
 * of a read-modify-write JSON document.
 */
export class SerialQueue {
  private tail: Promise<unknown> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    // The next task waits for this one whether it resolved or failed
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
