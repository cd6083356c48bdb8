/**
 * Runs async tasks one at a time, in submission order.
 */
export class SerialLock {
  private tail: Promise<void> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    // The caller observes the rejection through `result`; the chain only waits.
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
