/**
 * Serializes async critical sections. Each caller waits for the previous
 * holder to settle, whether it resolved or rejected.
 */
export class AsyncLock {
  private tail: Promise<void> = Promise.resolve();

  run<T>(work: () => Promise<T> | T): Promise<T> {
    const result = this.tail.then(() => work());
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
