// src/utils/lock.ts

/** FIFO async mutex: each `run` starts after every earlier one has settled. */
export class WriteLock {
  private tail: Promise<void> = Promise.resolve();

  run<T>(work: () => Promise<T>): Promise<T> {
    const result = this.tail.then(work);
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
