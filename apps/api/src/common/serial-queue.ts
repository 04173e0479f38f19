// apps/api/src/common/serial-queue.ts

/**
 * Runs async tasks one at a time, in submission order.
 */
export class SerialQueue {
  private tail: Promise<unknown> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    // The caller gets the rejection through `result`; the chain itself must keep going.
    this.tail = result.catch(() => undefined);
    return result;
  }
}
