/**
 * Runs tasks one after another in submission order.
 *
 * A task that rejects does not block the ones queued behind it; its
 * rejection is still delivered to whoever submitted it.
 */
export class SerialLock {
  private tail: Promise<void> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(() => task());
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}
