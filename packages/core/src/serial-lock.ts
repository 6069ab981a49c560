/**
 * Single-owner mutual exclusion for "append in memory + persist".
 *
 * Callers queue behind each other in arrival order. A rejected task does not
 * poison the queue. Never hold the lock across a collaborator call.
 */
export class SerialLock {
  private tail: Promise<void> = Promise.resolve();

  run<T>(task: () => T | Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}
