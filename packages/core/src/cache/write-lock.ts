/**
 * In-process single-writer lock
 *
 * Serialises async critical sections in call order. A failed section
 * releases the lock for the next waiter and rethrows to its own caller.
 */
export class WriteLock {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    this.pending++;
    const run = this.tail.then(fn);
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    try {
      return await run;
    } finally {
      this.pending--;
    }
  }

  /** True while a section is running or queued */
  isLocked(): boolean {
    return this.pending > 0;
  }
}
