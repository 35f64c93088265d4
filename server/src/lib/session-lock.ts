/**
 * In-process mutual exclusion around the single pipeline session.
 *
 * Callers queue behind each other in arrival order; a failing section does
 * not poison the queue for the next one.
 */
export class SessionLock {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  get queued(): number {
    return this.pending;
  }

  /** Executes fn() while holding the lock. */
  async withSessionLock<T>(fn: () => T | Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.pending += 1;

    try {
      await previous;
      return await fn();
    } finally {
      this.pending -= 1;
      release();
    }
  }
}
