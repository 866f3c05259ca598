/**
 * In-process async mutex. Callers run strictly one at a time, in the order
 * they asked for the lock. Not re-entrant: an action must not call
 * runExclusive on the same mutex.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private held = false;

  get locked(): boolean {
    return this.held;
  }

  async runExclusive<T>(action: () => Promise<T> | T): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => {};
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });

    await previous;
    this.held = true;
    try {
      return await action();
    } finally {
      this.held = false;
      release();
    }
  }
}
