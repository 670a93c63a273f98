/**
 * Serializes async critical sections. Waiters run in arrival order and a
 * failing section never blocks the ones queued behind it.
 */
export class AsyncLock {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  get waiting(): number {
    return this.pending;
  }

  async run<T>(section: () => Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => {};
    this.tail = new Promise<void>(resolve => {
      release = resolve;
    });
    this.pending += 1;

    try {
      await previous;
      return await section();
    } finally {
      this.pending -= 1;
      release();
    }
  }
}
