// ═══════════════════════════════════════════════════════════════════════════════
// MUTEX — Serialized Critical Sections over Async Work
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * FIFO mutual exclusion. Each caller waits for the previous section to
 * settle, whether it resolved or threw.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  get isLocked(): boolean {
    return this.pending > 0;
  }

  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    const current = new Promise<void>(resolve => {
      release = resolve;
    });
    this.tail = previous.then(() => current);
    this.pending++;

    await previous;
    try {
      return await fn();
    } finally {
      this.pending--;
      release();
    }
  }
}
