// ═══════════════════════════════════════════════════════════════════════════════
// BOUNDED QUEUE — Async FIFO with Backpressure
// ═══════════════════════════════════════════════════════════════════════════════
//
// push() waits while the queue is full; pop() waits while it is empty and open.
// After close(), remaining items drain and pop() then reports completion.
//
// ═══════════════════════════════════════════════════════════════════════════════

export class QueueClosedError extends Error {
  readonly name = 'QueueClosedError';

  constructor() {
    super('Cannot push to a closed queue');
  }
}

export type QueuePop<T> = { done: false; value: T } | { done: true };

export class BoundedQueue<T> {
  private readonly items: Array<{ value: T }> = [];
  private readonly waitingPoppers: Array<(result: QueuePop<T>) => void> = [];
  private readonly waitingPushers: Array<() => void> = [];
  private closed = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async push(item: T): Promise<void> {
    while (!this.closed && this.items.length >= this.capacity) {
      await new Promise<void>(resolve => this.waitingPushers.push(resolve));
    }
    if (this.closed) {
      throw new QueueClosedError();
    }

    const popper = this.waitingPoppers.shift();
    if (popper) {
      popper({ done: false, value: item });
    } else {
      this.items.push({ value: item });
    }
  }

  async pop(): Promise<QueuePop<T>> {
    const head = this.items.shift();
    if (head) {
      this.waitingPushers.shift()?.();
      return { done: false, value: head.value };
    }
    if (this.closed) {
      return { done: true };
    }
    return new Promise(resolve => this.waitingPoppers.push(resolve));
  }

  /**
   * Signal end of input. Waiting consumers complete once drained; waiting
   * producers fail with QueueClosedError.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    for (const popper of this.waitingPoppers.splice(0)) {
      popper({ done: true });
    }
    for (const pusher of this.waitingPushers.splice(0)) {
      pusher();
    }
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    while (true) {
      const next = await this.pop();
      if (next.done) return;
      yield next.value;
    }
  }
}
