/**
 * Single-consumer message queue for the preview dispatcher.
 *
 * Operator input goes through `offer`, which is bounded and drops when full.
 * Completion messages from background work go through `deliver`, which is
 * not bounded: each in-flight fetch delivers exactly once, so the backlog is
 * limited by the number of outstanding requests and a result is never lost.
 */
export class Mailbox<T> {
  private queue: T[] = [];
  private waiters: Array<(message: T | undefined) => void> = [];
  private closed = false;

  constructor(private capacity: number = 256) {}

  get size(): number {
    return this.queue.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Returns false when the mailbox is full or closed. */
  offer(message: T): boolean {
    if (this.closed) return false;
    if (this.handOff(message)) return true;
    if (this.queue.length >= this.capacity) return false;
    this.queue.push(message);
    return true;
  }

  deliver(message: T): void {
    if (this.closed) return;
    if (this.handOff(message)) return;
    this.queue.push(message);
  }

  /** Resolves with the next message, or undefined once closed and drained. */
  take(): Promise<T | undefined> {
    const next = this.queue.shift();
    if (next !== undefined) return Promise.resolve(next);
    if (this.closed) return Promise.resolve(undefined);
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.queue = [];
    for (const waiter of this.waiters.splice(0)) {
      waiter(undefined);
    }
  }

  private handOff(message: T): boolean {
    const waiter = this.waiters.shift();
    if (!waiter) return false;
    waiter(message);
    return true;
  }
}
