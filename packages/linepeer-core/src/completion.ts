// Bounded completion channel.

import { ContractViolationError } from "./errors.ts";

/**
 * A bounded multi-producer single-consumer async channel.
 *
 * `trySend` never waits: when the buffer is full the value is refused and the
 * producer decides what to do with it. A Peer delivers completed Calls this
 * way, so a caller that stops draining its channel loses completions instead
 * of stalling the reader.
 *
 * A capacity of 0 is accepted here so the mistake can be reported where the
 * channel is handed to `Peer.call`.
 */
export class CompletionChannel<T> {
  private buffer: T[] = [];
  private closed = false;
  private waiters: Array<(value: T | null) => void> = [];

  constructor(readonly capacity: number = 1) {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new ContractViolationError(`invalid completion channel capacity: ${capacity}`);
    }
  }

  /** Number of values buffered and not yet received. */
  get size(): number {
    return this.buffer.length;
  }

  /**
   * Deliver a value without waiting.
   *
   * Returns false if the channel is closed or its buffer is full.
   */
  trySend(value: T): boolean {
    if (this.closed) {
      return false;
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(value);
      return true;
    }

    if (this.buffer.length < this.capacity) {
      this.buffer.push(value);
      return true;
    }

    return false;
  }

  /**
   * Receive the next value. Resolves to null once the channel is closed and drained.
   */
  recv(): Promise<T | null> {
    const next = this.buffer.shift();
    if (next !== undefined) {
      return Promise.resolve(next);
    }
    if (this.closed) {
      return Promise.resolve(null);
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters) {
      waiter(null);
    }
    this.waiters.length = 0;
  }

  isClosed(): boolean {
    return this.closed;
  }
}
