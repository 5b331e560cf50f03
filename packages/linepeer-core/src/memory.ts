// In-process line transport pair.

import type { LineTransport } from "./transport.ts";

/**
 * One end of an in-memory duplex line pipe.
 *
 * Lines sent on one end are received on the other, in order. Closing either
 * end ends the stream for both: the other end drains what it already has and
 * then reads null.
 */
export class MemoryLineTransport implements LineTransport {
  private inbox: string[] = [];
  private waitingResolve: ((line: string | null) => void) | null = null;
  private closed = false;
  private remoteClosed = false;
  private other: MemoryLineTransport | null = null;

  /** Connect two ends. Use memoryTransportPair() instead. */
  static link(a: MemoryLineTransport, b: MemoryLineTransport): void {
    a.other = b;
    b.other = a;
  }

  /** Lines delivered to this end and not yet received. */
  get buffered(): number {
    return this.inbox.length;
  }

  async send(line: string): Promise<void> {
    const other = this.other;
    if (this.closed || this.remoteClosed || !other) {
      throw new Error("memory transport closed");
    }
    other.deliver(line);
  }

  recv(): Promise<string | null> {
    const next = this.inbox.shift();
    if (next !== undefined) {
      return Promise.resolve(next);
    }
    if (this.closed || this.remoteClosed) {
      return Promise.resolve(null);
    }
    return new Promise((resolve) => {
      this.waitingResolve = resolve;
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.inbox.length = 0;
    this.wake(null);
    this.other?.hangUp();
  }

  private deliver(line: string): void {
    if (this.closed) return;
    if (this.waitingResolve) {
      this.wake(line);
    } else {
      this.inbox.push(line);
    }
  }

  private hangUp(): void {
    this.remoteClosed = true;
    if (this.inbox.length === 0) {
      this.wake(null);
    }
  }

  private wake(line: string | null): void {
    const resolve = this.waitingResolve;
    this.waitingResolve = null;
    resolve?.(line);
  }
}

/** Create two connected in-memory transports. */
export function memoryTransportPair(): [MemoryLineTransport, MemoryLineTransport] {
  const a = new MemoryLineTransport();
  const b = new MemoryLineTransport();
  MemoryLineTransport.link(a, b);
  return [a, b];
}
