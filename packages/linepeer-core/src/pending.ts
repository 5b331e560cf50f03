// Pending call table and sequence counter.

import type { CallId } from "@linepeer/wire";
import type { PendingCall } from "./call.ts";

/**
 * Correlates call IDs with the calls awaiting their response.
 *
 * Every ID present maps to exactly one call awaiting exactly one completion.
 * The sequence counter starts at 0 and is pre-incremented, so the first ID
 * handed out is 1 and 0 is never assigned.
 */
export class PendingCallTable {
  private seq = 0;
  private pending = new Map<CallId, PendingCall>();

  /** Allocate the next ID. */
  nextId(): CallId {
    this.seq += 1;
    return this.seq;
  }

  add(call: PendingCall): void {
    this.pending.set(call.id, call);
  }

  /** Look up and remove the call for `id` in one step. */
  take(id: CallId): PendingCall | undefined {
    const call = this.pending.get(id);
    if (call) {
      this.pending.delete(id);
    }
    return call;
  }

  has(id: CallId): boolean {
    return this.pending.has(id);
  }

  get size(): number {
    return this.pending.size;
  }

  /** Remove and return every pending call, in ID order. */
  drain(): PendingCall[] {
    const calls = [...this.pending.values()];
    this.pending.clear();
    return calls;
  }
}
