// Outgoing calls and their reply targets.

import type { CallId } from "@linepeer/wire";
import { ContractViolationError, type PeerError } from "./errors.ts";
import type { CompletionChannel } from "./completion.ts";

/** Turns the raw JSON `result` of a response into the caller's reply type. Throws on mismatch. */
export type ReplyDecoder<T> = (result: unknown) => T;

/**
 * Caller-owned location a response's `result` is decoded into.
 *
 * @example
 * ```typescript
 * const reply = new Reply((v) => {
 *   if (typeof v !== "number") throw new TypeError("expected a number");
 *   return v;
 * });
 * const total = await peer.request("sum", [1, 2], reply);
 * ```
 */
export class Reply<T> {
  private slot: { filled: false } | { filled: true; value: T } = { filled: false };

  constructor(private readonly decoder: ReplyDecoder<T>) {}

  /** A reply that keeps the `result` as parsed JSON. */
  static raw(): Reply<unknown> {
    return new Reply((result) => result);
  }

  /** The decoded value, or undefined before the response arrived. */
  get value(): T | undefined {
    return this.slot.filled ? this.slot.value : undefined;
  }

  get filled(): boolean {
    return this.slot.filled;
  }

  /**
   * Decode `result` into this reply.
   *
   * @throws whatever the decoder throws; the reply stays unfilled
   */
  fill(result: unknown): void {
    this.slot = { filled: true, value: this.decoder(result) };
  }

  /**
   * The decoded value.
   *
   * @throws ContractViolationError if the reply was never filled
   */
  unwrap(): T {
    if (!this.slot.filled) {
      throw new ContractViolationError("reply has not been filled");
    }
    return this.slot.value;
  }
}

/**
 * The view of a Call the pending table and the reader loop work with,
 * independent of its reply type.
 */
export interface PendingCall {
  readonly id: CallId;
  readonly method: string;
  readonly error: PeerError | undefined;
  readonly result: unknown;
  resolve(result: unknown): void;
  fail(error: PeerError): void;
  complete(): boolean;
}

/**
 * One outgoing request, tracked until its response arrives or it fails locally.
 *
 * A Call is completed exactly once by pushing itself onto its `done` channel.
 * Once completed it is never touched by the Peer again.
 */
export class Call<R = unknown> implements PendingCall {
  private _error: PeerError | undefined;
  private completed = false;

  constructor(
    /** Assigned at send time; 0 for a call refused before it reached the wire. */
    readonly id: CallId,
    readonly method: string,
    readonly params: unknown,
    readonly reply: Reply<R>,
    readonly done: CompletionChannel<Call<R>>,
  ) {}

  /** Local failure, if any. The wire carries no remote errors. */
  get error(): PeerError | undefined {
    return this._error;
  }

  /** The decoded reply value, or undefined until the response arrived. */
  get result(): unknown {
    return this.reply.value;
  }

  get isComplete(): boolean {
    return this.completed;
  }

  /**
   * Decode the response's `result` into the reply target.
   *
   * @throws whatever the reply's decoder throws
   */
  resolve(result: unknown): void {
    this.reply.fill(result);
  }

  /**
   * Record a local failure. Only valid before completion.
   */
  fail(error: PeerError): void {
    if (this.completed) {
      throw new ContractViolationError(`call #${this.id} is already complete`);
    }
    this._error = error;
  }

  /**
   * Mark the call complete and offer it to its completion channel without
   * waiting. Returns false if the channel could not take it, in which case the
   * completion is lost.
   */
  complete(): boolean {
    if (this.completed) {
      throw new ContractViolationError(`call #${this.id} is already complete`);
    }
    this.completed = true;
    return this.done.trySend(this);
  }
}
