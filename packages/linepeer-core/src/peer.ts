// Peer: bidirectional RPC over one line transport.
//
// Outgoing calls are correlated with inbound responses by ID while inbound
// notifications are dispatched to registered handlers. A single reader loop
// owns the inbound side for the whole life of the peer.

import {
  type InboundMessage,
  decodeInbound,
  encodeCall,
  encodeNotification,
  outgoingCall,
  outgoingNotification,
} from "@linepeer/wire";
import { Call, Reply, type PendingCall } from "./call.ts";
import { CompletionChannel } from "./completion.ts";
import { ContractViolationError, PeerError } from "./errors.ts";
import {
  HandlerRegistry,
  NotificationDispatcher,
  type HandlerErrorHook,
  type NotificationHandler,
} from "./handlers.ts";
import { callTracer, createLogger, type CallTracer, type LogFn, type TraceOptions } from "./logging.ts";
import { PendingCallTable } from "./pending.ts";
import type { LineTransport } from "./transport.ts";

/** Default capacity of completion channels `call` creates itself. */
export const DEFAULT_COMPLETION_CAPACITY = 10;

export type PeerState = "open" | "closed" | "broken";

export interface PeerOptions {
  /**
   * Capacity of the completion channel `call` creates when none is supplied.
   * Defaults to 10.
   */
  completionCapacity?: number;

  /**
   * Maximum number of notification handlers running at once. Excess
   * notifications are queued without blocking the reader loop.
   * Defaults to Infinity.
   */
  maxConcurrentHandlers?: number;

  /**
   * Called when a notification handler throws or rejects.
   * Defaults to logging the failure.
   */
  onHandlerError?: HandlerErrorHook;

  /**
   * Called once when the remote side sends something undecodable and the
   * peer breaks. Defaults to logging the error.
   */
  onProtocolError?: (error: PeerError) => void;

  /**
   * Lifecycle and drop log. Defaults to a "linepeer:peer" logger.
   */
  log?: LogFn;

  /**
   * Per-call trace options. Traces go to "linepeer:rpc" unless `trace.log` is set.
   */
  trace?: TraceOptions;
}

/**
 * One side of a bidirectional line-delimited JSON RPC session.
 *
 * The reader loop starts in the constructor and runs until the stream ends,
 * the transport fails to read, the remote side violates the protocol, or
 * `close()` is called. Stopping fails every pending call.
 *
 * @example
 * ```typescript
 * const peer = new Peer(transport);
 * peer.handle("update", (params) => render(params));
 * const info = await peer.request("info", { verbose: true });
 * ```
 */
export class Peer {
  private readonly pending = new PendingCallTable();
  private readonly handlers = new HandlerRegistry();
  private readonly notifications: NotificationDispatcher;
  private readonly tracer: CallTracer;
  private readonly log: LogFn;
  private readonly completionCapacity: number;
  private readonly onProtocolError: (error: PeerError) => void;

  // Outbound write exclusion: each write starts after the previous one settled.
  private sendChain: Promise<void> = Promise.resolve();

  private _state: PeerState = "open";
  private terminal: PeerError | null = null;

  /**
   * Resolves with the reason the peer stopped, once the reader loop has exited
   * and every pending call has failed. Does not wait for notification
   * handlers; see `drained()`. Never rejects.
   */
  readonly closed: Promise<PeerError>;

  constructor(
    private readonly transport: LineTransport,
    options: PeerOptions = {},
  ) {
    this.log = options.log ?? createLogger("linepeer:peer");
    this.tracer = callTracer(options.trace);
    this.completionCapacity = options.completionCapacity ?? DEFAULT_COMPLETION_CAPACITY;
    if (!Number.isInteger(this.completionCapacity) || this.completionCapacity < 1) {
      throw new ContractViolationError(
        `completionCapacity must be a positive integer, got ${this.completionCapacity}`,
      );
    }

    const maxConcurrentHandlers = options.maxConcurrentHandlers ?? Infinity;
    if (Number.isNaN(maxConcurrentHandlers) || maxConcurrentHandlers < 1) {
      throw new ContractViolationError(
        `maxConcurrentHandlers must be at least 1, got ${maxConcurrentHandlers}`,
      );
    }

    const onHandlerError =
      options.onHandlerError ??
      ((error: unknown, method: string) => {
        this.log("notification handler failed", { method, error });
      });
    this.notifications = new NotificationDispatcher(maxConcurrentHandlers, onHandlerError);

    this.onProtocolError =
      options.onProtocolError ??
      ((error) => {
        this.log("peer broken", { error: error.message });
      });

    this.closed = this.run();
  }

  get state(): PeerState {
    return this._state;
  }

  /** Number of calls sent and still awaiting a response. */
  get pendingCount(): number {
    return this.pending.size;
  }

  /**
   * Register the handler for inbound notifications named `method`,
   * replacing any earlier one.
   */
  handle(method: string, handler: NotificationHandler): void {
    this.handlers.set(method, handler);
  }

  /** Remove the handler for `method`. Returns false if none was registered. */
  unhandle(method: string): boolean {
    return this.handlers.delete(method);
  }

  /**
   * Send a call and return immediately.
   *
   * The call is completed through `done` when its response arrives, or with
   * `call.error` set when it could not be written or the peer stopped. Send
   * failures are never thrown from here.
   *
   * `done` may be shared between calls; a completion that finds it full is
   * dropped. Without `done`, a channel of `completionCapacity` is created.
   *
   * @throws ContractViolationError if `done` has capacity 0
   */
  call(method: string, params: unknown): Call;
  call<R>(method: string, params: unknown, reply: Reply<R>, done?: CompletionChannel<Call<R>>): Call<R>;
  call<R>(
    method: string,
    params: unknown,
    reply?: Reply<R>,
    done?: CompletionChannel<Call<R>>,
  ): Call<R> | Call {
    if (reply === undefined) {
      return this.send(method, params, Reply.raw(), new CompletionChannel<Call>(this.completionCapacity));
    }
    return this.send(
      method,
      params,
      reply,
      done ?? new CompletionChannel<Call<R>>(this.completionCapacity),
    );
  }

  /**
   * Send a call and wait for its completion.
   *
   * Resolves with the decoded result, which is also left in `reply` when one
   * is given. Rejects with the call's PeerError on local failure. There is no
   * timeout: if the stream stays open and no response arrives, this never settles.
   */
  request(method: string, params: unknown): Promise<unknown>;
  request<R>(method: string, params: unknown, reply: Reply<R>): Promise<R>;
  request<R>(method: string, params: unknown, reply?: Reply<R>): Promise<R | unknown> {
    if (reply === undefined) {
      return this.settle(this.send(method, params, Reply.raw(), new CompletionChannel<Call>(1)));
    }
    return this.settle(this.send(method, params, reply, new CompletionChannel<Call<R>>(1)));
  }

  /**
   * Send a notification: a message without an ID that expects no response.
   *
   * @throws PeerError if the peer has stopped or the write fails
   */
  async notify(method: string, params: unknown): Promise<void> {
    if (this.terminal) {
      throw this.terminal;
    }
    const line = encodeNotification(outgoingNotification(method, params));
    try {
      await this.enqueue(line);
    } catch (e) {
      throw PeerError.io(e);
    }
  }

  /**
   * Stop the peer: fail every pending call with a "closed" error and close
   * the transport. Later calls fail the same way.
   *
   * Safe to await from a notification handler: handlers still running are
   * not waited for.
   */
  close(): Promise<PeerError> {
    this.shutdown(PeerError.closed());
    return this.closed;
  }

  /**
   * Resolves once no notification handler is running or queued. Awaiting it
   * from inside a handler never resolves.
   */
  drained(): Promise<void> {
    return this.notifications.idle();
  }

  // ==========================================================================
  // Call dispatch
  // ==========================================================================

  private send<R>(
    method: string,
    params: unknown,
    reply: Reply<R>,
    done: CompletionChannel<Call<R>>,
  ): Call<R> {
    if (done.capacity === 0) {
      throw new ContractViolationError("completion channel is unbuffered");
    }

    if (this.terminal) {
      const refused = new Call(0, method, params, reply, done);
      refused.fail(this.terminal);
      this.finish(refused);
      return refused;
    }

    // ID allocation, registration and enqueueing happen in one synchronous
    // step, so ID order equals wire order.
    const call = new Call(this.pending.nextId(), method, params, reply, done);
    let line: string;
    try {
      line = encodeCall(outgoingCall(call.id, method, params));
    } catch (e) {
      call.fail(PeerError.io(e));
      this.finish(call);
      return call;
    }

    this.pending.add(call);
    this.tracer.sent(call.id, method, params);
    void this.enqueue(line).catch((e: unknown) => {
      // Already completed if the peer stopped while the write was queued.
      if (this.pending.take(call.id) === undefined) return;
      call.fail(PeerError.io(e));
      this.finish(call);
    });
    return call;
  }

  private enqueue(line: string): Promise<void> {
    const write = this.sendChain.then(() => this.transport.send(line));
    // Keep the chain going after a failed write; the failure belongs to `write`.
    this.sendChain = write.catch(() => undefined);
    return write;
  }

  private async settle<R>(call: Call<R>): Promise<R> {
    const completed = await call.done.recv();
    if (completed === null) {
      throw PeerError.closed();
    }
    if (completed.error) {
      throw completed.error;
    }
    return completed.reply.unwrap();
  }

  /** Complete a call, logging when its channel cannot take the completion. */
  private finish(call: PendingCall): void {
    const error = call.error;
    this.tracer.completed(
      call.id,
      call.method,
      error ? { ok: false, error } : { ok: true, value: call.result },
    );
    if (!call.complete()) {
      this.log("discarding call reply due to insufficient completion channel capacity", {
        id: call.id,
        method: call.method,
      });
    }
  }

  // ==========================================================================
  // Reader loop
  // ==========================================================================

  private async run(): Promise<PeerError> {
    const reason = await this.readUntilStopped();
    this.shutdown(reason);
    return this.terminal ?? reason;
  }

  private async readUntilStopped(): Promise<PeerError> {
    while (this._state === "open") {
      let line: string | null;
      try {
        line = await this.transport.recv();
      } catch (e) {
        return PeerError.closed(e);
      }
      if (line === null) {
        return PeerError.closed();
      }
      if (this._state !== "open") {
        break;
      }

      try {
        this.dispatchLine(line);
      } catch (e) {
        return e instanceof PeerError ? e : PeerError.protocol(e);
      }
    }
    return this.terminal ?? PeerError.closed();
  }

  private dispatchLine(line: string): void {
    let msg: InboundMessage;
    try {
      msg = decodeInbound(line);
    } catch (e) {
      throw PeerError.protocol(e);
    }

    if (msg.kind === "response") {
      const call = this.pending.take(msg.id);
      if (!call) {
        this.log("dropping response that has no pending call", { id: msg.id });
        return;
      }
      try {
        call.resolve(msg.result);
      } catch (e) {
        // The call has left the table, so shutdown would not reach it.
        const error = PeerError.protocol(e);
        call.fail(error);
        this.finish(call);
        throw error;
      }
      this.finish(call);
      return;
    }

    const handler = this.handlers.get(msg.method);
    if (!handler) {
      this.log("dropping notification without a registered handler", { method: msg.method });
      return;
    }
    this.notifications.dispatch(msg.method, handler, msg.params);
  }

  /** Enter a terminal state once, failing everything still pending. */
  private shutdown(reason: PeerError): void {
    if (this.terminal) return;
    this.terminal = reason;
    this._state = reason.kind === "protocol" ? "broken" : "closed";
    if (reason.kind !== "protocol") {
      this.log("peer closed", { reason: reason.message });
    }

    for (const call of this.pending.drain()) {
      call.fail(reason);
      this.finish(call);
    }
    this.transport.close();

    if (reason.kind === "protocol") {
      this.onProtocolError(reason);
    }
  }
}
