// Wire message types for line-delimited JSON peers.
//
// Every message is a single JSON object on its own line. Outgoing calls carry
// an `id`; outgoing notifications omit it. Inbound messages are split into
// responses (a `result` key is present) and notifications (no `result`).

/**
 * Call ID as carried on the wire.
 *
 * IDs are non-negative integers. 0 is reserved and never assigned to a call:
 * a message written without an `id` is a notification.
 */
export type CallId = number;

/** An outgoing request that expects exactly one response with the same `id`. */
export interface OutgoingCall {
  id: CallId;
  method: string;
  params: unknown;
}

/** An outgoing one-way message. Written without an `id`. */
export interface OutgoingNotification {
  method: string;
  params: unknown;
}

/** Inbound message carrying a `result` (even `null`): completes a pending call. */
export interface InboundResponse {
  kind: "response";
  id: CallId;
  method: string;
  params: unknown;
  result: unknown;
}

/** Inbound message without a `result`: dispatched to a handler by `method`. */
export interface InboundNotification {
  kind: "notification";
  id: CallId;
  method: string;
  params: unknown;
}

export type InboundMessage = InboundResponse | InboundNotification;

export function outgoingCall(id: CallId, method: string, params: unknown): OutgoingCall {
  return { id, method, params };
}

export function outgoingNotification(method: string, params: unknown): OutgoingNotification {
  return { method, params };
}

export function isResponse(msg: InboundMessage): msg is InboundResponse {
  return msg.kind === "response";
}
