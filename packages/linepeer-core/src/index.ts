// @linepeer/core - bidirectional RPC over a single line-delimited JSON stream.
// Provides the peer, its call correlation and notification dispatch.

// Wire codec (re-exported for convenience)
export {
  type CallId,
  type InboundMessage,
  type InboundResponse,
  type InboundNotification,
  WireError,
  encodeCall,
  encodeNotification,
  decodeInbound,
} from "@linepeer/wire";

// Peer
export { Peer, DEFAULT_COMPLETION_CAPACITY, type PeerOptions, type PeerState } from "./peer.ts";

// Calls and completion
export { Call, Reply, type ReplyDecoder, type PendingCall } from "./call.ts";
export { CompletionChannel } from "./completion.ts";
export { PendingCallTable } from "./pending.ts";

// Notification handlers
export {
  HandlerRegistry,
  NotificationDispatcher,
  type NotificationHandler,
  type HandlerErrorHook,
} from "./handlers.ts";

// Errors
export { PeerError, ContractViolationError } from "./errors.ts";

// Transports
export type { LineTransport } from "./transport.ts";
export { MemoryLineTransport, memoryTransportPair } from "./memory.ts";

// Logging
export {
  createLogger,
  callTracer,
  type LogFn,
  type CallTracer,
  type CallOutcome,
  type TraceOptions,
} from "./logging.ts";
