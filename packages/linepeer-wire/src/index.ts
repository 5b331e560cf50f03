// Line-delimited JSON wire protocol types and codec.

export type {
  CallId,
  OutgoingCall,
  OutgoingNotification,
  InboundResponse,
  InboundNotification,
  InboundMessage,
} from "./types.ts";

export { outgoingCall, outgoingNotification, isResponse } from "./types.ts";

export { WireError } from "./wire_error.ts";

export { encodeCall, encodeNotification, decodeInbound } from "./codec.ts";
