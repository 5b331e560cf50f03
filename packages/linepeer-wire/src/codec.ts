// Wire codec: one JSON value per line.
//
// Encoders return the line without its terminating newline; framing is the
// transport's job.

import type {
  CallId,
  InboundMessage,
  OutgoingCall,
  OutgoingNotification,
} from "./types.ts";
import { WireError } from "./wire_error.ts";

// ============================================================================
// Encoding
// ============================================================================

/**
 * Encode an outgoing call as `{"id":…,"method":…,"params":…}`.
 *
 * `params` of `undefined` is written as `null` so the key is always present.
 */
export function encodeCall(call: OutgoingCall): string {
  return stringify(call.method, { id: call.id, method: call.method, params: call.params ?? null });
}

/**
 * Encode an outgoing notification. The `id` key is omitted entirely.
 */
export function encodeNotification(notification: OutgoingNotification): string {
  return stringify(notification.method, {
    method: notification.method,
    params: notification.params ?? null,
  });
}

function stringify(method: string, value: Record<string, unknown>): string {
  try {
    return JSON.stringify(value);
  } catch (e) {
    throw WireError.encode(method, e);
  }
}

// ============================================================================
// Decoding
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function decodeId(line: string, raw: unknown): CallId {
  if (raw === undefined || raw === null) return 0;
  if (typeof raw !== "number" || !Number.isSafeInteger(raw) || raw < 0) {
    throw WireError.malformed(line, `invalid id ${JSON.stringify(raw)}`);
  }
  return raw;
}

function decodeMethod(line: string, raw: unknown): string {
  if (raw === undefined || raw === null) return "";
  if (typeof raw !== "string") {
    throw WireError.malformed(line, "method is not a string");
  }
  return raw;
}

/**
 * Decode one inbound line.
 *
 * A `result` key, even one holding `null`, makes the message a response.
 * Without it the message is a notification and must name a method.
 * An `error` key is not part of the protocol and is ignored.
 *
 * @throws WireError if the line is not a JSON object of that shape
 */
export function decodeInbound(line: string): InboundMessage {
  let value: unknown;
  try {
    value = JSON.parse(line);
  } catch (e) {
    throw WireError.malformed(line, "invalid JSON", e);
  }

  if (!isRecord(value)) {
    throw WireError.malformed(line, "expected a JSON object");
  }

  const id = decodeId(line, value.id);
  const method = decodeMethod(line, value.method);
  const params = value.params ?? null;

  if (Object.prototype.hasOwnProperty.call(value, "result")) {
    return { kind: "response", id, method, params, result: value.result };
  }

  if (method === "") {
    throw WireError.malformed(line, "notification without a method");
  }
  return { kind: "notification", id, method, params };
}
