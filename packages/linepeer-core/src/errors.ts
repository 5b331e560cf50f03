// Error types surfaced by a Peer.

/**
 * Failure delivered to a caller through a Call's completion, or reported
 * as the reason a Peer stopped.
 *
 * - `io`: writing the call to the transport failed. Only that call is affected.
 * - `closed`: the stream ended, the transport failed to read, or the peer was closed.
 * - `protocol`: the remote side sent something that cannot be decoded. The peer
 *   is broken and every pending and later call fails with this error.
 */
export class PeerError extends Error {
  constructor(
    public kind: "io" | "closed" | "protocol",
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "PeerError";
  }

  static io(cause: unknown): PeerError {
    return new PeerError("io", `send failed: ${describe(cause)}`, { cause });
  }

  static closed(cause?: unknown): PeerError {
    if (cause === undefined) {
      return new PeerError("closed", "connection closed");
    }
    return new PeerError("closed", `connection closed: ${describe(cause)}`, { cause });
  }

  static protocol(cause: unknown): PeerError {
    return new PeerError("protocol", `protocol violation: ${describe(cause)}`, { cause });
  }
}

/**
 * A programming error at a call site, such as handing `call` a completion
 * channel that can hold nothing. Thrown immediately, never delivered.
 */
export class ContractViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ContractViolationError";
  }
}

function describe(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
