// Errors raised while encoding or decoding wire lines.

/** Error raised by the wire codec. */
export class WireError extends Error {
  constructor(
    public kind: "malformed" | "encode",
    message: string,
    public line?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "WireError";
  }

  /** The inbound line is not a well-formed message. */
  static malformed(line: string, reason: string, cause?: unknown): WireError {
    return new WireError("malformed", `malformed message: ${reason}`, line, { cause });
  }

  /** The outgoing value cannot be serialized to JSON. */
  static encode(method: string, cause: unknown): WireError {
    const detail = cause instanceof Error ? cause.message : String(cause);
    return new WireError("encode", `cannot encode ${method}: ${detail}`, undefined, { cause });
  }
}
