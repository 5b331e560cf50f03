// @linepeer/stdio - line-delimited JSON peers over Node streams (Node.js only)
//
// Provides newline framing and the bindings that put a Peer on a pair of
// streams or on the process's standard input and output.

import type { Readable, Writable } from "node:stream";
import { Peer, type PeerError, type PeerOptions } from "@linepeer/core";
import { LineFramed, type LineFramedOptions } from "./framing.ts";

export { LineFramed, FramingError, DEFAULT_MAX_LINE_LENGTH, type LineFramedOptions } from "./framing.ts";

/** Options for connecting a Peer to a pair of streams. */
export interface ConnectOptions extends PeerOptions {
  framing?: LineFramedOptions;
}

export interface StdioOptions extends ConnectOptions {
  /**
   * Terminate the process when the remote side violates the protocol.
   * Ignored when `onProtocolError` is given. Defaults to true.
   */
  exitOnProtocolError?: boolean;
}

/**
 * Put a Peer on a readable and a writable stream, e.g. a child process's
 * stdout and stdin.
 */
export function connectStreams(
  input: Readable,
  output: Writable,
  options: ConnectOptions = {},
): Peer {
  const { framing, ...peerOptions } = options;
  return new Peer(new LineFramed(input, output, framing), peerOptions);
}

/**
 * Build a protocol-error hook that reports the error on stderr and exits
 * with status 1.
 */
export function exitOnProtocolError(
  exit: (code: number) => void = (code) => process.exit(code),
  stderr: Writable = process.stderr,
): (error: PeerError) => void {
  return (error) => {
    stderr.write(`linepeer: ${error.message}\n`);
    exit(1);
  };
}

/**
 * Put a Peer on this process's standard input and output.
 *
 * The remote side is trusted to speak the protocol: by default a malformed
 * message ends the process.
 *
 * @example
 * ```typescript
 * const peer = connectStdio();
 * peer.handle("config_changed", (params) => applyConfig(params));
 * await peer.request("new_view", { file_path: "notes.txt" });
 * ```
 */
export function connectStdio(options: StdioOptions = {}): Peer {
  const { exitOnProtocolError: exitOnViolation = true, ...connectOptions } = options;
  const onProtocolError =
    connectOptions.onProtocolError ?? (exitOnViolation ? exitOnProtocolError() : undefined);
  return connectStreams(process.stdin, process.stdout, { ...connectOptions, onProtocolError });
}
