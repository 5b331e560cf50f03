// Newline framing for Node byte streams.
//
// Each message is one line terminated by "\n". A "\r" before the terminator
// is dropped, and a final line without a terminator is still delivered when
// the input ends.

import type { Readable, Writable } from "node:stream";
import { createLogger, type LineTransport, type LogFn } from "@linepeer/core";

/** Default longest accepted line, terminator excluded. */
export const DEFAULT_MAX_LINE_LENGTH = 64 * 1024;

const NEWLINE = 0x0a;
const CARRIAGE_RETURN = 0x0d;

export interface LineFramedOptions {
  /**
   * Longest accepted line in bytes, terminator excluded. A longer line is a
   * read error. Defaults to 64 KiB.
   */
  maxLineLength?: number;

  /**
   * End the output and destroy the input on close(). Defaults to false, so
   * process.stdin and process.stdout are left alone.
   */
  endOnClose?: boolean;

  /**
   * Framing log. Defaults to a "linepeer:stdio" logger.
   */
  log?: LogFn;
}

/** Error raised while splitting the input into lines. */
export class FramingError extends Error {
  constructor(
    public kind: "line-too-long" | "write-after-close",
    message: string,
  ) {
    super(message);
    this.name = "FramingError";
  }

  static lineTooLong(length: number, max: number): FramingError {
    return new FramingError("line-too-long", `line of ${length} bytes exceeds limit of ${max}`);
  }

  static writeAfterClose(): FramingError {
    return new FramingError("write-after-close", "write after close");
  }
}

/**
 * A newline-framed connection over a readable and a writable stream.
 *
 * Implements the LineTransport interface for use with Peer.
 */
export class LineFramed implements LineTransport {
  private buf: Buffer = Buffer.alloc(0);
  private pendingLines: string[] = [];
  private waitingResolve: ((line: string | null) => void) | null = null;
  private closed = false;
  private error: Error | null = null;
  private readonly maxLineLength: number;
  private readonly endOnClose: boolean;
  private readonly log: LogFn;

  private readonly onData = (chunk: Buffer | string) => {
    if (this.closed) return;
    const bytes = typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk;
    this.buf = this.buf.length === 0 ? bytes : Buffer.concat([this.buf, bytes]);
    this.processBuffer();
  };

  private readonly onEnd = () => {
    if (this.closed) return;
    if (this.buf.length > 0) {
      this.pushLine(this.buf);
      this.buf = Buffer.alloc(0);
    }
    this.log("input ended");
    this.finish(null);
  };

  private readonly onClose = () => {
    if (this.closed) return;
    this.log("input closed");
    this.finish(null);
  };

  // Stays attached after close so a late stream error is logged, not thrown.
  private readonly onError = (err: Error) => {
    this.log("input error", { error: err.message });
    if (this.closed) return;
    this.finish(err);
  };

  // The failed write's callback already rejects its send; this keeps the
  // stream's own 'error' event from going unhandled.
  private readonly onOutputError = (err: Error) => {
    this.log("output error", { error: err.message });
  };

  constructor(
    private readonly input: Readable,
    private readonly output: Writable,
    options: LineFramedOptions = {},
  ) {
    this.maxLineLength = options.maxLineLength ?? DEFAULT_MAX_LINE_LENGTH;
    this.endOnClose = options.endOnClose ?? false;
    this.log = options.log ?? createLogger("linepeer:stdio");

    input.on("data", this.onData);
    input.on("end", this.onEnd);
    input.on("close", this.onClose);
    input.on("error", this.onError);
    output.on("error", this.onOutputError);
  }

  private processBuffer(): void {
    while (!this.closed) {
      const newline = this.buf.indexOf(NEWLINE);
      if (newline < 0) break;

      const line = this.buf.subarray(0, newline);
      this.buf = this.buf.subarray(newline + 1);
      this.pushLine(line);
    }

    // A trailing "\r" may belong to a CRLF terminator still to come.
    const pendingCr = this.buf.length > 0 && this.buf[this.buf.length - 1] === CARRIAGE_RETURN ? 1 : 0;
    if (!this.closed && this.buf.length - pendingCr > this.maxLineLength) {
      this.fail(FramingError.lineTooLong(this.buf.length - pendingCr, this.maxLineLength));
    }
  }

  private pushLine(raw: Buffer): void {
    const bytes = raw.length > 0 && raw[raw.length - 1] === CARRIAGE_RETURN ? raw.subarray(0, -1) : raw;
    if (bytes.length > this.maxLineLength) {
      this.fail(FramingError.lineTooLong(bytes.length, this.maxLineLength));
      return;
    }

    const line = bytes.toString("utf8");
    if (this.waitingResolve) {
      const resolve = this.waitingResolve;
      this.waitingResolve = null;
      resolve(line);
    } else {
      this.pendingLines.push(line);
    }
  }

  private fail(err: Error): void {
    this.log("framing error", { error: err.message });
    this.buf = Buffer.alloc(0);
    this.finish(err);
  }

  /** Stop reading; wake a waiting receiver so it observes the error or the end. */
  private finish(err: Error | null): void {
    this.error = err;
    this.closed = true;
    this.detach();
    if (this.waitingResolve) {
      const resolve = this.waitingResolve;
      this.waitingResolve = null;
      resolve(null);
    }
  }

  private detach(): void {
    this.input.off("data", this.onData);
    this.input.off("end", this.onEnd);
    this.input.off("close", this.onClose);
  }

  /**
   * Write one line followed by "\n", resolving once the stream accepted it.
   */
  send(line: string): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (this.output.writableEnded || this.output.destroyed) {
        reject(FramingError.writeAfterClose());
        return;
      }
      this.output.write(`${line}\n`, (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  /**
   * Receive the next line.
   *
   * Lines already read are returned first. Then a read error is reported
   * once, after which the stream reads as ended.
   */
  recv(): Promise<string | null> {
    const next = this.pendingLines.shift();
    if (next !== undefined) {
      return Promise.resolve(next);
    }

    if (this.error) {
      const err = this.error;
      this.error = null;
      return Promise.reject(err);
    }
    if (this.closed) {
      return Promise.resolve(null);
    }

    return new Promise((resolve, reject) => {
      this.waitingResolve = (line) => {
        if (line === null && this.error) {
          const err = this.error;
          this.error = null;
          reject(err);
        } else {
          resolve(line);
        }
      };
    });
  }

  /** Stop reading. With `endOnClose`, also end the output and destroy the input. */
  close(): void {
    if (!this.closed) {
      this.closed = true;
      this.detach();
      this.input.pause();
      if (this.waitingResolve) {
        const resolve = this.waitingResolve;
        this.waitingResolve = null;
        resolve(null);
      }
    }
    if (this.endOnClose) {
      if (!this.output.writableEnded) this.output.end();
      if (!this.input.destroyed) this.input.destroy();
    }
  }
}
