/**
 * Line transport abstraction.
 *
 * A Peer only needs to write whole lines and read whole lines; how the
 * lines are framed on a byte stream is the transport's business.
 *
 * Implementations:
 * - LineFramed (linepeer-stdio) for Node readable/writable streams
 * - MemoryLineTransport for in-process pairs
 */
export interface LineTransport {
  /**
   * Write one line. The transport appends the terminator.
   */
  send(line: string): Promise<void>;

  /**
   * Receive the next line, without its terminator.
   *
   * Resolves to null at end of stream or after close(). Rejects on a read error.
   */
  recv(): Promise<string | null>;

  /**
   * Stop reading and release the transport.
   */
  close(): void;
}
