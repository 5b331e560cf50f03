// Notification handler registry and dispatch.

/** Handles one inbound notification. Its params are passed through as decoded JSON. */
export type NotificationHandler = (params: unknown) => void | Promise<void>;

/** Receives failures thrown or rejected by notification handlers. */
export type HandlerErrorHook = (error: unknown, method: string) => void;

/**
 * Method name to handler map. The last registration for a name wins.
 */
export class HandlerRegistry {
  private handlers = new Map<string, NotificationHandler>();

  set(method: string, handler: NotificationHandler): void {
    this.handlers.set(method, handler);
  }

  get(method: string): NotificationHandler | undefined {
    return this.handlers.get(method);
  }

  delete(method: string): boolean {
    return this.handlers.delete(method);
  }

  get size(): number {
    return this.handlers.size;
  }
}

interface Job {
  method: string;
  handler: NotificationHandler;
  params: unknown;
}

/**
 * Runs notification handlers off the reader loop.
 *
 * `dispatch` never waits for a handler. At most `maxConcurrent` handlers run
 * at once; further notifications wait in FIFO order.
 */
export class NotificationDispatcher {
  private queue: Job[] = [];
  private inFlight = new Set<Promise<void>>();

  constructor(
    private readonly maxConcurrent: number,
    private readonly onError: HandlerErrorHook,
  ) {}

  /** Number of handlers currently running. */
  get running(): number {
    return this.inFlight.size;
  }

  /** Number of notifications waiting for a free slot. */
  get queued(): number {
    return this.queue.length;
  }

  dispatch(method: string, handler: NotificationHandler, params: unknown): void {
    const job = { method, handler, params };
    if (this.inFlight.size < this.maxConcurrent) {
      this.start(job);
    } else {
      this.queue.push(job);
    }
  }

  /**
   * Resolves once no handler is running and none is queued.
   */
  async idle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled(this.inFlight);
    }
  }

  private start(job: Job): void {
    const task = this.run(job);
    this.inFlight.add(task);
    void task.finally(() => {
      this.inFlight.delete(task);
      const next = this.queue.shift();
      if (next) this.start(next);
    });
  }

  private async run({ method, handler, params }: Job): Promise<void> {
    // Yield first so the handler never runs inside the reader loop's turn.
    await Promise.resolve();
    try {
      await handler(params);
    } catch (error) {
      this.onError(error, method);
    }
  }
}
