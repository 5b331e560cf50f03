// Logging for linepeer.
//
// Built on the `debug` package: output is off until the DEBUG environment
// variable names a matching namespace, e.g. `DEBUG=linepeer:*`.

import createDebug from "debug";
import type { CallId } from "@linepeer/wire";

/** Structured log sink: a message and optional fields. */
export type LogFn = (message: string, fields?: Record<string, unknown>) => void;

/**
 * Create a logger for a namespace such as "linepeer:peer".
 *
 * Supports the usual `debug` patterns in DEBUG: wildcards ("linepeer:*", "*")
 * and exclusions ("*,-linepeer:rpc").
 */
export function createLogger(namespace: string): LogFn {
  const debug = createDebug(namespace);
  return (message, fields) => {
    if (!debug.enabled) return;
    if (fields) {
      debug("%s %O", message, fields);
    } else {
      debug("%s", message);
    }
  };
}

/** Result of a traced call, as seen by the tracer. */
export type CallOutcome = { ok: true; value: unknown } | { ok: false; error: Error };

export interface TraceOptions {
  /**
   * Where trace records go. Defaults to a "linepeer:rpc" logger.
   */
  log?: LogFn;

  /**
   * Log call params. Defaults to true.
   */
  logParams?: boolean;

  /**
   * Log decoded results. Defaults to true.
   */
  logResults?: boolean;

  /**
   * Minimum duration (ms) to log a completion. Faster calls are skipped.
   * Defaults to 0 (log all completions).
   */
  minDuration?: number;
}

/** Records outgoing calls and their completions with timing information. */
export interface CallTracer {
  sent(id: CallId, method: string, params: unknown): void;
  completed(id: CallId, method: string, outcome: CallOutcome): void;
}

/**
 * Create a tracer that logs each call as it is written and when it completes.
 *
 * Records look like:
 * - sent: `→ echo #1` with `{ type: "request", id, method, params? }`
 * - completed: `← echo #1: ✓ 0.42ms` with `{ type: "response", id, method, duration, ok, result? | error? }`
 */
export function callTracer(options: TraceOptions = {}): CallTracer {
  const log = options.log ?? createLogger("linepeer:rpc");
  const logParams = options.logParams ?? true;
  const logResults = options.logResults ?? true;
  const minDuration = options.minDuration ?? 0;
  const started = new Map<CallId, number>();

  return {
    sent(id, method, params) {
      started.set(id, performance.now());

      const record: Record<string, unknown> = { type: "request", id, method };
      if (logParams && params !== undefined) {
        record.params = params;
      }
      log(`→ ${method} #${id}`, record);
    },

    completed(id, method, outcome) {
      const startTime = started.get(id);
      if (startTime === undefined) return;
      started.delete(id);

      const duration = performance.now() - startTime;
      if (duration < minDuration) return;

      const record: Record<string, unknown> = {
        type: "response",
        id,
        method,
        duration: `${duration.toFixed(2)}ms`,
      };

      if (outcome.ok) {
        record.ok = true;
        if (logResults && outcome.value !== undefined) {
          record.result = outcome.value;
        }
        log(`← ${method} #${id}: ✓ ${duration.toFixed(2)}ms`, record);
      } else {
        record.ok = false;
        record.error = { name: outcome.error.name, message: outcome.error.message };
        log(`← ${method} #${id}: ✗ ${duration.toFixed(2)}ms`, record);
      }
    },
  };
}
