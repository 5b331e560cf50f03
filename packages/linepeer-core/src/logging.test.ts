// Tests for call tracing and the debug-backed logger

import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from "vitest";
import createDebug from "debug";
import { format } from "node:util";
import { callTracer, createLogger, type LogFn } from "./logging.ts";
import { PeerError } from "./errors.ts";

describe("callTracer", () => {
  let log: Mock<LogFn>;

  beforeEach(() => {
    log = vi.fn<LogFn>();
  });

  it("logs sent calls and their completion", async () => {
    const tracer = callTracer({ log });

    tracer.sent(1, "Editor.echo", { text: "hi" });
    expect(log).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledWith("→ Editor.echo #1", {
      type: "request",
      id: 1,
      method: "Editor.echo",
      params: { text: "hi" },
    });

    await new Promise((resolve) => setTimeout(resolve, 10));

    tracer.completed(1, "Editor.echo", { ok: true, value: { text: "hi" } });
    expect(log).toHaveBeenCalledTimes(2);
    const [message, record] = log.mock.calls[1] ?? [];
    expect(message).toMatch(/^← Editor\.echo #1: ✓ \d+\.\d{2}ms$/);
    expect(record).toMatchObject({
      type: "response",
      id: 1,
      ok: true,
      result: { text: "hi" },
    });
  });

  it("does not log params when disabled", () => {
    const tracer = callTracer({ log, logParams: false });

    tracer.sent(1, "Editor.echo", { text: "hi" });
    expect(log.mock.calls[0]?.[1]).not.toHaveProperty("params");
  });

  it("does not log results when disabled", () => {
    const tracer = callTracer({ log, logResults: false });

    tracer.sent(1, "Editor.echo", null);
    tracer.completed(1, "Editor.echo", { ok: true, value: { text: "hi" } });

    expect(log.mock.calls[1]?.[1]).toMatchObject({ ok: true });
    expect(log.mock.calls[1]?.[1]).not.toHaveProperty("result");
  });

  it("logs failures", () => {
    const tracer = callTracer({ log });

    tracer.sent(4, "Editor.save", null);
    tracer.completed(4, "Editor.save", { ok: false, error: PeerError.closed() });

    expect(log.mock.calls[1]?.[0]).toMatch(/^← Editor\.save #4: ✗ /);
    expect(log.mock.calls[1]?.[1]).toMatchObject({
      ok: false,
      error: { name: "PeerError", message: "connection closed" },
    });
  });

  it("ignores completions it never saw sent", () => {
    const tracer = callTracer({ log });

    tracer.completed(0, "Editor.save", { ok: false, error: PeerError.closed() });
    expect(log).not.toHaveBeenCalled();
  });

  it("skips fast completions when minDuration is set", () => {
    const tracer = callTracer({ log, minDuration: 100 });

    tracer.sent(1, "Editor.fast", null);
    tracer.completed(1, "Editor.fast", { ok: true, value: 1 });

    expect(log).toHaveBeenCalledTimes(1);
  });

  it("logs slow completions when minDuration is set", async () => {
    const tracer = callTracer({ log, minDuration: 5 });

    tracer.sent(1, "Editor.slow", null);
    await new Promise((resolve) => setTimeout(resolve, 10));
    tracer.completed(1, "Editor.slow", { ok: true, value: 1 });

    expect(log).toHaveBeenCalledTimes(2);
  });
});

describe("createLogger", () => {
  const originalLog = createDebug.log;
  let lines: string[] = [];

  beforeEach(() => {
    lines = [];
    createDebug.log = (...args: unknown[]) => {
      lines.push(format(...args));
    };
  });

  afterEach(() => {
    createDebug.log = originalLog;
    createDebug.disable();
  });

  it("writes when the namespace is enabled", () => {
    createDebug.enable("linepeer:test");
    const log = createLogger("linepeer:test");

    log("peer closed");
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/linepeer:test.*peer closed/);
  });

  it("formats fields", () => {
    createDebug.enable("linepeer:*");
    const log = createLogger("linepeer:test");

    log("dropping response that has no pending call", { id: 7 });
    expect(lines[0]).toMatch(/dropping response that has no pending call \{ id: .*7.* \}/);
  });

  it("stays silent when the namespace is not enabled", () => {
    createDebug.enable("other:*");
    const log = createLogger("linepeer:test");

    log("peer closed");
    expect(lines).toHaveLength(0);
  });

  it("honours exclusions", () => {
    createDebug.enable("*,-linepeer:test");
    const log = createLogger("linepeer:test");

    log("peer closed");
    expect(lines).toHaveLength(0);
  });
});
