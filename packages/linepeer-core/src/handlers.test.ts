import { describe, it, expect, vi } from "vitest";
import { HandlerRegistry, NotificationDispatcher, type HandlerErrorHook } from "./handlers.ts";

describe("HandlerRegistry", () => {
  it("replaces handlers by name", () => {
    const registry = new HandlerRegistry();
    const first = vi.fn();
    const second = vi.fn();

    registry.set("update", first);
    registry.set("update", second);

    expect(registry.get("update")).toBe(second);
    expect(registry.size).toBe(1);
  });

  it("deletes handlers", () => {
    const registry = new HandlerRegistry();
    registry.set("update", vi.fn());

    expect(registry.delete("update")).toBe(true);
    expect(registry.get("update")).toBeUndefined();
    expect(registry.delete("update")).toBe(false);
  });
});

describe("NotificationDispatcher", () => {
  it("does not run the handler synchronously", async () => {
    const dispatcher = new NotificationDispatcher(Infinity, vi.fn<HandlerErrorHook>());
    const handler = vi.fn();

    dispatcher.dispatch("ping", handler, { n: 1 });
    expect(handler).not.toHaveBeenCalled();

    await dispatcher.idle();
    expect(handler).toHaveBeenCalledWith({ n: 1 });
  });

  it("queues beyond the concurrency limit", async () => {
    const dispatcher = new NotificationDispatcher(2, vi.fn<HandlerErrorHook>());
    const releases: Array<() => void> = [];
    const handler = vi.fn(
      () =>
        new Promise<void>((resolve) => {
          releases.push(resolve);
        }),
    );

    dispatcher.dispatch("job", handler, 1);
    dispatcher.dispatch("job", handler, 2);
    dispatcher.dispatch("job", handler, 3);
    expect(dispatcher.running).toBe(2);
    expect(dispatcher.queued).toBe(1);

    await vi.waitFor(() => expect(handler).toHaveBeenCalledTimes(2));
    releases[0]?.();

    await vi.waitFor(() => expect(handler).toHaveBeenCalledTimes(3));
    expect(handler).toHaveBeenLastCalledWith(3);
    expect(dispatcher.queued).toBe(0);

    for (const release of releases) release();
    await dispatcher.idle();
    expect(dispatcher.running).toBe(0);
  });

  it("reports thrown and rejected handlers", async () => {
    const onError = vi.fn<HandlerErrorHook>();
    const dispatcher = new NotificationDispatcher(Infinity, onError);
    const thrown = new Error("sync");
    const rejected = new Error("async");

    dispatcher.dispatch(
      "a",
      () => {
        throw thrown;
      },
      null,
    );
    dispatcher.dispatch(
      "b",
      async () => {
        throw rejected;
      },
      null,
    );
    await dispatcher.idle();

    expect(onError).toHaveBeenCalledWith(thrown, "a");
    expect(onError).toHaveBeenCalledWith(rejected, "b");
  });
});
