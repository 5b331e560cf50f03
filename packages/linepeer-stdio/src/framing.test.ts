import { describe, it, expect, vi } from "vitest";
import { PassThrough, Writable } from "node:stream";
import type { LogFn } from "@linepeer/core";
import { LineFramed, FramingError, type LineFramedOptions } from "./framing.ts";

function setup(options: LineFramedOptions = {}) {
  const input = new PassThrough();
  const output = new PassThrough();
  output.setEncoding("utf8");
  const framed = new LineFramed(input, output, { log: vi.fn<LogFn>(), ...options });
  return { input, output, framed };
}

describe("LineFramed.recv", () => {
  it("reassembles lines split across chunks", async () => {
    const { input, framed } = setup();

    input.write('{"a"');
    input.write(':1}\n{"b":2}\n');

    expect(await framed.recv()).toBe('{"a":1}');
    expect(await framed.recv()).toBe('{"b":2}');
  });

  it("resolves a receive that was waiting for data", async () => {
    const { input, framed } = setup();
    const received = framed.recv();

    input.write("hello\n");
    expect(await received).toBe("hello");
  });

  it("strips a carriage return before the newline", async () => {
    const { input, framed } = setup();

    input.write("one\r\ntwo\n");
    expect(await framed.recv()).toBe("one");
    expect(await framed.recv()).toBe("two");
  });

  it("decodes characters split between chunks", async () => {
    const { input, framed } = setup();
    const bytes = Buffer.from("é\n", "utf8");

    input.write(bytes.subarray(0, 1));
    input.write(bytes.subarray(1));
    expect(await framed.recv()).toBe("é");
  });

  it("delivers a final unterminated line at end of input", async () => {
    const { input, framed } = setup();

    input.end("first\nlast");
    expect(await framed.recv()).toBe("first");
    expect(await framed.recv()).toBe("last");
    expect(await framed.recv()).toBeNull();
  });

  it("reports an overlong line once, then reads as ended", async () => {
    const { input, framed } = setup({ maxLineLength: 8 });

    input.write("0123456789\n");
    await expect(framed.recv()).rejects.toThrow(FramingError);
    expect(await framed.recv()).toBeNull();
  });

  it("rejects an overlong partial line before its newline arrives", async () => {
    const { input, framed } = setup({ maxLineLength: 8 });
    const received = framed.recv();

    input.write("0123456789");
    await expect(received).rejects.toThrow("line of 10 bytes exceeds limit of 8");
  });

  it("accepts a full-length CRLF line split before its newline", async () => {
    const { input, framed } = setup({ maxLineLength: 8 });

    input.write("01234567\r");
    input.write("\n");
    expect(await framed.recv()).toBe("01234567");
  });

  it("reports input errors", async () => {
    const { input, framed } = setup();
    const received = framed.recv();

    input.destroy(new Error("EIO"));
    await expect(received).rejects.toThrow("EIO");
    expect(await framed.recv()).toBeNull();
  });
});

describe("LineFramed.send", () => {
  it("terminates each line with a newline", async () => {
    const { output, framed } = setup();

    await framed.send('{"id":1,"method":"echo","params":null}');
    expect(output.read()).toBe('{"id":1,"method":"echo","params":null}\n');
  });

  it("rejects writes after the output ended", async () => {
    const { output, framed } = setup();
    output.end();

    await expect(framed.send("late")).rejects.toMatchObject({
      kind: "write-after-close",
      message: "write after close",
    });
  });
});

describe("LineFramed output errors", () => {
  it("rejects the failed send and logs the stream error", async () => {
    const log = vi.fn<LogFn>();
    const output = new Writable({
      write(_chunk, _encoding, callback) {
        callback(new Error("EPIPE"));
      },
    });
    const framed = new LineFramed(new PassThrough(), output, { log });

    await expect(framed.send("lost")).rejects.toThrow("EPIPE");
    await vi.waitFor(() => expect(log).toHaveBeenCalledWith("output error", { error: "EPIPE" }));
  });
});

describe("LineFramed.close", () => {
  it("wakes a waiting receive and ignores later input", async () => {
    const { input, framed } = setup();
    const received = framed.recv();

    framed.close();
    expect(await received).toBeNull();

    input.write("ignored\n");
    expect(await framed.recv()).toBeNull();
  });

  it("leaves the streams open by default", () => {
    const { input, output, framed } = setup();

    framed.close();
    expect(output.writableEnded).toBe(false);
    expect(input.destroyed).toBe(false);
  });

  it("ends the streams with endOnClose", () => {
    const { input, output, framed } = setup({ endOnClose: true });

    framed.close();
    expect(output.writableEnded).toBe(true);
    expect(input.destroyed).toBe(true);
  });
});
