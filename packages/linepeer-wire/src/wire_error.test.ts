// Basic tests for WireError

import { describe, it, expect } from "vitest";
import { WireError } from "./wire_error.ts";

describe("WireError", () => {
  it("creates malformed error", () => {
    const cause = new SyntaxError("Unexpected token");
    const error = WireError.malformed("{", "invalid JSON", cause);

    expect(error.kind).toBe("malformed");
    expect(error.line).toBe("{");
    expect(error.cause).toBe(cause);
    expect(error.message).toBe("malformed message: invalid JSON");
  });

  it("creates encode error", () => {
    const error = WireError.encode("save", new TypeError("cyclic object value"));

    expect(error.kind).toBe("encode");
    expect(error.line).toBeUndefined();
    expect(error.message).toBe("cannot encode save: cyclic object value");
  });

  it("stringifies non-error causes", () => {
    expect(WireError.encode("save", "boom").message).toBe("cannot encode save: boom");
  });

  it("is an Error instance", () => {
    const error = WireError.malformed("x", "invalid JSON");
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("WireError");
  });
});
