import { describe, it, expect } from "vitest";
import { formatError, RequestTimeoutError } from "./errors";

describe("formatError", () => {
  it("prefixes error messages with the error name", () => {
    expect(formatError(new RangeError("out of range"))).toBe("RangeError: out of range");
    expect(formatError(new RequestTimeoutError("https://images.test/a.png", 50))).toBe(
      "RequestTimeoutError: No complete response from https://images.test/a.png within 50ms",
    );
  });

  it("uses the bare name for errors without a message", () => {
    expect(formatError(new TypeError())).toBe("TypeError");
  });

  it("stringifies thrown non-errors", () => {
    expect(formatError("boom")).toBe("boom");
    expect(formatError(42)).toBe("42");
    expect(formatError(null)).toBe("null");
  });

  it("handles objects without a prototype", () => {
    expect(formatError(Object.create(null))).toBe("[object Object]");
  });
});
