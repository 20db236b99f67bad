import { describe, it, expect } from "vitest";
import { formatDuration } from "./summary";

describe("formatDuration", () => {
  it.each([
    [250, "250ms"],
    [1500, "1.50s"],
    [125000, "2m 5s"],
  ])("formats %i ms as %s", (ms, expected) => {
    expect(formatDuration(ms)).toBe(expected);
  });
});
