import { describe, it, expect } from "vitest";
import { ReportLog } from "./report-log";
import { ReservedColumnError } from "../errors";

describe("ReportLog", () => {
  it("keeps core fields and extra fields per input path", () => {
    const log = new ReportLog();
    log.update("a.png", { outpath: "out/a.png", skipped: false });
    log.set("a.png", "width", 10);
    log.update("a.png", { error: null });

    const entries = [...log];
    expect(entries).toHaveLength(1);
    const [inpath, entry] = entries[0];
    expect(inpath).toBe("a.png");
    expect(entry.outpath).toBe("out/a.png");
    expect(entry.skipped).toBe(false);
    expect(entry.error).toBeNull();
    expect(log.get("a.png", "width")).toBe(10);
    expect(log.has("b.png")).toBe(false);
  });

  it("orders extra fields by first write across all items", () => {
    const log = new ReportLog();
    log.set("a.png", "height", 1);
    log.set("b.png", "width", 2);
    log.set("b.png", "height", 3);
    log.set("c.png", "dhash", "ff");

    expect(log.fieldNames).toEqual(["height", "width", "dhash"]);
  });

  it("rejects extra fields that shadow core columns", () => {
    const log = new ReportLog();
    expect(() => log.set("a.png", "error", "nope")).toThrow(ReservedColumnError);
    expect(() => log.set("a.png", "timeFinished", 0)).toThrow(
      '"timeFinished" is a reserved run report column',
    );
    expect(log.has("a.png")).toBe(false);
  });

  it("hands stages a record bound to one input path", () => {
    const log = new ReportLog();
    log.set("b.png", "width", 5);
    const record = log.forItem("a.png");

    record.set("width", 10);

    expect(record.inpath).toBe("a.png");
    expect(record.get("width")).toBe(10);
    expect(log.get("b.png", "width")).toBe(5);
    expect(Object.keys(record).sort()).toEqual(["get", "inpath", "set"]);
    expect(() => record.set("error", "x")).toThrow(ReservedColumnError);
  });
});
