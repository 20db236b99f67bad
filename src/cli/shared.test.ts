import { describe, it, expect } from "vitest";
import { RunCommandOptionsSchema, buildOps } from "./shared";
import { parseUrlList } from "./commands/download";
import type { Image } from "../types";
import { ReportLog } from "../modules/report-log";

const image: Image = { data: Buffer.alloc(4 * 2 * 3, 100), width: 4, height: 2, channels: 3 };

describe("RunCommandOptionsSchema", () => {
  it("coerces numeric options given as strings", () => {
    const options = RunCommandOptionsSchema.parse({ jobs: "8", minDim: "64" });
    expect(options.jobs).toBe(8);
    expect(options.minDim).toBe(64);
  });

  it("rejects malformed resize shapes", () => {
    expect(() => RunCommandOptionsSchema.parse({ resize: "224" })).toThrow(
      "Expected WIDTHxHEIGHT, e.g. 224x224",
    );
  });
});

describe("buildOps", () => {
  it("returns no ops by default", () => {
    expect(buildOps({})).toEqual([]);
  });

  it("applies resize, grayscale and report ops in order", async () => {
    const ops = buildOps({ resize: "2x1", grayscale: true, brightness: true });
    const log = new ReportLog();

    let item = image;
    for (const op of ops) {
      item = await op(item, "in/a.png", log.forItem("in/a.png"));
    }

    expect(ops).toHaveLength(3);
    expect([item.width, item.height, item.channels]).toEqual([2, 1, 1]);
    expect(log.get("in/a.png", "meanBrightness")).toBe(100);
  });

  it("refuses --resize together with --min-dim", () => {
    expect(() => buildOps({ resize: "2x2", minDim: 2 })).toThrow(
      "--resize and --min-dim cannot be used together",
    );
  });
});

describe("parseUrlList", () => {
  it("skips blank lines and comments", () => {
    const content = "https://images.test/a.png\r\n\n# mirrors\n  https://images.test/b.png  \n";
    expect(parseUrlList(content)).toEqual(["https://images.test/a.png", "https://images.test/b.png"]);
  });
});
