import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import path from "path";
import { loadConfig, loadDefaultConfig, mergeConfig } from "./load-config";

describe("loadDefaultConfig", () => {
  it("loads the bundled defaults", async () => {
    const config = await loadDefaultConfig();
    expect(config.fetch).toEqual({
      timeout: 5000,
      maxAttempts: 10,
      initialDelay: 1000,
      maxDelay: 10000,
    });
    expect(config.run).toEqual({ jobs: 4, skipExisting: true });
  });
});

describe("mergeConfig", () => {
  it("merges section by section", async () => {
    const base = await loadDefaultConfig();
    const merged = mergeConfig(base, { run: { jobs: 16 }, output: { extension: ".jpg" } });

    expect(merged.run).toEqual({ jobs: 16, skipExisting: true });
    expect(merged.output).toEqual({ directory: "./output", extension: ".jpg" });
    expect(merged.fetch).toEqual(base.fetch);
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "load-config-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("applies user config, then the custom file", async () => {
    const userConfigPath = path.join(dir, "user.json");
    const custom = path.join(dir, "custom.json");
    await writeFile(userConfigPath, JSON.stringify({ run: { jobs: 2 }, logging: { level: "debug" } }));
    await writeFile(custom, JSON.stringify({ run: { jobs: 8 } }));

    const { config, errors } = await loadConfig({ userConfigPath, custom });

    expect(errors).toEqual([]);
    expect(config.run.jobs).toBe(8);
    expect(config.logging.level).toBe("debug");
  });

  it("ignores a missing user config", async () => {
    const { config, errors } = await loadConfig({
      userConfigPath: path.join(dir, "absent.json"),
    });

    expect(errors).toEqual([]);
    expect(config.run.jobs).toBe(4);
  });

  it("reports invalid files and leaves them out of the merge", async () => {
    const userConfigPath = path.join(dir, "user.json");
    const custom = path.join(dir, "custom.json");
    await writeFile(userConfigPath, JSON.stringify({ run: { jobs: -3 } }));
    await writeFile(custom, "{ not json");

    const { config, errors } = await loadConfig({ userConfigPath, custom });

    expect(errors.map((e) => e.path)).toEqual([userConfigPath, custom]);
    expect(config.run.jobs).toBe(4);
  });
});
