import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readdir, rm } from "fs/promises";
import { tmpdir } from "os";
import path from "path";
import { writeImage, TMP_DIRNAME } from "./write";
import { loadImage } from "./load";
import type { Image } from "../types";

function pattern(width: number, height: number, channels: 3 | 4): Image {
  const data = Buffer.alloc(width * height * channels);
  for (let i = 0; i < data.length; i++) {
    data[i] = (i * 37) % 256;
  }
  return { data, width, height, channels };
}

describe("writeImage", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "write-image-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it.each([3, 4] as const)("round-trips %i-channel PNG images losslessly", async (channels) => {
    const image = pattern(7, 5, channels);
    const outpath = path.join(dir, "nested", "image.png");

    await writeImage(image, outpath);
    const loaded = await loadImage(outpath);

    expect(loaded.width).toBe(7);
    expect(loaded.height).toBe(5);
    expect(loaded.channels).toBe(channels);
    expect(loaded.data.equals(image.data)).toBe(true);
  });

  it("leaves no temporary files behind", async () => {
    const outpath = path.join(dir, "image.png");
    await writeImage(pattern(3, 3, 3), outpath);

    expect(await readdir(dir)).toEqual(expect.arrayContaining(["image.png", TMP_DIRNAME]));
    expect(await readdir(path.join(dir, TMP_DIRNAME))).toEqual([]);
  });
});
