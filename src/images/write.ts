/**
 * Image write stage
 */

import { randomUUID } from "node:crypto";
import { mkdir, rename, rm } from "fs/promises";
import path from "path";
import { toSharp } from "./codec";
import type { Image } from "../types";

export const TMP_DIRNAME = ".tmp";

/**
 * Encode `image` by the extension of `outpath` and write it there
 *
 * The file is first written to `<outdir>/.tmp/<uuid><ext>` and then renamed
 * into place, so an interrupted write never leaves a partial file at
 * `outpath`. The temporary file is removed on every exit path; the .tmp
 * directory is left behind.
 */
export async function writeImage(image: Image, outpath: string): Promise<void> {
  const tmpDir = path.join(path.dirname(outpath), TMP_DIRNAME);
  await mkdir(tmpDir, { recursive: true });

  const tmpPath = path.join(tmpDir, `${randomUUID()}${path.extname(outpath)}`);
  try {
    await toSharp(image).toFile(tmpPath);
    await rename(tmpPath, outpath);
  } finally {
    await rm(tmpPath, { force: true });
  }
}
