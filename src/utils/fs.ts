/**
 * Filesystem Utilities
 * Shared filesystem helper functions
 */

import { access } from "fs/promises";
import { constants } from "node:fs";
import type { SkipPredicate } from "../types";

/**
 * Check if a file or directory exists
 */
export async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Skip predicate: skip items whose output path already exists
 */
export const outputExists: SkipPredicate = (_inpath, outpath) => fileExists(outpath);
