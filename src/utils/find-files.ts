/**
 * File discovery by extension
 */

import glob from "fast-glob";
import path from "path";

export const IMAGE_EXTENSIONS: readonly string[] = [
  ".bmp",
  ".gif",
  ".heic",
  ".heif",
  ".ico",
  ".jpe",
  ".jpeg",
  ".jpg",
  ".png",
  ".svg",
  ".tif",
  ".tiff",
  ".webp",
  ".avif",
];

/**
 * Find every file under `searchDir` (recursively) with one of `extensions`
 *
 * Matching is case-insensitive and the leading "." is optional.
 * Results are absolute paths, sorted.
 */
export async function findFilesWithExtensions(
  searchDir: string,
  extensions: Iterable<string>,
): Promise<string[]> {
  const wanted = new Set(
    [...extensions].map((ext) => (ext.startsWith(".") ? ext : `.${ext}`).toLowerCase()),
  );

  const files = await glob("**/*", {
    cwd: searchDir,
    absolute: true,
    onlyFiles: true,
    dot: false,
  });

  return files.filter((file) => wanted.has(path.extname(file).toLowerCase())).sort();
}

export async function findImageFiles(searchDir: string): Promise<string[]> {
  return findFilesWithExtensions(searchDir, IMAGE_EXTENSIONS);
}
