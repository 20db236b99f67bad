/**
 * Path functions
 * Each factory returns a PathFunc mapping an input path or URL to an output path
 */

import { createHash } from "node:crypto";
import path from "path";
import type { PathFunc } from "../types";

const URL_PATTERN = /^[a-z][a-z\d+.-]*:\/\//i;

// RFC 4122 DNS namespace
const DNS_NAMESPACE = Buffer.from("6ba7b8109dad11d180b400c04fd430c8", "hex");

/**
 * Filename of a local path, or the last segment of a URL's pathname
 */
export function inputFilename(inpath: string): string {
  if (URL_PATTERN.test(inpath)) {
    return path.posix.basename(new URL(inpath).pathname);
  }
  return path.basename(inpath);
}

function normalizeExtension(extension: string): string {
  return extension.startsWith(".") ? extension : `.${extension}`;
}

function withExtension(filename: string, extension?: string): string {
  if (extension === undefined) return filename;
  const stem = filename.slice(0, filename.length - path.extname(filename).length);
  return stem + normalizeExtension(extension);
}

/**
 * Name-based (version 5) UUID of `name` in the DNS namespace, without dashes
 */
export function hashedName(name: string): string {
  const digest = createHash("sha1")
    .update(DNS_NAMESPACE)
    .update(name, "utf8")
    .digest()
    .subarray(0, 16);
  digest[6] = (digest[6] & 0x0f) | 0x50;
  digest[8] = (digest[8] & 0x3f) | 0x80;
  return digest.toString("hex");
}

/**
 * `<outdir>/<input filename>`, with the extension replaced when one is given
 */
export function joinOutdirFilenameExtension(
  outdir: string,
  extension?: string,
): PathFunc {
  return (inpath) => path.join(outdir, withExtension(inputFilename(inpath), extension));
}

/**
 * `<outdir>/<hash of the whole input path><extension>`
 * Keeps the input's extension when none is given
 */
export function joinOutdirHashedPathExtension(
  outdir: string,
  extension?: string,
): PathFunc {
  return (inpath) => {
    const suffix = extension ?? path.extname(inputFilename(inpath));
    return path.join(outdir, withExtension(hashedName(inpath), suffix || undefined));
  };
}

/**
 * `<outdir>/<input filename>`
 */
export function replaceDir(outdir: string): PathFunc {
  return (inpath) => path.join(outdir, inputFilename(inpath));
}
