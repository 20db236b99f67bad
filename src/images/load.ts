/**
 * Image load stages
 */

import { getBytes, type FetchOptions } from "../utils/get-response";
import { decodeImage } from "./codec";
import type { Image } from "../types";

/**
 * Read and decode an image file
 * Throws ImageLoadError if the file cannot be decoded
 */
export async function loadImage(path: string): Promise<Image> {
  return decodeImage(path, path);
}

/**
 * Build a load stage that downloads and decodes an image, using the calling
 * worker's HTTP session
 */
export function createImageDownloader(
  options: FetchOptions = {},
): (url: string) => Promise<Image> {
  return async (url) => {
    return decodeImage(await getBytes(url, options), url);
  };
}

export const downloadImage = createImageDownloader();
