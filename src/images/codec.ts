/**
 * Conversions between Image and sharp
 */

import sharp from "sharp";
import { ImageLoadError } from "../errors";
import type { Image } from "../types";

export function toSharp(image: Image): sharp.Sharp {
  return sharp(image.data, {
    raw: { width: image.width, height: image.height, channels: image.channels },
  });
}

export async function fromSharp(pipeline: sharp.Sharp): Promise<Image> {
  const { data, info } = await pipeline.raw().toBuffer({ resolveWithObject: true });
  return {
    data,
    width: info.width,
    height: info.height,
    channels: info.channels,
  };
}

/**
 * Decode an encoded image (file path or bytes)
 * `source` names the input in the error if decoding fails
 */
export async function decodeImage(
  input: string | Buffer,
  source: string,
): Promise<Image> {
  try {
    return await fromSharp(sharp(input));
  } catch (error) {
    throw new ImageLoadError(source, { cause: error });
  }
}
