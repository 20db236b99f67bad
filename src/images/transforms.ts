/**
 * Image transforms
 * Each transform takes an Image and resolves to a new Image. Factories
 * (`resize`, `centerCrop`, `trimPadding`) return ops ready for a pipeline.
 */

import { fromSharp, toSharp } from "./codec";
import type { Image, ResizeShape } from "../types";

export type ImageOp = (image: Image) => Promise<Image>;

// ============================================================================
// Pixel helpers
// ============================================================================

/**
 * Luma of every pixel, 0..255, row-major
 * Alpha is ignored
 */
export function grayValues(image: Image): Uint8Array {
  const { data, width, height, channels } = image;
  const out = new Uint8Array(width * height);

  for (let i = 0; i < out.length; i++) {
    const offset = i * channels;
    if (channels < 3) {
      out[i] = data[offset];
    } else {
      out[i] = Math.round(
        0.299 * data[offset] + 0.587 * data[offset + 1] + 0.114 * data[offset + 2],
      );
    }
  }
  return out;
}

/**
 * Copy the `width` x `height` region whose top-left corner is (left, top)
 */
export function crop(
  image: Image,
  left: number,
  top: number,
  width: number,
  height: number,
): Image {
  const { channels } = image;
  const rowBytes = width * channels;
  const data = Buffer.alloc(rowBytes * height);

  for (let y = 0; y < height; y++) {
    const start = ((top + y) * image.width + left) * channels;
    image.data.copy(data, y * rowBytes, start, start + rowBytes);
  }
  return { data, width, height, channels };
}

// ============================================================================
// Resize
// ============================================================================

function roundToTenth(value: number): number {
  return Math.round(value * 10) / 10;
}

/**
 * Output size that gives the smaller side `minDim` pixels and keeps the
 * aspect ratio as closely as possible
 */
export function minDimShape(
  width: number,
  height: number,
  minDim: number,
): { width: number; height: number } {
  const aspectRatio = width / height;
  if (aspectRatio < 1) {
    return { width: minDim, height: Math.trunc(roundToTenth(minDim / aspectRatio)) };
  }
  return { width: Math.trunc(roundToTenth(minDim * aspectRatio)), height: minDim };
}

export function resize(shape: ResizeShape): ImageOp {
  return async (image) => {
    const target =
      "minDim" in shape ? minDimShape(image.width, image.height, shape.minDim) : shape;

    if (
      !Number.isInteger(target.width) ||
      !Number.isInteger(target.height) ||
      target.width < 1 ||
      target.height < 1
    ) {
      throw new RangeError(
        `Cannot resize to ${target.width}x${target.height}: dimensions must be positive integers`,
      );
    }

    return fromSharp(
      toSharp(image).resize(target.width, target.height, { fit: "fill" }),
    );
  };
}

// ============================================================================
// Crops
// ============================================================================

/**
 * Keep the central `factor` share of each dimension
 * A factor of 1 keeps the whole image
 */
export function centerCrop(factor: number): ImageOp {
  if (!(factor > 0 && factor <= 1)) {
    throw new RangeError(`Center crop factor must be in (0, 1], got ${factor}`);
  }

  return async (image) => {
    const { width, height } = image;
    const left = Math.floor((width - width * factor) / 2);
    const right = Math.floor((width + width * factor) / 2);
    const top = Math.floor((height - height * factor) / 2);
    const bottom = Math.floor((height + height * factor) / 2);
    return crop(image, left, top, right - left, bottom - top);
  };
}

export type PaddingSide = "above" | "below";

/**
 * Remove edge rows and columns whose brightness (0..1) is above or below
 * `threshold`
 *
 * `trimPadding("above", 0.95)` removes near-white padding,
 * `trimPadding("below", 0.05)` near-black padding.
 */
export function trimPadding(side: PaddingSide, threshold: number): ImageOp {
  const isPadding =
    side === "above"
      ? (value: number) => value > threshold
      : (value: number) => value < threshold;

  return async (image) => {
    const gray = grayValues(image);
    let minX = image.width;
    let minY = image.height;
    let maxX = -1;
    let maxY = -1;

    for (let y = 0; y < image.height; y++) {
      for (let x = 0; x < image.width; x++) {
        if (isPadding(gray[y * image.width + x] / 255)) continue;
        minX = Math.min(minX, x);
        maxX = Math.max(maxX, x);
        minY = Math.min(minY, y);
        maxY = Math.max(maxY, y);
      }
    }

    if (maxX < 0) {
      throw new RangeError(`Every pixel is ${side} the padding threshold ${threshold}`);
    }
    return crop(image, minX, minY, maxX - minX + 1, maxY - minY + 1);
  };
}

// ============================================================================
// Color
// ============================================================================

export async function toGrayscale(image: Image): Promise<Image> {
  return {
    data: Buffer.from(grayValues(image)),
    width: image.width,
    height: image.height,
    channels: 1,
  };
}

// ============================================================================
// Flips and rotations
// ============================================================================

export async function flipHorizontal(image: Image): Promise<Image> {
  return fromSharp(toSharp(image).flop());
}

export async function flipVertical(image: Image): Promise<Image> {
  return fromSharp(toSharp(image).flip());
}

/** Rotate 90 degrees counterclockwise */
export async function rotate90(image: Image): Promise<Image> {
  return fromSharp(toSharp(image).rotate(270));
}

export async function rotate180(image: Image): Promise<Image> {
  return fromSharp(toSharp(image).rotate(180));
}

/** Rotate 270 degrees counterclockwise */
export async function rotate270(image: Image): Promise<Image> {
  return fromSharp(toSharp(image).rotate(90));
}
