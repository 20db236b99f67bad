/**
 * Image type definitions
 */

export type Channels = 1 | 2 | 3 | 4;

/**
 * Decoded image: raw 8-bit pixels, interleaved, row-major
 * Channels are gray, gray+alpha, RGB or RGBA
 */
export interface Image {
  data: Buffer;
  width: number;
  height: number;
  channels: Channels;
}

export type ResizeShape =
  | { height: number; width: number }
  | { minDim: number };
