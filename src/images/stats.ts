/**
 * Image statistics, and ops that record them in the run report
 */

import { reportOutput } from "../modules/report-output";
import { fromSharp, toSharp } from "./codec";
import { grayValues, toGrayscale } from "./transforms";
import type { ContextualOp, Image } from "../types";

/**
 * Mean luma, 0..255
 */
export function meanBrightness(image: Image): number {
  const gray = grayValues(image);
  if (gray.length === 0) return 0;

  let sum = 0;
  for (const value of gray) {
    sum += value;
  }
  return sum / gray.length;
}

/**
 * Difference hash as a hex string
 *
 * The grayscale image is shrunk to (n + 1) x n; bit i (row-major) is set when
 * pixel i is darker than its right-hand neighbour. Near-duplicate images
 * usually have hashes within a Hamming distance of 10 for n = 8.
 */
export async function dhash(image: Image, sqrtHashSize = 8): Promise<string> {
  const small = await fromSharp(
    toSharp(await toGrayscale(image)).resize(sqrtHashSize + 1, sqrtHashSize, {
      fit: "fill",
    }),
  );
  const gray = grayValues(small);
  const rowLength = sqrtHashSize + 1;

  let hash = 0n;
  let bit = 0n;
  for (let y = 0; y < sqrtHashSize; y++) {
    for (let x = 0; x < sqrtHashSize; x++) {
      const left = gray[y * rowLength + x];
      const right = gray[y * rowLength + x + 1];
      if (right > left) {
        hash |= 1n << bit;
      }
      bit++;
    }
  }
  return hash.toString(16);
}

export const reportMeanBrightness: ContextualOp<Image> = reportOutput(
  "meanBrightness",
  meanBrightness,
);

export function reportDhash(sqrtHashSize = 8): ContextualOp<Image> {
  return reportOutput("dhash", (image: Image) => dhash(image, sqrtHashSize));
}
