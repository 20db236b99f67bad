/**
 * Image stage exports
 */

export { toSharp, fromSharp, decodeImage } from "./codec";
export { loadImage, downloadImage, createImageDownloader } from "./load";
export { writeImage } from "./write";
export {
  resize,
  minDimShape,
  centerCrop,
  trimPadding,
  crop,
  grayValues,
  toGrayscale,
  flipHorizontal,
  flipVertical,
  rotate90,
  rotate180,
  rotate270,
} from "./transforms";
export type { ImageOp, PaddingSide } from "./transforms";
export { meanBrightness, dhash, reportMeanBrightness, reportDhash } from "./stats";
export { createDownloadImagePipeline, createLocalImagePipeline } from "./pipelines";
export type { ImagePipelineOptions } from "./pipelines";
