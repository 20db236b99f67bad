/**
 * Preset image pipelines
 */

import { Pipeline } from "../pipeline";
import type { FetchOptions } from "../utils/get-response";
import type { Logger } from "../utils/logger";
import { createImageDownloader, loadImage } from "./load";
import { writeImage } from "./write";
import type { ContextualOp, Image } from "../types";

export interface ImagePipelineOptions {
  fetch?: FetchOptions;
  logger?: Logger;
}

/**
 * Download each input URL, apply `ops` and write the result to the path
 * function's output path
 */
export function createDownloadImagePipeline(
  ops: ContextualOp<Image>[] = [],
  options: ImagePipelineOptions = {},
): Pipeline<Image> {
  const logger = options.logger;
  return new Pipeline<Image>(
    {
      reportingMode: "contextual",
      load: createImageDownloader({ logger, ...options.fetch }),
      ops,
      write: writeImage,
    },
    { logger },
  );
}

/**
 * Read each input image from disk, apply `ops` and write the result
 */
export function createLocalImagePipeline(
  ops: ContextualOp<Image>[] = [],
  options: Pick<ImagePipelineOptions, "logger"> = {},
): Pipeline<Image> {
  return new Pipeline<Image>(
    {
      reportingMode: "contextual",
      load: loadImage,
      ops,
      write: writeImage,
    },
    { logger: options.logger },
  );
}
