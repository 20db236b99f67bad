/**
 * Process command - Runs every image under a directory through a pipeline
 */

import { createLocalImagePipeline } from "../../images";
import { findImageFiles, joinOutdirFilenameExtension, logger } from "../../utils";
import {
  RunCommandOptionsSchema,
  buildOps,
  executeRun,
  prepareConfig,
} from "../shared";

export async function processCommand(inputDir: string, opts: unknown): Promise<void> {
  try {
    const options = RunCommandOptionsSchema.parse(opts);
    const config = await prepareConfig(options);

    const files = await findImageFiles(inputDir);
    if (files.length === 0) {
      logger.warn(`No image files found in ${inputDir}`);
      return;
    }
    logger.debug(`Found ${files.length} image file(s) in ${inputDir}`);

    await executeRun({
      title: "Processing Complete",
      pipeline: createLocalImagePipeline(buildOps(options)),
      inpaths: files,
      pathFunc: joinOutdirFilenameExtension(config.output.directory, config.output.extension),
      config,
      options,
    });
  } catch (error) {
    logger.error("Processing failed", error);
    process.exit(1);
  }
}
