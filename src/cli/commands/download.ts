/**
 * Download command - Downloads a list of image URLs through a pipeline
 */

import { readFile } from "fs/promises";
import { z } from "zod";
import { createDownloadImagePipeline } from "../../images";
import { joinOutdirFilenameExtension, joinOutdirHashedPathExtension, logger } from "../../utils";
import {
  RunCommandOptionsSchema,
  buildOps,
  executeRun,
  prepareConfig,
} from "../shared";

const DownloadOptionsSchema = RunCommandOptionsSchema.extend({
  hashNames: z.boolean().optional(),
});

/**
 * One URL per line; blank lines and lines starting with "#" are ignored
 */
export function parseUrlList(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== "" && !line.startsWith("#"));
}

export async function downloadCommand(urlsFile: string, opts: unknown): Promise<void> {
  try {
    const options = DownloadOptionsSchema.parse(opts);
    const config = await prepareConfig(options);

    const urls = parseUrlList(await readFile(urlsFile, "utf-8"));
    logger.debug(`Read ${urls.length} URL(s) from ${urlsFile}`);

    const { directory, extension } = config.output;
    const pathFunc = options.hashNames
      ? joinOutdirHashedPathExtension(directory, extension)
      : joinOutdirFilenameExtension(directory, extension);

    const pipeline = createDownloadImagePipeline(buildOps(options), {
      fetch: {
        timeout: config.fetch.timeout,
        retry: {
          maxAttempts: config.fetch.maxAttempts,
          initialDelay: config.fetch.initialDelay,
          maxDelay: config.fetch.maxDelay,
        },
      },
    });

    await executeRun({
      title: "Download Complete",
      pipeline,
      inpaths: urls,
      pathFunc,
      config,
      options,
    });
  } catch (error) {
    logger.error("Download failed", error);
    process.exit(1);
  }
}
