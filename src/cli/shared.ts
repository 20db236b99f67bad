/**
 * Shared command plumbing: option schema, config, ops and the run itself
 */

import ora from "ora";
import { z } from "zod";
import { formatError, PipelineProcessingError, type ItemFailure } from "../errors";
import { reportDhash, reportMeanBrightness, resize, toGrayscale } from "../images";
import type { Pipeline } from "../pipeline";
import type { RunReport } from "../modules/report";
import { loadConfig, logger, outputExists, saveReport } from "../utils";
import type { AppConfig, ContextualOp, Image, PathFunc } from "../types";
import { displaySummary } from "./summary";

export const RunCommandOptionsSchema = z.object({
  output: z.string().optional(),
  ext: z.string().optional(),
  jobs: z.coerce.number().int().positive().optional(),
  resize: z
    .string()
    .regex(/^\d+x\d+$/, "Expected WIDTHxHEIGHT, e.g. 224x224")
    .optional(),
  minDim: z.coerce.number().int().positive().optional(),
  grayscale: z.boolean().optional(),
  brightness: z.boolean().optional(),
  dhash: z.boolean().optional(),
  overwrite: z.boolean().optional(),
  report: z.string().optional(),
  config: z.string().optional(),
  verbose: z.boolean().optional(),
});

export type RunCommandOptions = z.infer<typeof RunCommandOptionsSchema>;

/**
 * Load configuration (default → user → custom), apply CLI overrides and set
 * the log level
 */
export async function prepareConfig(options: RunCommandOptions): Promise<AppConfig> {
  const { config, errors } = await loadConfig({ custom: options.config });

  if (options.output) config.output.directory = options.output;
  if (options.ext) config.output.extension = options.ext;
  if (options.jobs) config.run.jobs = options.jobs;
  if (options.overwrite) config.run.skipExisting = false;

  logger.setLevel(options.verbose ? "debug" : config.logging.level);

  for (const err of errors) {
    logger.warn(`Ignoring config file ${err.path}: ${formatError(err.error)}`);
  }
  return config;
}

export function buildOps(options: RunCommandOptions): ContextualOp<Image>[] {
  if (options.resize && options.minDim) {
    throw new Error("--resize and --min-dim cannot be used together");
  }

  const ops: ContextualOp<Image>[] = [];
  if (options.resize) {
    const [width, height] = options.resize.split("x").map(Number);
    ops.push(resize({ width, height }));
  } else if (options.minDim) {
    ops.push(resize({ minDim: options.minDim }));
  }
  if (options.grayscale) ops.push(toGrayscale);
  if (options.brightness) ops.push(reportMeanBrightness);
  if (options.dhash) ops.push(reportDhash());
  return ops;
}

export interface ExecuteOptions {
  title: string;
  pipeline: Pipeline<Image>;
  inpaths: string[];
  pathFunc: PathFunc;
  config: AppConfig;
  options: RunCommandOptions;
}

/**
 * Run the pipeline with a progress spinner, save the report and display the
 * summary
 * Sets a non-zero exit code when any item failed with an unhandled error
 */
export async function executeRun(params: ExecuteOptions): Promise<void> {
  const { pipeline, inpaths, pathFunc, config, options } = params;
  const spinner = ora({
    text: "Starting...",
    indent: 2,
    isEnabled: config.logging.showProgress,
  }).start();
  const startedAt = Date.now();

  let report: RunReport;
  let failures: ItemFailure[] = [];

  try {
    report = await pipeline.run(inpaths, {
      nJobs: config.run.jobs,
      pathFunc,
      skipPredicate: config.run.skipExisting ? outputExists : undefined,
      onProgress: ({ completed, total }) => {
        spinner.text = `Processing ${completed}/${total}`;
      },
    });
  } catch (error) {
    if (!(error instanceof PipelineProcessingError)) {
      spinner.fail(`${params.title} failed`);
      throw error;
    }
    report = error.report;
    failures = error.failures;
  }

  spinner.clear();
  spinner.stop();

  if (options.report) {
    await saveReport(report, options.report);
  }

  displaySummary(report, {
    title: params.title,
    duration: Date.now() - startedAt,
    failures,
    verbose: options.verbose,
    reportPath: options.report,
  });

  if (failures.length > 0) {
    process.exitCode = 1;
  }
}
