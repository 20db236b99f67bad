/**
 * Pipeline - Run orchestrator
 * Fans the per-item executor out over a fixed-size worker pool and builds
 * the run report
 */

import PQueue from "p-queue";
import { z } from "zod";
import {
  NoRunReportError,
  PipelineConfigError,
  PipelineProcessingError,
  formatError,
  type ItemFailure,
} from "./errors";
import { processOne } from "./modules/executor";
import { ReportLog } from "./modules/report-log";
import { RunReport } from "./modules/report";
import { logger as defaultLogger, type Logger } from "./utils/logger";
import { ScopePool } from "./utils/worker-scope";
import type {
  CatchList,
  ComposedStages,
  ErrorClass,
  PipelineSpec,
  ReportingMode,
  RunOptions,
} from "./types";

/** Catch every Error thrown by a stage */
export const DEFAULT_CATCH_LIST: readonly ErrorClass[] = [Error];

/** Let every stage error propagate */
export const CATCH_NOTHING: readonly ErrorClass[] = [];

const JobsSchema = z.number().int().positive();

export interface PipelineOptions {
  logger?: Logger;
}

/**
 * Resolve the stages' calling convention once, so the executor always calls
 * stages the same way
 */
function composeStages<T>(spec: PipelineSpec<T>): ComposedStages<T> {
  if (spec.reportingMode === "contextual") {
    return {
      load: spec.load,
      ops: [...(spec.ops ?? [])],
      write: spec.write ?? null,
    };
  }

  const { load, write } = spec;
  return {
    load: (inpath) => load(inpath),
    ops: (spec.ops ?? []).map((op) => (item: T) => op(item)),
    write: write ? (item, outpath) => write(item, outpath) : null,
  };
}

export class Pipeline<T> {
  readonly reportingMode: ReportingMode;
  private stages: ComposedStages<T>;
  private logger: Logger;
  private report: RunReport | null = null;

  constructor(spec: PipelineSpec<T>, options: PipelineOptions = {}) {
    this.reportingMode = spec.reportingMode ?? "plain";
    this.stages = composeStages(spec);
    this.logger = options.logger ?? defaultLogger;
  }

  get writes(): boolean {
    return this.stages.write !== null;
  }

  /**
   * Report of the most recent run
   * Throws NoRunReportError if the pipeline has not been run
   */
  get runReport(): RunReport {
    if (!this.report) {
      throw new NoRunReportError();
    }
    return this.report;
  }

  /**
   * Run the pipeline over `inpaths` with `nJobs` concurrent workers
   *
   * Every distinct input path gets exactly one run report row. Items whose
   * stage errors are in `exceptionsToCatch` are recorded and the run goes
   * on. If any item fails with another error, the run still finishes every
   * other item, stores the report, and then rejects with
   * PipelineProcessingError.
   */
  async run(inpaths: Iterable<string>, options: RunOptions): Promise<RunReport> {
    this.validate(options);

    const paths = this.uniquePaths(inpaths);
    const exceptionsToCatch: CatchList =
      options.exceptionsToCatch ?? DEFAULT_CATCH_LIST;
    const log = new ReportLog();
    const queue = new PQueue({ concurrency: options.nJobs });
    const scopes = new ScopePool(options.nJobs);
    const failures: ItemFailure[] = [];
    let completed = 0;

    const tasks = paths.map((inpath) =>
      queue.add(async () => {
        try {
          await scopes.use(() =>
            processOne({
              inpath,
              stages: this.stages,
              log,
              exceptionsToCatch,
              logger: this.logger,
              pathFunc: options.pathFunc,
              skipPredicate: options.skipPredicate,
            }),
          );
        } catch (error) {
          failures.push({ inpath, error });
          log.update(inpath, { error: formatError(error) });
          this.logger.error(`Unhandled ${formatError(error)} (on ${inpath})`);
        } finally {
          completed++;
          options.onProgress?.({ completed, total: paths.length, inpath });
        }
      }),
    );

    await Promise.all(tasks);

    this.logger.info("Processing finished. Creating run report.");
    const report = RunReport.fromLog(log);
    this.report = report;

    if (failures.length > 0) {
      failures.sort((a, b) => paths.indexOf(a.inpath) - paths.indexOf(b.inpath));
      throw new PipelineProcessingError(failures, report);
    }

    return report;
  }

  private validate(options: RunOptions): void {
    if (!JobsSchema.safeParse(options.nJobs).success) {
      throw new PipelineConfigError(
        `nJobs must be a positive integer, got ${options.nJobs}`,
      );
    }
    if (options.skipPredicate && !options.pathFunc) {
      throw new PipelineConfigError("A skip predicate requires a path function");
    }
    if (this.stages.write && !options.pathFunc) {
      throw new PipelineConfigError(
        "A pipeline with a write stage requires a path function",
      );
    }
  }

  private uniquePaths(inpaths: Iterable<string>): string[] {
    const all = [...inpaths];
    const unique = [...new Set(all)];
    if (unique.length < all.length) {
      this.logger.warn(
        `Ignoring ${all.length - unique.length} duplicate input path(s)`,
      );
    }
    return unique;
  }
}
