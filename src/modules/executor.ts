/**
 * Executor Module
 * Runs load → ops → write for a single input path and records the outcome
 */

import { HandledItemError, formatError } from "../errors";
import type { Logger } from "../utils/logger";
import type { ReportLog } from "./report-log";
import type {
  CatchList,
  ComposedStages,
  ErrorClass,
  PathFunc,
  SkipPredicate,
} from "../types";

export interface ItemTask<T> {
  inpath: string;
  stages: ComposedStages<T>;
  log: ReportLog;
  exceptionsToCatch: CatchList;
  logger: Logger;
  pathFunc?: PathFunc;
  skipPredicate?: SkipPredicate;
}

function toList(catchList: CatchList): readonly ErrorClass[] {
  return typeof catchList === "function" ? [catchList] : catchList;
}

export function isCaught(error: unknown, catchList: CatchList): boolean {
  if (error instanceof HandledItemError) return true;
  return toList(catchList).some((errorClass) => error instanceof errorClass);
}

async function runStages<T>(
  stages: ComposedStages<T>,
  inpath: string,
  outpath: string | null,
  log: ReportLog,
): Promise<void> {
  const record = log.forItem(inpath);
  let item = await stages.load(inpath, record);
  for (const op of stages.ops) {
    item = await op(item, inpath, record);
  }
  // Pipeline validation guarantees an outpath whenever write is set
  if (stages.write && outpath !== null) {
    await stages.write(item, outpath, inpath, record);
  }
}

/**
 * Process one input path
 *
 * Records in `log` under `inpath`:
 * - outpath, as soon as the path function has been applied
 * - skipped, once the skip predicate has been checked
 * - error, when a stage throws an error in the catch-list
 * - timeFinished, on every exit path
 *
 * Errors outside the catch-list (and errors from the path function or skip
 * predicate) propagate to the caller.
 */
export async function processOne<T>(task: ItemTask<T>): Promise<void> {
  const { inpath, stages, log, logger, pathFunc, skipPredicate } = task;

  try {
    const outpath = pathFunc ? pathFunc(inpath) : null;
    log.update(inpath, { outpath });

    if (skipPredicate && outpath !== null && (await skipPredicate(inpath, outpath))) {
      log.update(inpath, { skipped: true });
      logger.debug(`Skipping ${inpath}: skip predicate matched output path ${outpath}`);
      return;
    }

    log.update(inpath, { skipped: false });

    try {
      await runStages(stages, inpath, outpath, log);
    } catch (error) {
      if (!isCaught(error, task.exceptionsToCatch)) {
        throw error;
      }
      log.update(inpath, { error: formatError(error) });
      logger.error(`${formatError(error)} (on ${inpath})`);
    }
  } finally {
    log.update(inpath, { timeFinished: new Date() });
  }
}
