/**
 * Pipeline type definitions
 */

import type { ItemReport } from "../modules/report-log";

export type Awaitable<T> = T | Promise<T>;

// ============================================================================
// Stage Functions
// ============================================================================

export type PlainLoad<T> = (inpath: string) => Awaitable<T>;
export type PlainOp<T> = (item: T) => Awaitable<T>;
export type PlainWrite<T> = (item: T, outpath: string) => Awaitable<void>;

// Contextual stages also get the input path and the item's report record so
// they can add fields to it. Plain ops are assignable to
// ContextualOp, so the two kinds can be mixed in a contextual pipeline.
export type ContextualLoad<T> = (inpath: string, record: ItemReport) => Awaitable<T>;
export type ContextualOp<T> = (
  item: T,
  inpath: string,
  record: ItemReport,
) => Awaitable<T>;
export type ContextualWrite<T> = (
  item: T,
  outpath: string,
  inpath: string,
  record: ItemReport,
) => Awaitable<void>;

export type ReportingMode = "plain" | "contextual";

export interface PlainPipelineSpec<T> {
  reportingMode?: "plain";
  load: PlainLoad<T>;
  ops?: PlainOp<T>[];
  write?: PlainWrite<T>;
}

export interface ContextualPipelineSpec<T> {
  reportingMode: "contextual";
  load: ContextualLoad<T>;
  ops?: ContextualOp<T>[];
  write?: ContextualWrite<T>;
}

export type PipelineSpec<T> = PlainPipelineSpec<T> | ContextualPipelineSpec<T>;

/**
 * Stages in the single calling convention the executor uses
 * Built once from a PipelineSpec at construction time
 */
export interface ComposedStages<T> {
  load: ContextualLoad<T>;
  ops: readonly ContextualOp<T>[];
  write: ContextualWrite<T> | null;
}

// ============================================================================
// Run Options
// ============================================================================

export type PathFunc = (inpath: string) => string;

export type SkipPredicate = (
  inpath: string,
  outpath: string,
) => Awaitable<boolean>;

export type ErrorClass = abstract new (...args: never[]) => Error;

/** An error class, or a list of them; an empty list catches nothing */
export type CatchList = ErrorClass | readonly ErrorClass[];

export interface RunProgress {
  completed: number;
  total: number;
  inpath: string;
}

export interface RunOptions {
  nJobs: number;
  pathFunc?: PathFunc;
  skipPredicate?: SkipPredicate;
  exceptionsToCatch?: CatchList;
  onProgress?: (progress: RunProgress) => void;
}
