/**
 * Error classes for pipeline runs and the fetch layer
 */

import type { RunReport } from "./modules/report";

/**
 * Invalid option combination passed to `Pipeline.run`
 * Thrown before any item is dispatched
 */
export class PipelineConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PipelineConfigError";
  }
}

export class NoRunReportError extends Error {
  constructor(message = "Pipeline has not been run, so there is no run report.") {
    super(message);
    this.name = "NoRunReportError";
  }
}

/**
 * Base class for item failures that a stage has already reported
 * The executor records these under `error` without consulting the catch-list
 */
export class HandledItemError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "HandledItemError";
  }
}

export class ReservedColumnError extends Error {
  column: string;

  constructor(column: string) {
    super(`"${column}" is a reserved run report column`);
    this.name = "ReservedColumnError";
    this.column = column;
  }
}

// ============================================================================
// Fetch layer
// ============================================================================

export class HttpError extends Error {
  url: string;
  status: number;

  constructor(url: string, status: number, message?: string) {
    super(message ?? `HTTP ${status} for ${url}`);
    this.name = "HttpError";
    this.url = url;
    this.status = status;
  }
}

/** 5xx response, retried by `getResponse` */
export class RetryableHttpError extends HttpError {
  constructor(url: string, status: number) {
    super(url, status, `HTTP ${status} for ${url} (retryable)`);
    this.name = "RetryableHttpError";
  }
}

/** 403/404 response: logged, never retried, recorded as a handled item failure */
export class DeclinedFetchError extends HandledItemError {
  url: string;
  status: number;

  constructor(url: string, status: number) {
    super(`Failed to download ${url} with status code ${status}`);
    this.name = "DeclinedFetchError";
    this.url = url;
    this.status = status;
  }
}

/** No complete response (headers and body) within the request timeout */
export class RequestTimeoutError extends Error {
  url: string;
  timeout: number;

  constructor(url: string, timeout: number) {
    super(`No complete response from ${url} within ${timeout}ms`);
    this.name = "RequestTimeoutError";
    this.url = url;
    this.timeout = timeout;
  }
}

export class ImageLoadError extends Error {
  path: string;

  constructor(path: string, options?: ErrorOptions) {
    super(`${path} failed to load`, options);
    this.name = "ImageLoadError";
    this.path = path;
  }
}

// ============================================================================
// Run failures
// ============================================================================

export interface ItemFailure {
  inpath: string;
  error: unknown;
}

/**
 * One or more items raised errors outside the catch-list
 * `report` holds the records of every item, including the failed ones
 */
export class PipelineProcessingError extends Error {
  failures: ItemFailure[];
  report: RunReport;

  constructor(failures: ItemFailure[], report: RunReport) {
    super(
      `${failures.length} item(s) failed with unhandled errors: ${failures
        .map((f) => f.inpath)
        .join(", ")}`,
      { cause: failures[0]?.error },
    );
    this.name = "PipelineProcessingError";
    this.failures = failures;
    this.report = report;
  }
}

/**
 * Human-readable form of a thrown value for the run report
 */
export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return error.message ? `${error.name}: ${error.message}` : error.name;
  }
  try {
    return String(error);
  } catch {
    // Objects without a prototype have no toString
    return Object.prototype.toString.call(error);
  }
}
