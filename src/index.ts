/**
 * imgbatch
 * Bulk file-processing pipelines with a retrying fetch layer and run reports
 */

export { Pipeline, DEFAULT_CATCH_LIST, CATCH_NOTHING } from "./pipeline";
export type { PipelineOptions } from "./pipeline";
export {
  PipelineConfigError,
  NoRunReportError,
  PipelineProcessingError,
  HandledItemError,
  HttpError,
  RetryableHttpError,
  RequestTimeoutError,
  DeclinedFetchError,
  ImageLoadError,
  ReservedColumnError,
  formatError,
} from "./errors";
export type { ItemFailure } from "./errors";
export * from "./modules";
export * from "./images";
export * from "./utils";
export * from "./types";
