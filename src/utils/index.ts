/**
 * Utility exports
 */

// Logging
export { Logger, logger } from "./logger";
export type { LogLevel } from "./logger";

// Worker scopes
export { WorkerScope, WorkerLocal, ScopePool, currentScope, runInScope } from "./worker-scope";

// Network utilities
export { HttpSession, getSession, DEFAULT_TIMEOUT } from "./http-session";
export type { FetchLike, HttpSessionOptions, SessionRequestInit } from "./http-session";
export { getResponse, getBytes, checkStatus, isConnectionError } from "./get-response";
export type { FetchOptions } from "./get-response";
export { withRetry, backoffDelay, sleep, DEFAULT_RETRY_POLICY } from "./retry";
export type { RetryPolicy, RetryOptions } from "./retry";

// Path/filename utilities
export {
  joinOutdirFilenameExtension,
  joinOutdirHashedPathExtension,
  replaceDir,
  inputFilename,
  hashedName,
} from "./path-funcs";

// Filesystem utilities
export { fileExists, outputExists } from "./fs";
export { findFilesWithExtensions, findImageFiles, IMAGE_EXTENSIONS } from "./find-files";
export { saveReport } from "./save-report";

// Config utilities
export {
  loadConfig,
  loadDefaultConfig,
  loadPartialConfig,
  mergeConfig,
  getUserConfigPath,
  getDefaultConfigPath,
} from "./load-config";
export type { LoadConfigOptions } from "./load-config";
