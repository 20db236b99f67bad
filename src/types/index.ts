/**
 * Central type exports
 */

// Configuration
export type {
  AppConfig,
  FetchConfig,
  RunConfig,
  OutputConfig,
  LoggingConfig,
  PartialAppConfig,
  ConfigError,
} from "./config";
export { AppConfigSchema, PartialAppConfigSchema } from "./config";

// Pipeline
export type {
  Awaitable,
  PlainLoad,
  PlainOp,
  PlainWrite,
  ContextualLoad,
  ContextualOp,
  ContextualWrite,
  ReportingMode,
  PlainPipelineSpec,
  ContextualPipelineSpec,
  PipelineSpec,
  ComposedStages,
  PathFunc,
  SkipPredicate,
  ErrorClass,
  CatchList,
  RunProgress,
  RunOptions,
} from "./pipeline";

// Images
export type { Image, Channels, ResizeShape } from "./image";
