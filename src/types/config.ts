/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// Zod schemas
export const FetchConfigSchema = z.object({
  timeout: z.number().int().positive(), // In milliseconds
  maxAttempts: z.number().int().positive(),
  initialDelay: z.number().int().nonnegative(), // In milliseconds
  maxDelay: z.number().int().nonnegative(), // In milliseconds
});

export const RunConfigSchema = z.object({
  jobs: z.number().int().positive(),
  skipExisting: z.boolean(),
});

export const OutputConfigSchema = z.object({
  directory: z.string(),
  extension: z.string().regex(/^\.?[A-Za-z0-9]+$/),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]),
  showProgress: z.boolean(),
});

export const AppConfigSchema = z.object({
  fetch: FetchConfigSchema,
  run: RunConfigSchema,
  output: OutputConfigSchema,
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialAppConfigSchema = z.object({
  fetch: FetchConfigSchema.partial().optional(),
  run: RunConfigSchema.partial().optional(),
  output: OutputConfigSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

// Infer TypeScript types from Zod schemas
export type FetchConfig = z.infer<typeof FetchConfigSchema>;
export type RunConfig = z.infer<typeof RunConfigSchema>;
export type OutputConfig = z.infer<typeof OutputConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type AppConfig = z.infer<typeof AppConfigSchema>;
export type PartialAppConfig = z.infer<typeof PartialAppConfigSchema>;

export interface ConfigError {
  path: string;
  error: unknown;
}
