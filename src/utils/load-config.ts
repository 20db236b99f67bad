/**
 * Configuration Loader
 * Loads and merges configuration from defaults and user config
 */

import { readFile } from "fs/promises";
import { join, dirname } from "path";
import { existsSync } from "fs";
import { fileURLToPath } from "url";
import envPaths from "env-paths";
import type { AppConfig, ConfigError, PartialAppConfig } from "../types";
import { AppConfigSchema, PartialAppConfigSchema } from "../types";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Get OS-specific paths using env-paths (XDG base directories on Linux)
const paths = envPaths("imgbatch", { suffix: "" });

/**
 * Get the OS-specific config directory
 * - Linux: $XDG_CONFIG_HOME/imgbatch or ~/.config/imgbatch
 * - macOS: ~/Library/Preferences/imgbatch
 * - Windows: %APPDATA%\imgbatch
 */
function getConfigDirectory(): string {
  return paths.config;
}

/**
 * Get the path where user config should be stored
 */
export function getUserConfigPath(): string {
  return join(getConfigDirectory(), "config.json");
}

export function getDefaultConfigPath(): string {
  return join(__dirname, "..", "config", "default.json");
}

/**
 * Load default configuration with Zod validation
 */
export async function loadDefaultConfig(): Promise<AppConfig> {
  const content = await readFile(getDefaultConfigPath(), "utf-8");
  return AppConfigSchema.parse(JSON.parse(content));
}

/**
 * Load a partial configuration file with Zod validation
 * Throws if the file is missing, is not JSON, or fails validation
 */
export async function loadPartialConfig(configPath: string): Promise<PartialAppConfig> {
  const content = await readFile(configPath, "utf-8");
  return PartialAppConfigSchema.parse(JSON.parse(content));
}

/**
 * Merge section by section; keys set in `override` win
 */
export function mergeConfig(base: AppConfig, override: PartialAppConfig): AppConfig {
  return {
    fetch: { ...base.fetch, ...override.fetch },
    run: { ...base.run, ...override.run },
    output: { ...base.output, ...override.output },
    logging: { ...base.logging, ...override.logging },
  };
}

interface LoadConfigResult {
  config: AppConfig;
  errors: ConfigError[];
}

export interface LoadConfigOptions {
  /** Path of an extra config file that overrides everything else */
  custom?: string;
  /** Defaults to the OS-specific user config path */
  userConfigPath?: string;
}

/**
 * Load and merge configuration
 * Priority: custom path > user config > default config
 * A config file that fails to load or validate is reported in `errors` and
 * left out of the merge
 */
export async function loadConfig(
  options: LoadConfigOptions = {},
): Promise<LoadConfigResult> {
  let config = await loadDefaultConfig();
  const errors: ConfigError[] = [];

  const userConfigPath = options.userConfigPath ?? getUserConfigPath();
  if (existsSync(userConfigPath)) {
    try {
      config = mergeConfig(config, await loadPartialConfig(userConfigPath));
    } catch (error) {
      errors.push({ path: userConfigPath, error });
    }
  }

  if (options.custom) {
    try {
      config = mergeConfig(config, await loadPartialConfig(options.custom));
    } catch (error) {
      errors.push({ path: options.custom, error });
    }
  }

  return { config, errors };
}
