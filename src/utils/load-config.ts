/**
 * Configuration Loader
 * Loads and merges configuration from defaults and user config
 */

import { readFile } from "fs/promises";
import { join } from "path";
import { fileURLToPath } from "url";
import envPaths from "env-paths";
import { fileExists } from "./file-exists";
import {
  AppConfigSchema,
  PartialAppConfigSchema,
  type AppConfig,
  type ConfigError,
  type PartialAppConfig,
} from "../types";

// Get OS-specific paths using env-paths (follows XDG spec on Linux)
const paths = envPaths("docdrop", { suffix: "" });

const defaultConfigPath = fileURLToPath(
  new URL("../config/default.json", import.meta.url),
);

/**
 * Get the OS-specific config directory
 * - Linux: $XDG_CONFIG_HOME/docdrop or ~/.config/docdrop
 * - macOS: ~/Library/Preferences/docdrop
 * - Windows: %APPDATA%\docdrop
 */
function getConfigDirectory(): string {
  return paths.config;
}

/**
 * Load default configuration with Zod validation
 */
export async function loadDefaultConfig(): Promise<AppConfig> {
  const content = await readFile(defaultConfigPath, "utf-8");
  return AppConfigSchema.parse(JSON.parse(content));
}

/**
 * Load a partial configuration file with Zod validation
 * Throws if the file is unreadable, not JSON, or fails the schema
 */
async function loadPartialConfig(configPath: string): Promise<PartialAppConfig> {
  const content = await readFile(configPath, "utf-8");
  return PartialAppConfigSchema.parse(JSON.parse(content));
}

/**
 * Deep merge two configs, `override` wins
 */
export function mergeConfig(
  base: AppConfig,
  override: PartialAppConfig,
): AppConfig {
  return {
    ...base,
    ...override,
    delivery: { ...base.delivery, ...override.delivery },
    ocr: { ...base.ocr, ...override.ocr },
    pdf: { ...base.pdf, ...override.pdf },
    markdown: { ...base.markdown, ...override.markdown },
    dates: { ...base.dates, ...override.dates },
    categorization: { ...base.categorization, ...override.categorization },
    logging: { ...base.logging, ...override.logging },
  };
}

interface LoadConfigResult {
  config: AppConfig;
  errors: ConfigError[];
}

/**
 * Load and merge configuration
 * Priority: custom path > user config > default config
 * Layers that fail to load or validate are skipped and reported in `errors`
 */
export async function loadConfig(custom?: string): Promise<LoadConfigResult> {
  let config = await loadDefaultConfig();
  const errors: ConfigError[] = [];

  const userConfigPath = getUserConfigPath();
  try {
    if (await fileExists(userConfigPath)) {
      config = mergeConfig(config, await loadPartialConfig(userConfigPath));
    }
  } catch (error) {
    errors.push({ path: userConfigPath, error });
  }

  if (custom) {
    try {
      config = mergeConfig(config, await loadPartialConfig(custom));
    } catch (error) {
      errors.push({ path: custom, error });
    }
  }

  return { config, errors };
}

/**
 * Get the path where user config should be stored
 */
export function getUserConfigPath(): string {
  return join(getConfigDirectory(), "config.json");
}
