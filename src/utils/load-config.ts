/**
 * Configuration Loader
 * Loads and merges configuration from defaults and user config
 */

import { readFile } from "fs/promises";
import { join, dirname } from "path";
import { existsSync } from "fs";
import { fileURLToPath } from "url";
import envPaths from "env-paths";
import type { AppConfig, PartialAppConfig } from "../types";
import { AppConfigSchema, PartialAppConfigSchema } from "../types";
import { errorMessage, isErrnoException } from "./errors";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Get OS-specific paths using env-paths (follows XDG spec on Linux)
const paths = envPaths("morphmv", { suffix: "" });

/**
 * Get the OS-specific config directory
 * - Linux: $XDG_CONFIG_HOME/morphmv or ~/.config/morphmv
 * - macOS: ~/Library/Preferences/morphmv
 * - Windows: %APPDATA%\morphmv\Config
 */
function getConfigDirectory(): string {
  return paths.config;
}

export interface ConfigError {
  path: string;
  error: unknown;
}

/**
 * Load default configuration with Zod validation
 */
export async function loadDefaultConfig(): Promise<AppConfig> {
  const defaultConfigPath = join(__dirname, "..", "config", "default.json");
  const content = await readFile(defaultConfigPath, "utf-8");
  return AppConfigSchema.parse(JSON.parse(content));
}

/**
 * Load a partial configuration file with Zod validation
 * Throws error if config is unreadable or invalid
 */
async function loadPartialConfig(configPath: string): Promise<PartialAppConfig> {
  const content = await readFile(configPath, "utf-8");
  return PartialAppConfigSchema.parse(JSON.parse(content));
}

/**
 * Deep merge two configs, one section at a time
 */
export function mergeConfig(base: AppConfig, override: PartialAppConfig): AppConfig {
  return {
    defaults: { ...base.defaults, ...override.defaults },
    profiles: { ...base.profiles, ...override.profiles },
    tools: { ...base.tools, ...override.tools },
    progress: { ...base.progress, ...override.progress },
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
 * A broken user config is skipped and reported in `errors`; a custom path the
 * caller asked for must load, so its failures are thrown
 */
export async function loadConfig(custom?: string): Promise<LoadConfigResult> {
  let config = await loadDefaultConfig();
  const errors: ConfigError[] = [];

  const userConfigPath = getUserConfigPath();
  if (existsSync(userConfigPath)) {
    try {
      config = mergeConfig(config, await loadPartialConfig(userConfigPath));
    } catch (error) {
      errors.push({ path: userConfigPath, error });
    }
  }

  if (custom) {
    try {
      config = mergeConfig(config, await loadPartialConfig(custom));
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        throw new Error(`config file not found: ${custom}`, { cause: error });
      }
      throw new Error(`invalid config file ${custom}: ${errorMessage(error)}`, { cause: error });
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
