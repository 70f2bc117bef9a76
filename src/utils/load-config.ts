/**
 * Configuration Loader
 * Loads and merges configuration from defaults, user config and environment
 */

import { readFile } from "fs/promises";
import { join, dirname } from "path";
import { existsSync } from "fs";
import { fileURLToPath } from "url";
import envPaths from "env-paths";
import type {
  ConfigLoadError,
  LinkerConfig,
  PartialLinkerConfig,
  RegistryConfig,
} from "../types";
import {
  LinkerConfigSchema,
  PartialLinkerConfigSchema,
  RegistryConfigSchema,
} from "../types/config";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Get OS-specific paths using env-paths (follows XDG spec on Linux)
const paths = envPaths("zlinker", { suffix: "" });

/**
 * Get the OS-specific config directory
 * - Linux: $XDG_CONFIG_HOME/zlinker or ~/.config/zlinker
 * - macOS: ~/Library/Preferences/zlinker
 * - Windows: %APPDATA%\zlinker\Config
 */
function getConfigDirectory(): string {
  return paths.config;
}

/**
 * Load default configuration with Zod validation
 */
export async function loadDefaultConfig(): Promise<LinkerConfig> {
  const defaultConfigPath = join(__dirname, "..", "config", "default.json");
  const content = await readFile(defaultConfigPath, "utf-8");
  return LinkerConfigSchema.parse(JSON.parse(content));
}

/**
 * Load a partial config file with Zod validation
 * Throws error if config is invalid
 */
async function loadPartialConfig(
  configPath: string,
): Promise<PartialLinkerConfig> {
  const content = await readFile(configPath, "utf-8");
  return PartialLinkerConfigSchema.parse(JSON.parse(content));
}

/**
 * Deep merge a partial config over a full one
 * `apps` is replaced as a whole: the table is defined once per deployment
 */
export function mergeConfig(
  base: LinkerConfig,
  override: PartialLinkerConfig,
): LinkerConfig {
  return {
    apps: override.apps ?? base.apps,
    parser: {
      ...base.parser,
      ...override.parser,
    },
    registry: { ...base.registry, ...override.registry },
    preview: { ...base.preview, ...override.preview },
    logging: { ...base.logging, ...override.logging },
  };
}

/**
 * Registry settings from environment variables take precedence over files
 */
export function applyEnv(
  config: LinkerConfig,
  env: NodeJS.ProcessEnv,
): LinkerConfig {
  const { apiUri, apiKey } = RegistryConfigSchema.parse({
    apiUri: env.SHLINK_API_URI || undefined,
    apiKey: env.SHLINK_API_KEY || undefined,
  });

  const registry: RegistryConfig = {};
  if (apiUri !== undefined) registry.apiUri = apiUri;
  if (apiKey !== undefined) registry.apiKey = apiKey;

  return mergeConfig(config, { registry });
}

interface LoadConfigResult {
  config: LinkerConfig;
  errors: ConfigLoadError[];
}

/**
 * Load and merge configuration
 * Priority: environment > custom path > user config > default config
 * A config file that fails to load or validate is skipped and reported
 */
export async function loadConfig(
  custom?: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<LoadConfigResult> {
  let config = await loadDefaultConfig();
  const errors: ConfigLoadError[] = [];

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
      errors.push({ path: custom, error });
    }
  }

  try {
    config = applyEnv(config, env);
  } catch (error) {
    errors.push({ path: "environment", error });
  }

  return { config, errors };
}

/**
 * Get the path where user config should be stored
 */
export function getUserConfigPath(): string {
  return join(getConfigDirectory(), "config.json");
}
