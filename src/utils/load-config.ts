/**
 * Configuration Loader
 * Loads and merges configuration from defaults, user config and the
 * config file named on the command line
 */

import { readFile } from "fs/promises";
import { join, dirname, isAbsolute, resolve } from "path";
import { fileURLToPath } from "url";
import envPaths from "env-paths";
import type {
  ConfigError,
  ConversionConfig,
  PartialConversionConfig,
} from "../types";
import {
  ConversionConfigSchema,
  PartialConversionConfigSchema,
} from "../types";
import { fileExists } from "./fs";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Get OS-specific paths using env-paths (follows XDG spec on Linux)
const paths = envPaths("wikitree-export", { suffix: "" });

/**
 * Get the OS-specific config directory
 * - Linux: $XDG_CONFIG_HOME/wikitree-export or ~/.config/wikitree-export
 * - macOS: ~/Library/Preferences/wikitree-export
 * - Windows: %APPDATA%\wikitree-export
 */
function getConfigDirectory(): string {
  return paths.config;
}

/**
 * Load default configuration with Zod validation
 */
export async function loadDefaultConfig(): Promise<ConversionConfig> {
  const defaultConfigPath = join(__dirname, "..", "config", "default.json");
  const content = await readFile(defaultConfigPath, "utf-8");
  const parsed: unknown = JSON.parse(content);
  return ConversionConfigSchema.parse(parsed);
}

/**
 * Load a partial configuration file with Zod validation
 * Throws error if config is invalid
 */
async function loadPartialConfig(
  configPath: string,
): Promise<PartialConversionConfig> {
  const content = await readFile(configPath, "utf-8");
  const parsed: unknown = JSON.parse(content);
  return PartialConversionConfigSchema.parse(parsed);
}

/**
 * Load user configuration from OS-specific directory
 */
async function loadUserConfig(): Promise<PartialConversionConfig | null> {
  const userConfigPath = getUserConfigPath();

  if (!(await fileExists(userConfigPath))) {
    return null;
  }

  return loadPartialConfig(userConfigPath);
}

/**
 * Load the configuration file describing one wiki
 * Relative directories in it are taken relative to the file itself.
 */
async function loadCustomConfig(
  configPath: string,
): Promise<PartialConversionConfig> {
  const config = await loadPartialConfig(configPath);
  const base = dirname(resolve(configPath));

  const directory = config.wiki?.directory;
  if (directory !== undefined && !isAbsolute(directory)) {
    return { ...config, wiki: { ...config.wiki, directory: join(base, directory) } };
  }
  return config;
}

/**
 * Deep merge two objects
 */
export function mergeConfig(
  base: ConversionConfig,
  override: PartialConversionConfig,
): ConversionConfig {
  return {
    wiki: { ...base.wiki, ...override.wiki },
    output: { ...base.output, ...override.output },
    links: { ...base.links, ...override.links },
    markdown: { ...base.markdown, ...override.markdown },
    logging: { ...base.logging, ...override.logging },
  };
}

interface LoadConfigResult {
  config: ConversionConfig;
  errors: ConfigError[];
}

/**
 * Load and merge configuration
 * Priority: custom path > user config > default config
 * A user or custom file that fails to load or validate is skipped and reported
 */
export async function loadConfig(custom?: string): Promise<LoadConfigResult> {
  // Load default config
  let config = await loadDefaultConfig();
  const errors: ConfigError[] = [];

  try {
    // Merge with user config from OS-specific directory
    const userConfig = await loadUserConfig();
    if (userConfig) config = mergeConfig(config, userConfig);
  } catch (error) {
    errors.push({ path: getUserConfigPath(), error });
  }

  // Merge with custom config if provided
  if (custom) {
    try {
      const customConfig = await loadCustomConfig(custom);
      config = mergeConfig(config, customConfig);
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
