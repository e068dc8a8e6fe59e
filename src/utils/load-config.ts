import { readFile } from "fs/promises";
import { join, dirname } from "path";
import { fileURLToPath } from "url";
import envPaths from "env-paths";
import { fileExists } from "./file-exists";
import type {
  DownloaderConfig,
  PartialDownloaderConfig,
} from "../types";
import {
  DownloaderConfigSchema,
  PartialDownloaderConfigSchema,
} from "../types";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Get OS-specific paths using env-paths (follows XDG spec on Linux)
const paths = envPaths("reddit-image-dl", { suffix: "" });

export interface ConfigError {
  path: string;
  error: unknown;
}

/**
 * Load default configuration with Zod validation
 */
export async function loadDefaultConfig(): Promise<DownloaderConfig> {
  const defaultConfigPath = join(__dirname, "..", "config", "default.json");
  const content = await readFile(defaultConfigPath, "utf-8");
  return DownloaderConfigSchema.parse(JSON.parse(content));
}

async function loadPartialConfig(
  configPath: string,
): Promise<PartialDownloaderConfig> {
  const content = await readFile(configPath, "utf-8");
  return PartialDownloaderConfigSchema.parse(JSON.parse(content));
}

export function mergeConfig(
  base: DownloaderConfig,
  override: PartialDownloaderConfig,
): DownloaderConfig {
  return {
    feed: { ...base.feed, ...override.feed },
    http: { ...base.http, ...override.http },
    imageHost: { ...base.imageHost, ...override.imageHost },
    logging: { ...base.logging, ...override.logging },
  };
}

interface LoadConfigResult {
  config: DownloaderConfig;
  errors: ConfigError[];
}

/**
 * Load and merge configuration
 * Priority: custom path > user config > default config
 * A user or custom file that fails to load is reported and skipped
 */
export async function loadConfig(custom?: string): Promise<LoadConfigResult> {
  let config = await loadDefaultConfig();
  const errors: ConfigError[] = [];

  const userConfigPath = getUserConfigPath();
  if (await fileExists(userConfigPath)) {
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

  return { config, errors };
}

/**
 * Get the path where user config should be stored
 */
export function getUserConfigPath(): string {
  return join(paths.config, "config.json");
}
