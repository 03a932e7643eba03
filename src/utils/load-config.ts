/**
 * Configuration Loader
 * Loads and merges configuration from defaults, user config, and a custom file
 */

import { readFile } from "fs/promises";
import { join, dirname } from "path";
import { existsSync } from "fs";
import { fileURLToPath } from "url";
import envPaths from "env-paths";
import type {
  MigrationConfig,
  PartialMigrationConfig,
  ConfigIssue,
} from "../types";
import {
  MigrationConfigSchema,
  PartialMigrationConfigSchema,
} from "../types";
import { ConfigError } from "./errors";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Get OS-specific paths using env-paths (follows XDG spec on Linux)
const paths = envPaths("mealie-migrate", { suffix: "" });

/**
 * Get the OS-specific config directory
 * - Linux: $XDG_CONFIG_HOME/mealie-migrate or ~/.config/mealie-migrate
 * - macOS: ~/Library/Preferences/mealie-migrate
 * - Windows: %APPDATA%\mealie-migrate
 */
function getConfigDirectory(): string {
  return paths.config;
}

/**
 * Load default configuration with Zod validation
 */
export async function loadDefaultConfig(): Promise<MigrationConfig> {
  const defaultConfigPath = join(__dirname, "..", "config", "default.json");
  const content = await readFile(defaultConfigPath, "utf-8");
  return MigrationConfigSchema.parse(JSON.parse(content));
}

/**
 * Read and validate a partial config file
 * Throws if the file is not JSON or does not match the schema
 */
async function loadPartialConfig(configPath: string): Promise<PartialMigrationConfig> {
  const content = await readFile(configPath, "utf-8");
  return PartialMigrationConfigSchema.parse(JSON.parse(content));
}

async function loadUserConfig(): Promise<PartialMigrationConfig | null> {
  const userConfigPath = getUserConfigPath();

  if (!existsSync(userConfigPath)) {
    return null;
  }

  return loadPartialConfig(userConfigPath);
}

/**
 * Deep merge a partial config over a complete one
 */
export function mergeConfig(
  base: MigrationConfig,
  override: PartialMigrationConfig,
): MigrationConfig {
  return {
    source: override.source ?? base.source,
    target: { ...base.target, ...override.target },
    migration: { ...base.migration, ...override.migration },
    http: { ...base.http, ...override.http },
    logging: { ...base.logging, ...override.logging },
  };
}

interface LoadConfigResult {
  config: MigrationConfig;
  errors: ConfigIssue[];
}

/**
 * Load and merge configuration
 * Priority: custom path > user config > default config
 * A file that fails to load or validate is reported and left out of the merge
 */
export async function loadConfig(custom?: string): Promise<LoadConfigResult> {
  let config = await loadDefaultConfig();
  const errors: ConfigIssue[] = [];

  try {
    const userConfig = await loadUserConfig();
    if (userConfig) config = mergeConfig(config, userConfig);
  } catch (error) {
    errors.push({ path: getUserConfigPath(), error });
  }

  if (custom) {
    try {
      const customConfig = await loadPartialConfig(custom);
      config = mergeConfig(config, customConfig);
    } catch (error) {
      errors.push({ path: custom, error });
    }
  }

  return { config, errors };
}

/**
 * Check that a run has a source and, when live, somewhere to write to
 * Dry runs never contact the target, so they need neither target value
 */
export function assertRunnable(config: MigrationConfig): void {
  const missing: string[] = [];
  if (!config.source) missing.push("source (<export>)");
  if (!config.migration.dryRun) {
    if (!config.target.url) missing.push("target.url (--url)");
    if (!config.target.token) missing.push("target.token (--token)");
  }

  if (missing.length > 0) {
    throw new ConfigError(
      `Missing required configuration: ${missing.join(", ")}`,
      missing,
    );
  }
}

/**
 * Get the path where user config should be stored
 */
export function getUserConfigPath(): string {
  return join(getConfigDirectory(), "config.json");
}
