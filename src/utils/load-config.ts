import { readFile } from "fs/promises";
import { join, dirname } from "path";
import { existsSync } from "fs";
import { fileURLToPath } from "url";
import envPaths from "env-paths";
import type { HarvestConfig, PartialHarvestConfig, ConfigIssue } from "../types";
import {
  HarvestConfigSchema,
  PartialHarvestConfigSchema,
} from "../types";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const paths = envPaths("pexels-harvest", { suffix: "" });

/**
 * Load default configuration with Zod validation
 */
export async function loadDefaultConfig(): Promise<HarvestConfig> {
  const defaultConfigPath = join(__dirname, "..", "config", "default.json");
  const content = await readFile(defaultConfigPath, "utf-8");
  return HarvestConfigSchema.parse(JSON.parse(content));
}

async function loadPartialConfig(
  configPath: string,
): Promise<PartialHarvestConfig> {
  const content = await readFile(configPath, "utf-8");
  return PartialHarvestConfigSchema.parse(JSON.parse(content));
}

async function loadUserConfig(): Promise<PartialHarvestConfig | null> {
  const userConfigPath = getUserConfigPath();

  if (!existsSync(userConfigPath)) {
    return null;
  }

  return loadPartialConfig(userConfigPath);
}

export function mergeConfig(
  base: HarvestConfig,
  override: PartialHarvestConfig,
): HarvestConfig {
  return {
    api: { ...base.api, ...override.api },
    output: { ...base.output, ...override.output },
    search: { ...base.search, ...override.search },
    logging: { ...base.logging, ...override.logging },
  };
}

interface LoadConfigResult {
  config: HarvestConfig;
  errors: ConfigIssue[];
}

/**
 * Load and merge configuration
 * Priority: custom path > user config > default config
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
 * Get the path where user config should be stored
 */
export function getUserConfigPath(): string {
  return join(paths.config, "config.json");
}
