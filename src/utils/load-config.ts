import { readFile } from "fs/promises";
import { join, dirname } from "path";
import { fileURLToPath } from "url";
import envPaths from "env-paths";
import type {
  ConverterConfig,
  ConfigError,
  PartialConverterConfig,
} from "../types";
import {
  ConverterConfigSchema,
  PartialConverterConfigSchema,
} from "../types";
import { fileExists } from "./file-exists";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const paths = envPaths("sheetpress", { suffix: "" });

function getConfigDirectory(): string {
  return paths.config;
}

/**
 * Load default configuration with Zod validation
 */
export async function loadDefaultConfig(): Promise<ConverterConfig> {
  const defaultConfigPath = join(__dirname, "..", "config", "default.json");
  const content = await readFile(defaultConfigPath, "utf-8");
  const parsed: unknown = JSON.parse(content);
  return ConverterConfigSchema.parse(parsed);
}

async function loadPartialConfig(
  configPath: string,
): Promise<PartialConverterConfig> {
  const content = await readFile(configPath, "utf-8");
  const parsed: unknown = JSON.parse(content);
  return PartialConverterConfigSchema.parse(parsed);
}

export function mergeConfig(
  base: ConverterConfig,
  override: PartialConverterConfig,
): ConverterConfig {
  return {
    document: { ...base.document, ...override.document },
    formats: { ...base.formats, ...override.formats },
    markdown: { ...base.markdown, ...override.markdown },
    svg: { ...base.svg, ...override.svg },
    logging: { ...base.logging, ...override.logging },
  };
}

interface LoadConfigResult {
  config: ConverterConfig;
  errors: ConfigError[];
}

/**
 * Load and merge configuration
 * Priority: custom path > user config > default config
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
  return join(getConfigDirectory(), "config.json");
}
