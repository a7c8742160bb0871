/**
 * Configuration file loading
 */

import { existsSync, statSync } from "node:fs";
import { readFile } from "node:fs/promises";
import * as path from "node:path";
import * as yaml from "js-yaml";
import { errorMessage } from "../errors";
import type { RepoVaultConfig } from "../types";
import { DEFAULT_CONFIG, deepMerge, isRecord } from "./defaults";
import { ConfigurationError, validateConfig } from "./validator";

export { ConfigurationError } from "./validator";

const CONFIG_FILE_NAMES = [
  "repo-vault.config.yaml",
  "repo-vault.config.yml",
  "repo-vault.config.json",
];

/**
 * Load and parse a config file
 */
export async function loadConfig(configPath: string): Promise<RepoVaultConfig> {
  const absolutePath = path.resolve(configPath);

  if (!existsSync(absolutePath)) {
    throw new ConfigurationError(`Config file not found: ${absolutePath}`);
  }

  const content = await readFile(absolutePath, "utf-8");
  const ext = path.extname(absolutePath).toLowerCase();

  // Parse file content
  const parsed = parseConfigContent(content, ext);
  if (!isRecord(parsed)) {
    throw new ConfigurationError(`Config file must contain an object: ${absolutePath}`);
  }

  // Merge with defaults, then validate
  return validateConfig(deepMerge(DEFAULT_CONFIG, parsed));
}

function parseConfigContent(content: string, ext: string): unknown {
  if (ext === ".yaml" || ext === ".yml") {
    try {
      return yaml.load(content);
    } catch (e) {
      throw new ConfigurationError(`Failed to parse YAML: ${errorMessage(e)}`);
    }
  }

  if (ext === ".json") {
    try {
      return JSON.parse(content);
    } catch (e) {
      throw new ConfigurationError(`Failed to parse JSON: ${errorMessage(e)}`);
    }
  }

  throw new ConfigurationError(`Unsupported config file format: ${ext}. Use .yaml, .yml, or .json`);
}

/**
 * Find a config file in the given directory
 */
export function findConfigFile(startDir: string = process.cwd()): string | null {
  for (const name of CONFIG_FILE_NAMES) {
    const configPath = path.join(startDir, name);
    if (existsSync(configPath) && statSync(configPath).size > 0) {
      return configPath;
    }
  }

  return null;
}

/**
 * Find and load a config file
 */
export async function findAndLoadConfig(
  configPath?: string,
  startDir?: string,
): Promise<RepoVaultConfig> {
  if (configPath) {
    return loadConfig(configPath);
  }

  const found = findConfigFile(startDir);
  if (!found) {
    throw new ConfigurationError(
      "No config file found. Create repo-vault.config.yaml or specify --config path",
    );
  }

  return loadConfig(found);
}
