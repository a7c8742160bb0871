/**
 * Configuration validation
 *
 * Turns the loosely typed file content into a RepoVaultConfig. Every problem
 * is a ConfigurationError, raised before anything touches the network.
 */

import { ConfigurationError, errorMessage } from "../errors";
import type {
  GitHubConfig,
  MetadataConfig,
  RepositoryRulesConfig,
  RepoVaultConfig,
  S3StorageConfig,
} from "../types";
import { isRecord } from "./defaults";

export { ConfigurationError } from "../errors";

function section(c: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = c[key];
  if (!isRecord(value)) {
    throw new ConfigurationError(`Config must have a '${key}' section`);
  }
  return value;
}

function optionalString(
  record: Record<string, unknown>,
  key: string,
  path: string,
): string | undefined {
  const value = record[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") {
    throw new ConfigurationError(`${path}.${key} must be a string`);
  }
  return value;
}

function requiredString(record: Record<string, unknown>, key: string, path: string): string {
  const value = optionalString(record, key, path);
  if (!value) {
    throw new ConfigurationError(`${path}.${key} must be a non-empty string`);
  }
  return value;
}

function booleanField(record: Record<string, unknown>, key: string, path: string): boolean {
  const value = record[key];
  if (typeof value !== "boolean") {
    throw new ConfigurationError(`${path}.${key} must be a boolean`);
  }
  return value;
}

function stringList(record: Record<string, unknown>, key: string, path: string): string[] {
  const value = record[key];
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    throw new ConfigurationError(`${path}.${key} must be an array of strings`);
  }

  const list: string[] = [];
  value.forEach((item: unknown, index) => {
    if (typeof item !== "string") {
      throw new ConfigurationError(`${path}.${key}[${index}] must be a string`);
    }
    list.push(item);
  });
  return list;
}

function patternList(record: Record<string, unknown>, key: string, path: string): string[] {
  const patterns = stringList(record, key, path);
  patterns.forEach((pattern, index) => {
    try {
      new RegExp(pattern);
    } catch (error) {
      throw new ConfigurationError(
        `${path}.${key}[${index}] is not a valid regex: "${pattern}" (${errorMessage(error)})`,
      );
    }
  });
  return patterns;
}

const validators = {
  version: (c: Record<string, unknown>): string => {
    if (!c.version || typeof c.version !== "string") {
      throw new ConfigurationError("Config must have a 'version' field");
    }
    return c.version;
  },

  organization: (c: Record<string, unknown>): string | undefined =>
    optionalString(c, "organization", "config"),

  repositories: (c: Record<string, unknown>): RepositoryRulesConfig => {
    const repos = section(c, "repositories");
    return {
      patterns: patternList(repos, "patterns", "repositories"),
      names: stringList(repos, "names", "repositories"),
      excludeArchived: booleanField(repos, "excludeArchived", "repositories"),
      excludePatterns: patternList(repos, "excludePatterns", "repositories"),
      excludeNames: stringList(repos, "excludeNames", "repositories"),
    };
  },

  s3: (c: Record<string, unknown>): S3StorageConfig => {
    const s3 = section(c, "s3");
    const config: S3StorageConfig = { bucket: requiredString(s3, "bucket", "s3") };

    const prefix = optionalString(s3, "prefix", "s3");
    const region = optionalString(s3, "region", "s3");
    const endpoint = optionalString(s3, "endpoint", "s3");
    const accessKeyId = optionalString(s3, "accessKeyId", "s3");
    const secretAccessKey = optionalString(s3, "secretAccessKey", "s3");

    if (prefix !== undefined) config.prefix = prefix;
    if (region) config.region = region;
    if (endpoint) config.endpoint = endpoint;
    if (accessKeyId) config.accessKeyId = accessKeyId;
    if (secretAccessKey) config.secretAccessKey = secretAccessKey;
    return config;
  },

  metadata: (c: Record<string, unknown>): MetadataConfig => ({
    issues: booleanField(section(c, "metadata"), "issues", "metadata"),
  }),

  github: (c: Record<string, unknown>): GitHubConfig | undefined => {
    if (c.github === undefined || c.github === null) return undefined;
    const token = optionalString(section(c, "github"), "token", "github");
    return token ? { token } : {};
  },
};

/**
 * Validate a configuration object (defaults already merged)
 */
export function validateConfig(config: unknown): RepoVaultConfig {
  if (!isRecord(config)) {
    throw new ConfigurationError("Config must be an object");
  }

  const validated: RepoVaultConfig = {
    version: validators.version(config),
    repositories: validators.repositories(config),
    s3: validators.s3(config),
    metadata: validators.metadata(config),
  };

  const organization = validators.organization(config);
  if (organization) validated.organization = organization;

  const github = validators.github(config);
  if (github) validated.github = github;

  return validated;
}
