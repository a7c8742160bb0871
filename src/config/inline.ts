/**
 * Inline configuration parsing and merging utilities
 */

import type { RepoVaultConfig } from "../types";
import { DEFAULT_CONFIG, deepMerge } from "./defaults";
import { ConfigurationError, validateConfig } from "./validator";

/**
 * Inline configuration options that can be passed via CLI flags
 */
export interface InlineConfigOptions {
  /** Organization whose repositories are backed up */
  organization?: string;

  // S3 storage
  s3Bucket?: string;
  s3Prefix?: string;
  s3Region?: string;
  /** S3 endpoint (for S3-compatible storage) */
  s3Endpoint?: string;

  /** Enable (true) or disable (false) issue export */
  issues?: boolean;
}

/**
 * CLI option definitions for inline config (for parseArgs)
 */
export const INLINE_CONFIG_OPTIONS = {
  organization: { type: "string" },
  "s3-bucket": { type: "string" },
  "s3-prefix": { type: "string" },
  "s3-region": { type: "string" },
  "s3-endpoint": { type: "string" },
  issues: { type: "boolean" },
  "no-issues": { type: "boolean" },
} as const;

/** Parsed values of INLINE_CONFIG_OPTIONS */
export interface InlineFlagValues {
  organization?: string;
  "s3-bucket"?: string;
  "s3-prefix"?: string;
  "s3-region"?: string;
  "s3-endpoint"?: string;
  issues?: boolean;
  "no-issues"?: boolean;
}

/**
 * Extract inline config options from parsed CLI values
 */
export function extractInlineOptions(values: InlineFlagValues): InlineConfigOptions {
  const options: InlineConfigOptions = {};

  if (values.organization) options.organization = values.organization;
  if (values["s3-bucket"]) options.s3Bucket = values["s3-bucket"];
  if (values["s3-prefix"] !== undefined) options.s3Prefix = values["s3-prefix"];
  if (values["s3-region"]) options.s3Region = values["s3-region"];
  if (values["s3-endpoint"]) options.s3Endpoint = values["s3-endpoint"];

  // --no-issues wins over --issues
  if (values["no-issues"]) options.issues = false;
  else if (values.issues) options.issues = true;

  return options;
}

/**
 * Check if any inline config options were provided
 */
export function hasInlineOptions(options: InlineConfigOptions): boolean {
  return Object.values(options).some((value) => value !== undefined);
}

/**
 * Merge inline config options into an existing config
 */
export function mergeInlineConfig(
  baseConfig: RepoVaultConfig,
  options: InlineConfigOptions,
): RepoVaultConfig {
  const s3 = { ...baseConfig.s3 };
  if (options.s3Bucket) s3.bucket = options.s3Bucket;
  if (options.s3Prefix !== undefined) s3.prefix = options.s3Prefix;
  if (options.s3Region) s3.region = options.s3Region;
  if (options.s3Endpoint) s3.endpoint = options.s3Endpoint;

  const merged: RepoVaultConfig = {
    ...baseConfig,
    s3,
    metadata: {
      issues: options.issues ?? baseConfig.metadata.issues,
    },
  };
  if (options.organization) merged.organization = options.organization;

  return merged;
}

/**
 * Validation result for inline options
 */
export interface InlineValidationResult {
  valid: boolean;
  errors: string[];
}

/**
 * Check if inline options are sufficient to run without a config file.
 * Requires at minimum --organization and --s3-bucket.
 */
export function validateInlineOptionsForConfigFreeMode(
  options: InlineConfigOptions,
): InlineValidationResult {
  const errors: string[] = [];

  if (!options.organization) {
    errors.push("--organization is required when running without a config file");
  }
  if (!options.s3Bucket) {
    errors.push("--s3-bucket is required when running without a config file");
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Create a complete config from inline options only (no base config file).
 * Every repository of the organization is selected.
 */
export function createConfigFromInlineOptions(options: InlineConfigOptions): RepoVaultConfig {
  const validation = validateInlineOptionsForConfigFreeMode(options);
  if (!validation.valid) {
    throw new ConfigurationError(validation.errors.join("\n"));
  }

  const base = validateConfig(
    deepMerge(DEFAULT_CONFIG, { version: "1.0", s3: { bucket: options.s3Bucket } }),
  );
  return mergeInlineConfig(base, options);
}
