/**
 * Configuration type definitions for repo-vault
 */

/** Repository selection rules as written in the config file */
export interface RepositoryRulesConfig {
  /** Regex patterns; a repository is included when any pattern is found in its name */
  patterns: string[];
  /** Exact repository names to include */
  names: string[];
  excludeArchived: boolean;
  excludePatterns: string[];
  excludeNames: string[];
}

export interface S3StorageConfig {
  bucket: string;
  prefix?: string;
  region?: string;
  /** S3-compatible endpoint (MinIO, R2, ...) */
  endpoint?: string;
  accessKeyId?: string;
  secretAccessKey?: string;
}

export interface MetadataConfig {
  /** Export issues and their comments next to each archive */
  issues: boolean;
}

export interface GitHubConfig {
  /** Falls back to GITHUB_TOKEN */
  token?: string;
}

export interface RepoVaultConfig {
  version: string;
  organization?: string;
  repositories: RepositoryRulesConfig;
  s3: S3StorageConfig;
  metadata: MetadataConfig;
  github?: GitHubConfig;
}
