/**
 * Resolution of runtime values that may come from the config or the environment
 */

import type { MatchRuleSet, RepositoryRulesConfig, RepoVaultConfig } from "../types";
import { ConfigurationError } from "./validator";

/**
 * GitHub token from the config, then GITHUB_TOKEN
 */
export function resolveGitHubToken(
  config: RepoVaultConfig,
  env: NodeJS.ProcessEnv = process.env,
): string {
  const token = config.github?.token || env.GITHUB_TOKEN;
  if (!token) {
    throw new ConfigurationError(
      "GitHub token required: set github.token in the config or the GITHUB_TOKEN environment variable",
    );
  }
  return token;
}

export function resolveOrganization(config: RepoVaultConfig): string {
  if (!config.organization) {
    throw new ConfigurationError(
      "Organization required: set 'organization' in the config or pass --organization",
    );
  }
  return config.organization;
}

export function buildMatchRuleSet(repositories: RepositoryRulesConfig): MatchRuleSet {
  return {
    includePatterns: [...repositories.patterns],
    includeNames: [...repositories.names],
    excludeArchived: repositories.excludeArchived,
    excludePatterns: [...repositories.excludePatterns],
    excludeNames: [...repositories.excludeNames],
  };
}
