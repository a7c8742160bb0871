/**
 * Config resolution and collaborator wiring shared by the commands
 */

import {
  buildMatchRuleSet,
  createConfigFromInlineOptions,
  findAndLoadConfig,
  findConfigFile,
  hasInlineOptions,
  type InlineConfigOptions,
  mergeInlineConfig,
  resolveGitHubToken,
  validateInlineOptionsForConfigFreeMode,
} from "../config";
import { GitMirrorArchiveProducer } from "../core/backup";
import { RepoMatcher } from "../core/matcher";
import { GitHubHostingGateway } from "../hosting";
import { S3StorageGateway } from "../storage";
import type { RepoVaultConfig } from "../types";
import type { Logger } from "../utils/logger";

export type ConfigResolution =
  | { ok: true; config: RepoVaultConfig; source: string }
  | { ok: false; errors: string[] };

/**
 * Load the config file (explicit or discovered) and apply inline overrides.
 * Without any file, inline options alone must name the organization and bucket.
 */
export async function resolveRuntimeConfig(
  configPath: string | undefined,
  inline: InlineConfigOptions,
  cwd: string = process.cwd(),
): Promise<ConfigResolution> {
  const found = configPath ?? findConfigFile(cwd);

  if (!found) {
    const validation = validateInlineOptionsForConfigFreeMode(inline);
    if (!validation.valid) {
      return { ok: false, errors: validation.errors };
    }
    return { ok: true, config: createConfigFromInlineOptions(inline), source: "inline options" };
  }

  const config = await findAndLoadConfig(found);
  return {
    ok: true,
    config: hasInlineOptions(inline) ? mergeInlineConfig(config, inline) : config,
    source: found,
  };
}

export interface Collaborators {
  hosting: GitHubHostingGateway;
  matcher: RepoMatcher;
  storage: S3StorageGateway;
  archiver: GitMirrorArchiveProducer;
}

/**
 * Build the real gateways. Rule compilation and token lookup happen here, so a
 * configuration problem surfaces before any network call.
 */
export function createCollaborators(
  config: RepoVaultConfig,
  log: Logger,
  env: NodeJS.ProcessEnv = process.env,
): Collaborators {
  const matcher = new RepoMatcher(buildMatchRuleSet(config.repositories));
  const token = resolveGitHubToken(config, env);

  return {
    hosting: new GitHubHostingGateway(token, { log: log.child("github") }),
    matcher,
    storage: new S3StorageGateway(config.s3, undefined, log.child("s3")),
    archiver: new GitMirrorArchiveProducer({ token, log: log.child("git") }),
  };
}
