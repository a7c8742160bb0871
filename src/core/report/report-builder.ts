/**
 * Backup catalog reporting
 */

import type {
  BackupReport,
  HostingGateway,
  RepositoryBackupStats,
  RepositoryDescriptor,
  StorageGateway,
  StoredObject,
} from "../../types";
import { type Logger, logger } from "../../utils/logger";
import { parseBackupObjectName } from "../../utils/naming";
import type { RepoMatcher } from "../matcher";

export interface RepositoryListing {
  repository: string;
  objects: StoredObject[];
}

export interface ReportDeps {
  hosting: HostingGateway;
  matcher: RepoMatcher;
  storage: StorageGateway;
  log?: Logger;
  now?: () => Date;
}

/**
 * Pure aggregation over storage listings, kept in listing order.
 * Repositories without any stored object count towards the total only.
 */
export function aggregateBackupReport(
  organization: string,
  listings: readonly RepositoryListing[],
  generatedAt: Date,
): BackupReport {
  const repositories: RepositoryBackupStats[] = [];
  let totalBytes = 0;

  for (const { repository, objects } of listings) {
    if (objects.length === 0) continue;

    let backupCount = 0;
    let issueExportCount = 0;
    let repositoryBytes = 0;
    let latest = objects[0]?.lastModified ?? new Date(0);

    for (const object of objects) {
      repositoryBytes += object.size;
      if (object.lastModified > latest) latest = object.lastModified;

      const parsed = parseBackupObjectName(object.key);
      if (parsed?.kind === "archive") backupCount++;
      else if (parsed?.kind === "issues") issueExportCount++;
    }

    totalBytes += repositoryBytes;
    repositories.push({
      name: repository,
      backupCount,
      issueExportCount,
      totalBytes: repositoryBytes,
      latestBackup: latest.toISOString(),
    });
  }

  return {
    organization,
    generatedAt: generatedAt.toISOString(),
    totalRepositories: listings.length,
    repositoriesWithBackups: repositories.length,
    totalBytes,
    repositories,
  };
}

export async function collectListings(
  repositories: readonly RepositoryDescriptor[],
  storage: StorageGateway,
): Promise<RepositoryListing[]> {
  const listings: RepositoryListing[] = [];
  for (const repository of repositories) {
    listings.push({
      repository: repository.name,
      objects: await storage.listBackups(repository.name),
    });
  }
  return listings;
}

export interface GeneratedReport {
  report: BackupReport;
  listings: RepositoryListing[];
}

/**
 * List the organization, apply the match rules and summarise what storage
 * holds for every selected repository.
 */
export async function generateBackupReport(
  deps: ReportDeps,
  organization: string,
): Promise<GeneratedReport> {
  const log = deps.log ?? logger;
  const now = deps.now ?? (() => new Date());

  const repositories = deps.matcher.select(await deps.hosting.listRepositories(organization));
  log.info(`Collecting backup listings for ${repositories.length} repositories`);

  const listings = await collectListings(repositories, deps.storage);
  const report = aggregateBackupReport(organization, listings, now());

  log.debug(
    `Report: ${report.repositoriesWithBackups}/${report.totalRepositories} repositories with backups, ${report.totalBytes} bytes`,
  );

  return { report, listings };
}
