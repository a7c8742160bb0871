/**
 * Backup orchestration
 *
 * One cycle lists the organization, applies the match rules and then walks
 * every selected repository through:
 *
 *   ExistsCheck -> Skipped
 *               -> Archiving -> Uploading/Verifying -> (IssuesExporting) -> Success
 *   any stage   -> Failed
 *
 * Repositories are processed one at a time. Nothing raised for one repository
 * stops the cycle; only the initial listing may throw.
 */

import { classifyError, type ErrorKind, toRepoVaultError } from "../../errors";
import type {
  ArchiveProducer,
  BackupRecord,
  CycleResult,
  CycleTotals,
  HostingGateway,
  IssueExportOutcome,
  IssueExportTotals,
  RepositoryDescriptor,
  StorageGateway,
} from "../../types";
import { formatBytes, formatDuration } from "../../utils/format";
import { type Logger, logger } from "../../utils/logger";
import { backupObjectKey, formatBackupDate, issuesObjectKey } from "../../utils/naming";
import { type WorkspaceRunner, withWorkspace } from "../../utils/workspace";
import { formatColumns, type RepoMatcher, type SelectionExplanation } from "../matcher";
import { IssuesExporter, serializeIssueExport } from "./issues-exporter";

export interface BackupCycleDeps {
  hosting: HostingGateway;
  matcher: RepoMatcher;
  archiver: ArchiveProducer;
  storage: StorageGateway;
  log?: Logger;
  /** Clock; the cycle's calendar day is taken once, at start */
  now?: () => Date;
  workspace?: WorkspaceRunner;
}

export interface BackupCycleOptions {
  organization: string;
  /** Back up even when today's archive already exists */
  force?: boolean;
  /** Report what would be done without cloning or writing */
  dryRun?: boolean;
  /** Export issues next to each archive */
  exportIssues?: boolean;
}

interface CycleContext {
  archiver: ArchiveProducer;
  storage: StorageGateway;
  issues: IssuesExporter | null;
  workspace: WorkspaceRunner;
  startedAt: Date;
  force: boolean;
  dryRun: boolean;
}

/**
 * Run `fn`, converting anything it throws that has no kind into `kind`.
 */
async function stage<T>(kind: ErrorKind, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    throw toRepoVaultError(error, kind);
  }
}

export async function runBackupCycle(
  deps: BackupCycleDeps,
  options: BackupCycleOptions,
): Promise<CycleResult> {
  const log = deps.log ?? logger;
  const now = deps.now ?? (() => new Date());
  const startedAt = now();
  const dryRun = options.dryRun ?? false;
  const force = options.force ?? false;

  if (dryRun) {
    log.info("[DRY RUN] No archives will be created or uploaded");
  }
  log.info(`Starting backup for organization: ${options.organization}`);

  const repositories = await deps.hosting.listRepositories(options.organization);
  const selection = deps.matcher.explain(repositories);
  logSelection(log, repositories.length, selection);

  const context: CycleContext = {
    archiver: deps.archiver,
    storage: deps.storage,
    issues: options.exportIssues ? new IssuesExporter(deps.hosting, { log, now }) : null,
    workspace: deps.workspace ?? withWorkspace,
    startedAt,
    force,
    dryRun,
  };

  const records: BackupRecord[] = [];
  for (const repository of selection.selected) {
    records.push(await backupRepository(repository, context, log.child(repository.name)));
  }

  const result: CycleResult = {
    organization: options.organization,
    startedAt: startedAt.toISOString(),
    backupDate: formatBackupDate(startedAt),
    dryRun,
    force,
    records,
    totals: countRecords(records),
    issueTotals: context.issues ? countIssueExports(records) : null,
    durationMs: now().getTime() - startedAt.getTime(),
  };

  const { totals } = result;
  if (dryRun) {
    log.info(
      `DRY RUN complete: ${totals.wouldBackup} would be backed up, ${totals.skipped - totals.wouldBackup} already exist`,
    );
  } else {
    log.info(
      `Backup complete in ${formatDuration(result.durationMs)}: ${totals.successful} successful, ${totals.failed} failed, ${totals.skipped} skipped`,
    );
  }

  return result;
}

function logSelection(
  log: Logger,
  listed: number,
  selection: SelectionExplanation,
): void {
  if (selection.archived.length > 0) {
    log.info(`Excluding ${selection.archived.length} archived repositories`);
  }
  log.info(`Matched ${selection.selected.length + selection.excluded.length} repositories out of ${listed} total`);
  if (selection.excluded.length > 0) {
    log.info(`Excluded ${selection.excluded.length} repositories by exclude rules:`);
    for (const row of formatColumns([...selection.excluded].sort())) {
      log.info(row);
    }
  }
  if (selection.notFound.length > 0) {
    log.warn(
      `Configured repositories not found (may be private or misspelled): ${selection.notFound.join(", ")}`,
    );
  }
  for (const repository of selection.selected) {
    log.debug(`Selected repository: ${repository.fullName}`);
  }
}

async function backupRepository(
  repository: RepositoryDescriptor,
  context: CycleContext,
  log: Logger,
): Promise<BackupRecord> {
  const { storage, startedAt } = context;
  const storageKey = backupObjectKey(repository.name, startedAt);
  const base = {
    repository: repository.name,
    fullName: repository.fullName,
    backupDate: formatBackupDate(startedAt),
    storageKey,
  };

  log.info(`Processing repository: ${repository.fullName}`);

  let exists = false;
  if (!context.force) {
    try {
      exists = await storage.backupExists(repository.name, startedAt);
    } catch (error) {
      const failure = classifyError(error, "StorageError");
      log.error(`${failure.kind}: ${failure.message}`);
      return { ...base, status: "failed", error: failure };
    }
  }

  if (exists) {
    log.info(`Backup already exists, skipping: ${storageKey}`);
    const record: BackupRecord = { ...base, status: "skipped", skipReason: "already_exists" };
    // Issues change independently of the code, so today's export is still taken
    if (context.issues && !context.dryRun) {
      record.issues = await backupIssues(repository, context, context.issues, log);
    }
    return record;
  }

  if (context.dryRun) {
    log.info(`[DRY RUN] Would back up: ${repository.fullName} -> ${storageKey}`);
    return { ...base, status: "skipped", skipReason: "dry_run" };
  }

  let record: BackupRecord;
  try {
    const uploaded = await context.workspace(`repo-vault-${repository.name}-`, async (workDir) => {
      const archive = await stage("ArchiveError", () =>
        context.archiver.produceArchive(repository, workDir),
      );

      return stage("StorageError", () =>
        storage.upload(
          storageKey,
          { type: "file", path: archive.archivePath, contentType: "application/gzip" },
          {
            repository: repository.fullName,
            backup_date: startedAt.toISOString(),
            default_branch: archive.defaultBranch,
            size_bytes: String(archive.sizeBytes),
          },
        ),
      );
    }, log);

    log.info(`Backed up ${repository.fullName} (${formatBytes(uploaded.sizeBytes)})`);
    record = {
      ...base,
      status: "success",
      checksum: uploaded.checksum,
      sizeBytes: uploaded.sizeBytes,
    };
  } catch (error) {
    // Workspace setup or teardown failures land here too
    const failure = classifyError(error, "ArchiveError");
    log.error(`Failed to back up ${repository.fullName}: ${failure.kind}: ${failure.message}`);
    return { ...base, status: "failed", error: failure };
  }

  if (context.issues) {
    record.issues = await backupIssues(repository, context, context.issues, log);
  }

  return record;
}

/**
 * Export and upload today's issues. The outcome never changes the archive
 * status of the record it is attached to.
 */
async function backupIssues(
  repository: RepositoryDescriptor,
  context: CycleContext,
  exporter: IssuesExporter,
  log: Logger,
): Promise<IssueExportOutcome> {
  const storageKey = issuesObjectKey(repository.name, context.startedAt);

  try {
    if (!context.force && (await context.storage.objectExists(storageKey))) {
      log.info(`Issues backup already exists, skipping: ${storageKey}`);
      return { status: "skipped", storageKey };
    }

    const document = await stage("HostingError", () => exporter.exportIssues(repository));
    const data = Buffer.from(serializeIssueExport(document), "utf-8");
    const totalIssues = document.metadata.total_issues;

    await stage("StorageError", () =>
      context.storage.upload(
        storageKey,
        { type: "bytes", data, contentType: "application/json" },
        {
          repository: repository.fullName,
          backup_date: context.startedAt.toISOString(),
          content_type: "application/json",
          total_issues: String(totalIssues),
        },
      ),
    );

    log.info(`Issues backup successful: ${storageKey} (${totalIssues} issues)`);
    return { status: "success", storageKey, totalIssues };
  } catch (error) {
    const failure = classifyError(error, "StorageError");
    log.error(`Failed to back up issues for ${repository.fullName}: ${failure.kind}: ${failure.message}`);
    return { status: "failed", storageKey, error: failure };
  }
}

export function countRecords(records: readonly BackupRecord[]): CycleTotals {
  const totals: CycleTotals = { total: records.length, successful: 0, failed: 0, skipped: 0, wouldBackup: 0 };
  for (const record of records) {
    if (record.status === "success") totals.successful++;
    else if (record.status === "failed") totals.failed++;
    else {
      totals.skipped++;
      if (record.skipReason === "dry_run") totals.wouldBackup++;
    }
  }
  return totals;
}

export function countIssueExports(records: readonly BackupRecord[]): IssueExportTotals {
  const totals: IssueExportTotals = { successful: 0, failed: 0, skipped: 0 };
  for (const record of records) {
    if (!record.issues) continue;
    if (record.issues.status === "success") totals.successful++;
    else if (record.issues.status === "failed") totals.failed++;
    else totals.skipped++;
  }
  return totals;
}

/** Records that need operator attention: failed archives or failed issue exports */
export function failuresOf(result: CycleResult): BackupRecord[] {
  return result.records.filter(
    (record) => record.status === "failed" || record.issues?.status === "failed",
  );
}

/** 0 when no repository failed in the cycle, 1 otherwise */
export function exitCodeFor(result: CycleResult): number {
  return failuresOf(result).length === 0 ? 0 : 1;
}
