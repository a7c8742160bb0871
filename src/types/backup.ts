/**
 * Backup cycle type definitions
 */

import type { ClassifiedError } from "../errors";
import type { RepositoryDescriptor } from "./hosting";

/** Validated repository selection rules */
export interface MatchRuleSet {
  includePatterns: string[];
  includeNames: string[];
  excludeArchived: boolean;
  excludePatterns: string[];
  excludeNames: string[];
}

export interface ArchiveResult {
  archivePath: string;
  sizeBytes: number;
  defaultBranch: string;
}

export interface ArchiveProducer {
  /**
   * Write a compressed mirror archive of `repository` inside `workDir`.
   * `workDir` is private to this call and removed by the caller.
   */
  produceArchive(repository: RepositoryDescriptor, workDir: string): Promise<ArchiveResult>;
}

export type BackupStatus = "success" | "skipped" | "failed";

export type SkipReason = "already_exists" | "dry_run";

export interface IssueExportOutcome {
  status: BackupStatus;
  storageKey: string;
  totalIssues?: number;
  error?: ClassifiedError;
}

export interface BackupRecord {
  repository: string;
  fullName: string;
  /** Calendar day (UTC), YYYY-MM-DD */
  backupDate: string;
  /** Archive key relative to the storage prefix */
  storageKey: string;
  status: BackupStatus;
  skipReason?: SkipReason;
  checksum?: string;
  sizeBytes?: number;
  error?: ClassifiedError;
  /** Present when issue export is enabled and was attempted */
  issues?: IssueExportOutcome;
}

export interface CycleTotals {
  total: number;
  successful: number;
  failed: number;
  skipped: number;
  /** Subset of `skipped` that a dry run would have backed up */
  wouldBackup: number;
}

export interface IssueExportTotals {
  successful: number;
  failed: number;
  skipped: number;
}

export interface CycleResult {
  organization: string;
  startedAt: string;
  backupDate: string;
  dryRun: boolean;
  force: boolean;
  records: readonly BackupRecord[];
  totals: CycleTotals;
  /** Null when issue export was disabled */
  issueTotals: IssueExportTotals | null;
  durationMs: number;
}

export interface IssueCommentRecord {
  id: number;
  author: string | null;
  body: string | null;
  created_at: string | null;
}

export interface IssueRecord {
  number: number;
  title: string;
  url: string;
  state: string;
  author: string | null;
  created_at: string | null;
  updated_at: string | null;
  closed_at: string | null;
  closed_by: string | null;
  labels: string[];
  milestone: string | null;
  assignees: string[];
  body: string | null;
  comment_count: number;
  comments: IssueCommentRecord[];
}

export interface IssueExportDocument {
  metadata: {
    repository: string;
    exported_at: string;
    total_issues: number;
    open_issues: number;
    closed_issues: number;
  };
  issues: IssueRecord[];
}
