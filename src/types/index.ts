/**
 * Centralized type exports for repo-vault
 */

// Backup types
export type {
  ArchiveProducer,
  ArchiveResult,
  BackupRecord,
  BackupStatus,
  CycleResult,
  CycleTotals,
  IssueCommentRecord,
  IssueExportDocument,
  IssueExportOutcome,
  IssueExportTotals,
  IssueRecord,
  MatchRuleSet,
  SkipReason,
} from "./backup";
// Config types
export type {
  GitHubConfig,
  MetadataConfig,
  RepositoryRulesConfig,
  RepoVaultConfig,
  S3StorageConfig,
} from "./config";
// Hosting types
export type { HostingGateway, IssueComment, IssueSummary, RepositoryDescriptor } from "./hosting";
// Report types
export type {
  BackupReport,
  IssueExportEntry,
  IssueExportMonth,
  RepositoryBackupStats,
} from "./report";
// Storage types
export type {
  ObjectMetadata,
  StorageGateway,
  StoredObject,
  UploadPayload,
  UploadResult,
} from "./storage";
