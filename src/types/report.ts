/**
 * Report type definitions
 */

export interface RepositoryBackupStats {
  name: string;
  /** Number of mirror archives */
  backupCount: number;
  issueExportCount: number;
  /** Bytes across every object in the repository folder */
  totalBytes: number;
  latestBackup: string;
}

export interface BackupReport {
  organization: string;
  generatedAt: string;
  totalRepositories: number;
  repositoriesWithBackups: number;
  totalBytes: number;
  /** Only repositories holding at least one object, in listing order */
  repositories: RepositoryBackupStats[];
}

export interface IssueExportEntry {
  repository: string;
  key: string;
  /** YYYY-MM-DD */
  date: string;
  size: number;
}

export interface IssueExportMonth {
  /** YYYY-MM */
  month: string;
  /** e.g. "December 2025" */
  label: string;
  exports: IssueExportEntry[];
}
