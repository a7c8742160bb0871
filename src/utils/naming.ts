/**
 * Backup object naming
 *
 * Archives:      {repo}/{repo}-{YYYYMMDD}.tar.gz
 * Issue exports: {repo}/{repo}-issues-{YYYYMMDD}.json
 *
 * Keys are relative to the storage prefix. The (repository, UTC calendar day)
 * pair is the idempotency key of a backup.
 */

export type BackupObjectKind = "archive" | "issues";

export interface ParsedBackupObjectName {
  repository: string;
  kind: BackupObjectKind;
  /** YYYY-MM-DD */
  date: string;
}

export const ARCHIVE_NAME_PATTERN = /^(.+)-(\d{4})(\d{2})(\d{2})\.tar\.gz$/;

export const ISSUES_NAME_PATTERN = /^(.+)-issues-(\d{4})(\d{2})(\d{2})\.json$/;

/** YYYYMMDD of the UTC calendar day */
export function formatDateStamp(date: Date): string {
  return date.toISOString().slice(0, 10).replace(/-/g, "");
}

/** YYYY-MM-DD of the UTC calendar day */
export function formatBackupDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function archiveFileName(repository: string, date: Date): string {
  return `${repository}-${formatDateStamp(date)}.tar.gz`;
}

export function issuesFileName(repository: string, date: Date): string {
  return `${repository}-issues-${formatDateStamp(date)}.json`;
}

export function backupObjectKey(repository: string, date: Date): string {
  return `${repository}/${archiveFileName(repository, date)}`;
}

export function issuesObjectKey(repository: string, date: Date): string {
  return `${repository}/${issuesFileName(repository, date)}`;
}

/** YYYY-MM-DD when the parts name a real calendar day, null otherwise */
function calendarDate(year = "", month = "", day = ""): string | null {
  const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  if (
    date.getUTCFullYear() !== Number(year) ||
    date.getUTCMonth() !== Number(month) - 1 ||
    date.getUTCDate() !== Number(day)
  ) {
    return null;
  }
  return `${year}-${month}-${day}`;
}

/**
 * Parse the last path segment of a stored key.
 * Names whose stamp is not a real calendar day are not backup objects.
 * Issue exports are tried first: "{repo}-issues-{date}.json" never matches the
 * archive pattern, but a repository may itself be named "x-issues".
 */
export function parseBackupObjectName(key: string): ParsedBackupObjectName | null {
  const name = key.slice(key.lastIndexOf("/") + 1);

  const issues = ISSUES_NAME_PATTERN.exec(name);
  if (issues) {
    const [, repository = "", year, month, day] = issues;
    const date = calendarDate(year, month, day);
    return date ? { repository, kind: "issues", date } : null;
  }

  const archive = ARCHIVE_NAME_PATTERN.exec(name);
  if (archive) {
    const [, repository = "", year, month, day] = archive;
    const date = calendarDate(year, month, day);
    return date ? { repository, kind: "archive", date } : null;
  }

  return null;
}
