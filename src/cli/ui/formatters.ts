/**
 * Table and summary formatters
 */

import color from "picocolors";
import type { BackupRecord, BackupReport, CycleResult } from "../../types";
import { formatBytes, formatDuration } from "../../utils/format";

export const TABLE_WIDTHS = {
  repository: 32,
  backups: 7,
  issues: 6,
  size: 12,
  latest: 20,
} as const;

export interface SummaryItem {
  label: string;
  value: string | number | null | undefined;
}

export function formatSummary(items: SummaryItem[]): string {
  const maxLabelLen = Math.max(...items.map((i) => i.label.length));
  return items
    .filter((i) => i.value !== null && i.value !== undefined)
    .map((i) => `${color.dim(i.label.padEnd(maxLabelLen))}  ${i.value}`)
    .join("\n");
}

export function formatTableRow(columns: string[], widths: number[]): string {
  return columns
    .map((col, i) => col.padEnd(widths[i] ?? 0))
    .join(color.dim(" │ "));
}

export function formatTableSeparator(widths: number[]): string {
  return color.dim(widths.map((w) => "─".repeat(w)).join("─┼─"));
}

export function cycleSummaryItems(result: CycleResult): SummaryItem[] {
  const { totals, issueTotals } = result;
  const items: SummaryItem[] = [
    { label: "Organization", value: result.organization },
    { label: "Backup date", value: result.backupDate },
    { label: "Repositories", value: totals.total },
    { label: "Successful", value: totals.successful },
    { label: "Failed", value: totals.failed },
    { label: "Skipped", value: totals.skipped },
    { label: "Would back up", value: result.dryRun ? totals.wouldBackup : null },
    { label: "Duration", value: formatDuration(result.durationMs) },
  ];

  if (issueTotals) {
    items.push({
      label: "Issue exports",
      value: `${issueTotals.successful} successful, ${issueTotals.failed} failed, ${issueTotals.skipped} skipped`,
    });
  }

  return items;
}

/**
 * One line per failed archive or issue export: `[Kind] repository: message`
 */
export function formatFailureLines(records: readonly BackupRecord[]): string[] {
  const lines: string[] = [];
  for (const record of records) {
    if (record.status === "failed" && record.error) {
      lines.push(`[${record.error.kind}] ${record.repository}: ${record.error.message}`);
    }
    if (record.issues?.status === "failed" && record.issues.error) {
      lines.push(
        `[${record.issues.error.kind}] ${record.repository} (issues): ${record.issues.error.message}`,
      );
    }
  }
  return lines;
}

export function reportSummaryItems(report: BackupReport): SummaryItem[] {
  return [
    { label: "Organization", value: report.organization },
    { label: "Repositories monitored", value: report.totalRepositories },
    { label: "With backups", value: report.repositoriesWithBackups },
    { label: "Total size", value: formatBytes(report.totalBytes) },
  ];
}

export function formatReportMarkdown(report: BackupReport): string {
  const lines = [
    `# Backup report: ${report.organization}`,
    "",
    `- Repositories monitored: ${report.totalRepositories}`,
    `- Repositories with backups: ${report.repositoriesWithBackups}`,
    `- Total size: ${formatBytes(report.totalBytes)}`,
    "",
  ];

  if (report.repositories.length > 0) {
    lines.push("| Repository | Backups | Issue exports | Size | Latest |");
    lines.push("| --- | ---: | ---: | ---: | --- |");
    for (const repo of report.repositories) {
      lines.push(
        `| ${repo.name} | ${repo.backupCount} | ${repo.issueExportCount} | ${formatBytes(repo.totalBytes)} | ${repo.latestBackup.substring(0, 10)} |`,
      );
    }
    lines.push("");
  }

  return lines.join("\n");
}
