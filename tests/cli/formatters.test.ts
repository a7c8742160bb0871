import { describe, expect, test } from "vitest";
import {
  cycleSummaryItems,
  formatFailureLines,
  formatReportMarkdown,
  reportSummaryItems,
} from "../../src/cli/ui/formatters";
import type { BackupRecord, BackupReport, CycleResult } from "../../src/types";

function record(overrides: Partial<BackupRecord>): BackupRecord {
  return {
    repository: "demo",
    fullName: "test-org/demo",
    backupDate: "2025-12-02",
    storageKey: "demo/demo-20251202.tar.gz",
    status: "success",
    ...overrides,
  };
}

function cycle(overrides: Partial<CycleResult> = {}): CycleResult {
  return {
    organization: "test-org",
    startedAt: "2025-12-02T10:00:00.000Z",
    backupDate: "2025-12-02",
    dryRun: false,
    force: false,
    records: [],
    totals: { total: 3, successful: 1, failed: 1, skipped: 1, wouldBackup: 0 },
    issueTotals: null,
    durationMs: 1500,
    ...overrides,
  };
}

describe("formatFailureLines", () => {
  test("lists failed archives and failed issue exports", () => {
    const lines = formatFailureLines([
      record({ repository: "ok" }),
      record({
        repository: "broken",
        status: "failed",
        error: { kind: "ArchiveError", message: "git clone failed" },
      }),
      record({
        repository: "tracker",
        issues: {
          status: "failed",
          storageKey: "tracker/tracker-issues-20251202.json",
          error: { kind: "HostingError", message: "rate limited" },
        },
      }),
    ]);

    expect(lines).toEqual([
      "[ArchiveError] broken: git clone failed",
      "[HostingError] tracker (issues): rate limited",
    ]);
  });
});

describe("cycleSummaryItems", () => {
  test("hides the dry-run count outside a dry run", () => {
    const items = cycleSummaryItems(cycle());

    expect(items.find((i) => i.label === "Would back up")?.value).toBeNull();
    expect(items.find((i) => i.label === "Duration")?.value).toBe("1.5s");
    expect(items.some((i) => i.label === "Issue exports")).toBe(false);
  });

  test("shows dry-run and issue export counts when present", () => {
    const items = cycleSummaryItems(
      cycle({
        dryRun: true,
        totals: { total: 2, successful: 0, failed: 0, skipped: 2, wouldBackup: 2 },
        issueTotals: { successful: 1, failed: 0, skipped: 1 },
      }),
    );

    expect(items.find((i) => i.label === "Would back up")?.value).toBe(2);
    expect(items.find((i) => i.label === "Issue exports")?.value).toBe(
      "1 successful, 0 failed, 1 skipped",
    );
  });
});

describe("report formatting", () => {
  const report: BackupReport = {
    organization: "test-org",
    generatedAt: "2025-12-02T10:00:00.000Z",
    totalRepositories: 3,
    repositoriesWithBackups: 1,
    totalBytes: 2048,
    repositories: [
      {
        name: "alpha",
        backupCount: 2,
        issueExportCount: 1,
        totalBytes: 2048,
        latestBackup: "2025-12-01T08:30:00.000Z",
      },
    ],
  };

  test("reportSummaryItems formats the total size", () => {
    expect(reportSummaryItems(report)).toEqual([
      { label: "Organization", value: "test-org" },
      { label: "Repositories monitored", value: 3 },
      { label: "With backups", value: 1 },
      { label: "Total size", value: "2.00 KB" },
    ]);
  });

  test("formatReportMarkdown renders a table row per repository", () => {
    expect(formatReportMarkdown(report).split("\n")).toEqual([
      "# Backup report: test-org",
      "",
      "- Repositories monitored: 3",
      "- Repositories with backups: 1",
      "- Total size: 2.00 KB",
      "",
      "| Repository | Backups | Issue exports | Size | Latest |",
      "| --- | ---: | ---: | ---: | --- |",
      "| alpha | 2 | 1 | 2.00 KB | 2025-12-01 |",
      "",
    ]);
  });

  test("formatReportMarkdown omits the table without backups", () => {
    const empty = { ...report, repositoriesWithBackups: 0, totalBytes: 0, repositories: [] };

    expect(formatReportMarkdown(empty).split("\n")).toEqual([
      "# Backup report: test-org",
      "",
      "- Repositories monitored: 3",
      "- Repositories with backups: 0",
      "- Total size: 0 B",
      "",
    ]);
  });
});
