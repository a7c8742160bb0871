/**
 * Monthly issue-export summary
 */

import type { IssueExportEntry, IssueExportMonth } from "../../types";
import { formatBytes } from "../../utils/format";
import { parseBackupObjectName } from "../../utils/naming";
import type { RepositoryListing } from "./report-builder";

/** From this day of the month on, the summary carries a review reminder */
export const REVIEW_REMINDER_DAY = 25;

const MONTH_LABEL = new Intl.DateTimeFormat("en-US", {
  month: "long",
  year: "numeric",
  timeZone: "UTC",
});

function monthLabel(month: string): string {
  return MONTH_LABEL.format(new Date(`${month}-01T00:00:00Z`));
}

/**
 * Group issue-export objects by the calendar month in their key,
 * newest month first, entries by date then repository.
 */
export function groupIssueExportsByMonth(listings: readonly RepositoryListing[]): IssueExportMonth[] {
  const months = new Map<string, IssueExportEntry[]>();

  for (const { repository, objects } of listings) {
    for (const object of objects) {
      const parsed = parseBackupObjectName(object.key);
      if (parsed?.kind !== "issues") continue;

      const month = parsed.date.slice(0, 7);
      const entries = months.get(month) ?? [];
      entries.push({ repository, key: object.key, date: parsed.date, size: object.size });
      months.set(month, entries);
    }
  }

  return [...months.entries()]
    .sort(([a], [b]) => b.localeCompare(a))
    .map(([month, entries]) => ({
      month,
      label: monthLabel(month),
      exports: entries.sort(
        (a, b) => a.date.localeCompare(b.date) || a.repository.localeCompare(b.repository),
      ),
    }));
}

export function isReviewReminderDue(now: Date): boolean {
  return now.getUTCDate() >= REVIEW_REMINDER_DAY;
}

/**
 * Markdown with one collapsed block per month.
 */
export function renderIssueExportSummary(groups: readonly IssueExportMonth[], now: Date): string {
  const lines: string[] = ["## Issue exports", ""];

  if (groups.length === 0) {
    lines.push("No issue exports found.", "");
  }

  for (const group of groups) {
    const count = group.exports.length;
    lines.push("<details>");
    lines.push(`<summary>${group.label} (${count} ${count === 1 ? "export" : "exports"})</summary>`);
    lines.push("");
    for (const entry of group.exports) {
      lines.push(`- \`${entry.repository}\` ${entry.date} (${formatBytes(entry.size)})`);
    }
    lines.push("");
    lines.push("</details>");
    lines.push("");
  }

  if (isReviewReminderDue(now)) {
    lines.push(
      "> **Reminder:** the month is closing. Review this month's issue exports before the next cycle.",
      "",
    );
  }

  return lines.join("\n");
}
