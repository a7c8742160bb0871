/**
 * Report module exports
 */

export {
  groupIssueExportsByMonth,
  isReviewReminderDue,
  REVIEW_REMINDER_DAY,
  renderIssueExportSummary,
} from "./issues-summary";
export {
  aggregateBackupReport,
  collectListings,
  type GeneratedReport,
  generateBackupReport,
  type ReportDeps,
  type RepositoryListing,
} from "./report-builder";
