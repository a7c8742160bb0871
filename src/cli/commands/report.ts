import { parseArgs } from "node:util";
import { extractInlineOptions, INLINE_CONFIG_OPTIONS, resolveOrganization } from "../../config";
import {
  generateBackupReport,
  groupIssueExportsByMonth,
  renderIssueExportSummary,
} from "../../core/report";
import { errorMessage } from "../../errors";
import type { BackupReport, IssueExportMonth } from "../../types";
import { formatBytes } from "../../utils/format";
import { logger, setLogLevel, setLogOutput } from "../../utils/logger";
import { createCollaborators, resolveRuntimeConfig } from "../runtime";
import {
  color,
  formatReportMarkdown,
  formatSummary,
  formatTableRow,
  formatTableSeparator,
  reportSummaryItems,
  TABLE_WIDTHS,
  ui,
} from "../ui";

const REPORT_FORMATS = ["table", "json", "markdown"] as const;
export type ReportFormat = (typeof REPORT_FORMATS)[number];

function isReportFormat(value: string): value is ReportFormat {
  return REPORT_FORMATS.some((format) => format === value);
}

/**
 * json and markdown output is meant to be piped: logs move to stderr and only
 * warnings show unless verbose.
 */
export function configureReportLogging(format: ReportFormat, verbose: boolean): void {
  if (format !== "table") {
    setLogOutput("stderr");
  }
  if (verbose) {
    setLogLevel("debug");
  } else if (format !== "table") {
    setLogLevel("warn");
  }
}

export async function reportCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      config: { type: "string", short: "c" },
      format: { type: "string", short: "f", default: "table" },
      verbose: { type: "boolean", short: "v", default: false },
      help: { type: "boolean", short: "h", default: false },
      // Inline config options; --issues also adds the issue-export summary
      ...INLINE_CONFIG_OPTIONS,
    },
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  const format = values.format;
  if (!isReportFormat(format)) {
    ui.error(`Unknown format: ${format}. Use ${REPORT_FORMATS.join(", ")}`);
    return 1;
  }

  configureReportLogging(format, values.verbose);

  try {
    const resolution = await resolveRuntimeConfig(values.config, extractInlineOptions(values));
    if (!resolution.ok) {
      ui.error("No config file found and inline options are insufficient:");
      for (const err of resolution.errors) {
        ui.message(`  - ${err}`);
      }
      return 1;
    }

    const { config } = resolution;
    const organization = resolveOrganization(config);
    const collaborators = createCollaborators(config, logger);
    const showIssues = values.issues === true || config.metadata.issues;
    const now = new Date();

    const { report, listings } = await generateBackupReport(
      { ...collaborators, log: logger, now: () => now },
      organization,
    );
    const issueExports = showIssues ? groupIssueExportsByMonth(listings) : null;

    switch (format) {
      case "json":
        console.log(JSON.stringify({ report, issueExports }, null, 2));
        return 0;
      case "markdown":
        console.log(formatReportMarkdown(report));
        if (issueExports) {
          console.log(renderIssueExportSummary(issueExports, now));
        }
        return 0;
      default:
        ui.intro("repo-vault report");
        printTable(report);
        if (issueExports) {
          printIssueExports(issueExports);
        }
        ui.note(formatSummary(reportSummaryItems(report)), "Report Summary");
        ui.outro(`${report.repositoriesWithBackups} repositories with backups`);
        return 0;
    }
  } catch (error) {
    ui.error(`Report failed: ${errorMessage(error)}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printTable(report: BackupReport): void {
  if (report.repositories.length === 0) {
    ui.info("No backups found");
    return;
  }

  const widths = [
    TABLE_WIDTHS.repository,
    TABLE_WIDTHS.backups,
    TABLE_WIDTHS.issues,
    TABLE_WIDTHS.size,
    TABLE_WIDTHS.latest,
  ];
  const headers = ["Repository", "Backups", "Issues", "Size", "Latest"];

  ui.step("Repositories:");
  console.log(formatTableRow(headers, widths));
  console.log(formatTableSeparator(widths));

  for (const repo of report.repositories) {
    console.log(
      formatTableRow(
        [
          repo.name,
          String(repo.backupCount),
          String(repo.issueExportCount),
          formatBytes(repo.totalBytes),
          repo.latestBackup.substring(0, 19),
        ],
        widths,
      ),
    );
  }
}

function printIssueExports(groups: IssueExportMonth[]): void {
  if (groups.length === 0) {
    ui.info("No issue exports found");
    return;
  }

  ui.step("Issue exports:");
  for (const group of groups) {
    const total = group.exports.reduce((sum, entry) => sum + entry.size, 0);
    ui.message(
      `${group.label}  ${color.dim(`${group.exports.length} export(s), ${formatBytes(total)}`)}`,
    );
  }
}

function printHelp(): void {
  console.log(`
${color.bold("repo-vault report")} - Summarise what the bucket holds

${color.dim("USAGE:")}
  repo-vault report [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./repo-vault.config.yaml)
  -f, --format <format>   Output format: table, json, markdown (default: table)
      --issues            Include the monthly issue-export summary
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("EXAMPLES:")}
  repo-vault report
  repo-vault report --format json
  repo-vault report --format markdown --issues >> "$GITHUB_STEP_SUMMARY"
`);
}
