import { parseArgs } from "node:util";
import { extractInlineOptions, INLINE_CONFIG_OPTIONS, resolveOrganization } from "../../config";
import { exitCodeFor, failuresOf, runBackupCycle } from "../../core/backup";
import { errorMessage } from "../../errors";
import { logger, setLogLevel } from "../../utils/logger";
import { createCollaborators, resolveRuntimeConfig } from "../runtime";
import { color, cycleSummaryItems, formatFailureLines, formatSummary, ui } from "../ui";

export async function backupCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      config: { type: "string", short: "c" },
      force: { type: "boolean", default: false },
      "dry-run": { type: "boolean", default: false },
      verbose: { type: "boolean", short: "v", default: false },
      help: { type: "boolean", short: "h", default: false },
      // Inline config options
      ...INLINE_CONFIG_OPTIONS,
    },
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  if (values.verbose) {
    setLogLevel("debug");
  }

  try {
    const resolution = await resolveRuntimeConfig(values.config, extractInlineOptions(values));
    if (!resolution.ok) {
      ui.error("No config file found and inline options are insufficient:");
      for (const err of resolution.errors) {
        ui.message(`  - ${err}`);
      }
      ui.info("Either create a config file or provide --organization and --s3-bucket.");
      return 1;
    }

    const { config } = resolution;
    const organization = resolveOrganization(config);
    const collaborators = createCollaborators(config, logger);

    ui.intro("repo-vault backup");
    ui.step(`Config: ${resolution.source}`);
    ui.step(`Target: s3://${collaborators.storage.bucket}/${config.s3.prefix ?? ""}`);

    const result = await runBackupCycle(
      { ...collaborators, log: logger },
      {
        organization,
        force: values.force,
        dryRun: values["dry-run"],
        exportIssues: config.metadata.issues,
      },
    );

    ui.note(formatSummary(cycleSummaryItems(result)), "Backup Summary");

    const failures = formatFailureLines(result.records);
    if (failures.length > 0) {
      ui.error(`Failures:\n${failures.join("\n")}`);
    }

    if (result.dryRun) {
      ui.warn("[DRY RUN] No changes were made.");
    }

    const code = exitCodeFor(result);
    if (code === 0) {
      ui.outro("Backup complete!");
    } else {
      ui.cancel(`Backup finished with ${failuresOf(result).length} failed repositories`);
    }
    return code;
  } catch (error) {
    ui.error(`Backup failed: ${errorMessage(error)}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printHelp(): void {
  console.log(`
${color.bold("repo-vault backup")} - Mirror the organization's repositories into S3

${color.dim("USAGE:")}
  repo-vault backup [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./repo-vault.config.yaml)
      --force             Back up even when today's archive already exists
      --dry-run           Show what would be backed up without doing it
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("INLINE CONFIG OPTIONS:")}
      --organization <name>   GitHub organization
      --s3-bucket <name>      S3 bucket name
      --s3-prefix <prefix>    S3 key prefix (default: backups)
      --s3-region <region>    S3 region (default: us-east-1)
      --s3-endpoint <url>     S3-compatible endpoint URL
      --issues                Export issues next to each archive
      --no-issues             Do not export issues

${color.dim("ENVIRONMENT:")}
  GITHUB_TOKEN                         Token used for the API and for cloning
  S3_ACCESS_KEY_ID, S3_SECRET_ACCESS_KEY
  AWS_ACCESS_KEY_ID, AWS_SECRET_ACCESS_KEY

${color.dim("EXAMPLES:")}
  repo-vault backup                              # Back up with ./repo-vault.config.yaml
  repo-vault backup --dry-run                    # Preview
  repo-vault backup --force --issues             # Re-run today's backup, with issues
  repo-vault backup --organization my-org --s3-bucket my-backups
`);
}
