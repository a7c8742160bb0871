#!/usr/bin/env node

import { backupCommand } from "./cli/commands/backup";
import { reportCommand } from "./cli/commands/report";
import { banner, color, NAME, note, outro, VERSION } from "./cli/ui";

function printHelp(): void {
  banner("GitHub organization backups to S3");

  note(
    `${color.cyan("backup")}      Mirror every selected repository into S3
${color.cyan("report")}      Summarise the backups stored in S3`,
    "Commands",
  );

  note(
    `-h, --help      Show this help message
-v, --version   Show version`,
    "Options",
  );

  note(
    `repo-vault backup                 ${color.dim("# Run one backup cycle")}
repo-vault backup --dry-run       ${color.dim("# Preview the cycle")}
repo-vault backup --force         ${color.dim("# Ignore today's existing archives")}
repo-vault report --issues        ${color.dim("# Backup and issue-export summary")}`,
    "Examples",
  );

  outro(`Run ${color.cyan("repo-vault <command> --help")} for command details`);
}

function printVersion(): void {
  console.log(`${NAME} v${VERSION}`);
}

async function main(): Promise<number> {
  const args = process.argv.slice(2);

  if (args.length === 0) {
    printHelp();
    return 0;
  }

  const command = args[0];
  const commandArgs = args.slice(1);

  switch (command) {
    case "backup":
      return backupCommand(commandArgs);

    case "report":
      return reportCommand(commandArgs);

    case "-h":
    case "--help":
    case "help":
      printHelp();
      return 0;

    case "-v":
    case "--version":
    case "version":
      printVersion();
      return 0;

    default:
      console.error(`${color.red("Error:")} Unknown command: ${command}`);
      console.error(`Run ${color.cyan("repo-vault --help")} for usage information.`);
      return 1;
  }
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    console.error(`${color.red("Fatal error:")}`, error);
    process.exit(1);
  });
