/**
 * Backup module exports
 */

export {
  type CommandOutput,
  type CommandRunner,
  GitMirrorArchiveProducer,
  type GitMirrorOptions,
  runCommand,
} from "./archive-producer";
export { IssuesExporter, type IssuesExporterOptions, serializeIssueExport } from "./issues-exporter";
export {
  type BackupCycleDeps,
  type BackupCycleOptions,
  countIssueExports,
  countRecords,
  exitCodeFor,
  failuresOf,
  runBackupCycle,
} from "./orchestrator";
