/**
 * Mirror archive production
 */

import { execFile } from "node:child_process";
import { stat } from "node:fs/promises";
import * as path from "node:path";
import { promisify } from "node:util";
import { ArchiveError, errorMessage } from "../../errors";
import type { ArchiveProducer, ArchiveResult, RepositoryDescriptor } from "../../types";
import { type Logger, logger } from "../../utils/logger";

const execFileAsync = promisify(execFile);

export interface CommandOutput {
  stdout: string;
  stderr: string;
}

export type CommandRunner = (
  command: string,
  args: string[],
  options?: { cwd?: string },
) => Promise<CommandOutput>;

export const runCommand: CommandRunner = async (command, args, options = {}) => {
  const { stdout, stderr } = await execFileAsync(command, args, {
    cwd: options.cwd,
    maxBuffer: 16 * 1024 * 1024,
    env: { ...process.env, GIT_TERMINAL_PROMPT: "0" },
  });
  return { stdout, stderr };
};

export interface GitMirrorOptions {
  /** Token inserted into HTTPS clone URLs for private repositories */
  token?: string;
  runner?: CommandRunner;
  log?: Logger;
}

function commandFailure(error: unknown): string {
  if (typeof error === "object" && error !== null && "stderr" in error) {
    const stderr = error.stderr;
    if (typeof stderr === "string" && stderr.trim().length > 0) {
      return stderr.trim();
    }
  }
  return errorMessage(error);
}

/**
 * Produces `<workDir>/<name>.tar.gz` holding a `git clone --mirror` of the
 * repository: every branch, tag and the full history.
 */
export class GitMirrorArchiveProducer implements ArchiveProducer {
  private readonly token: string | undefined;
  private readonly runner: CommandRunner;
  private readonly log: Logger;

  constructor(options: GitMirrorOptions = {}) {
    this.token = options.token;
    this.runner = options.runner ?? runCommand;
    this.log = options.log ?? logger;
  }

  authenticatedUrl(cloneUrl: string): string {
    if (!this.token || !cloneUrl.startsWith("https://")) {
      return cloneUrl;
    }
    return cloneUrl.replace("https://", `https://x-access-token:${this.token}@`);
  }

  redact(text: string): string {
    if (!this.token) return text;
    return text.split(this.token).join("***");
  }

  async produceArchive(repository: RepositoryDescriptor, workDir: string): Promise<ArchiveResult> {
    const mirrorName = `${repository.name}.git`;
    const mirrorPath = path.join(workDir, mirrorName);
    const archivePath = path.join(workDir, `${repository.name}.tar.gz`);

    this.log.info(`Cloning repository: ${repository.cloneUrl}`);
    await this.run(repository, "git", [
      "clone",
      "--mirror",
      this.authenticatedUrl(repository.cloneUrl),
      mirrorPath,
    ]);

    this.log.debug(`Creating archive: ${archivePath}`);
    await this.run(repository, "tar", ["-czf", archivePath, "-C", workDir, mirrorName]);

    let sizeBytes: number;
    try {
      sizeBytes = (await stat(archivePath)).size;
    } catch (error) {
      throw new ArchiveError(`Archive missing after tar for ${repository.fullName}: ${errorMessage(error)}`);
    }

    this.log.info(`Archive created for ${repository.fullName} (${sizeBytes} bytes)`);

    return { archivePath, sizeBytes, defaultBranch: repository.defaultBranch };
  }

  private async run(repository: RepositoryDescriptor, command: string, args: string[]): Promise<void> {
    try {
      await this.runner(command, args);
    } catch (error) {
      // The execFile error embeds the command line, token included: keep only the redacted text
      throw new ArchiveError(
        `${command} ${args[0] ?? ""} failed for ${repository.fullName}: ${this.redact(commandFailure(error))}`,
      );
    }
  }
}
