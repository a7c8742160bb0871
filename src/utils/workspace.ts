/**
 * Private scratch directories for archive production
 */

import { mkdtemp, rm } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { type Logger, logger } from "./logger";

export type WorkspaceRunner = <T>(
  prefix: string,
  fn: (workDir: string) => Promise<T>,
  log?: Logger,
) => Promise<T>;

/**
 * Run `fn` inside a fresh directory under the OS temp dir.
 * The directory is removed on every exit path, including failure.
 */
export const withWorkspace: WorkspaceRunner = async (prefix, fn, log = logger) => {
  const workDir = await mkdtemp(path.join(os.tmpdir(), prefix));
  try {
    return await fn(workDir);
  } finally {
    await rm(workDir, { recursive: true, force: true });
    log.debug(`Cleaned up workspace: ${workDir}`);
  }
};
