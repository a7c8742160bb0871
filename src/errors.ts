/**
 * Error kinds raised by repo-vault
 *
 * Cycle-level errors (configuration, initial repository listing) propagate and
 * end the run. Everything raised while backing up a single repository is caught
 * by the orchestrator and recorded against that repository instead.
 */

export type ErrorKind =
  | "ConfigurationError"
  | "HostingError"
  | "ArchiveError"
  | "UploadVerificationError"
  | "StorageError";

export interface RepoVaultErrorOptions {
  cause?: unknown;
}

export abstract class RepoVaultError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options: RepoVaultErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
  }
}

/** Invalid or missing configuration, raised before any network call. */
export class ConfigurationError extends RepoVaultError {
  readonly kind = "ConfigurationError" as const;
}

export interface HostingErrorOptions extends RepoVaultErrorOptions {
  /** HTTP status reported by the hosting API, when there was a response */
  status?: number;
}

export class HostingError extends RepoVaultError {
  readonly kind = "HostingError" as const;
  readonly status: number | undefined;

  constructor(message: string, options: HostingErrorOptions = {}) {
    super(message, options);
    this.status = options.status;
  }
}

/** Mirror clone or packaging failure. */
export class ArchiveError extends RepoVaultError {
  readonly kind = "ArchiveError" as const;
}

export interface UploadVerificationErrorOptions extends RepoVaultErrorOptions {
  key?: string;
  expected?: string;
  actual?: string;
}

/**
 * The stored object does not match the bytes that were sent.
 * The object is left in place; the backup must be treated as unverified.
 */
export class UploadVerificationError extends RepoVaultError {
  readonly kind = "UploadVerificationError" as const;
  readonly key: string | undefined;
  readonly expected: string | undefined;
  readonly actual: string | undefined;

  constructor(message: string, options: UploadVerificationErrorOptions = {}) {
    super(message, options);
    this.key = options.key;
    this.expected = options.expected;
    this.actual = options.actual;
  }
}

/** Object-storage transport failure (request rejected, network, permissions). */
export class StorageError extends RepoVaultError {
  readonly kind = "StorageError" as const;
}

type RepoVaultErrorClass = new (message: string, options?: RepoVaultErrorOptions) => RepoVaultError;

const ERROR_CLASSES: Record<ErrorKind, RepoVaultErrorClass> = {
  ConfigurationError,
  HostingError,
  ArchiveError,
  UploadVerificationError,
  StorageError,
};

export interface ClassifiedError {
  kind: ErrorKind;
  message: string;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Wrap an arbitrary thrown value in the error class for `fallback`,
 * leaving errors that already carry a kind untouched.
 */
export function toRepoVaultError(error: unknown, fallback: ErrorKind): RepoVaultError {
  if (error instanceof RepoVaultError) return error;
  const ErrorClass = ERROR_CLASSES[fallback];
  return new ErrorClass(errorMessage(error), { cause: error });
}

export function classifyError(error: unknown, fallback: ErrorKind): ClassifiedError {
  const classified = toRepoVaultError(error, fallback);
  return { kind: classified.kind, message: classified.message };
}
