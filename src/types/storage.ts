/**
 * Object storage interface definitions
 */

/** String key/value pairs attached to a stored object */
export type ObjectMetadata = Record<string, string>;

export type UploadPayload =
  | { type: "file"; path: string; contentType: string }
  | { type: "bytes"; data: Buffer; contentType: string };

export interface UploadResult {
  bucket: string;
  /** Full object key, prefix included */
  objectKey: string;
  sizeBytes: number;
  /** Hex SHA-256 of the uploaded bytes */
  checksum: string;
}

export interface StoredObject {
  key: string;
  size: number;
  lastModified: Date;
}

export interface StorageGateway {
  readonly bucket: string;

  /**
   * Upload and verify an object. `key` is relative to the configured prefix.
   * Throws UploadVerificationError when the stored object does not match.
   */
  upload(key: string, payload: UploadPayload, metadata: ObjectMetadata): Promise<UploadResult>;

  /** Existence probe for a single key, relative to the prefix */
  objectExists(key: string): Promise<boolean>;

  /** Whether the archive for `repository` on the calendar day of `date` exists */
  backupExists(repository: string, date: Date): Promise<boolean>;

  /** Every object stored under the repository's folder */
  listBackups(repository: string): Promise<StoredObject[]>;
}
