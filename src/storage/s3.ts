/**
 * S3 storage gateway
 */

import { createReadStream } from "node:fs";
import { stat } from "node:fs/promises";
import {
  HeadObjectCommand,
  type HeadObjectCommandInput,
  type HeadObjectCommandOutput,
  ListObjectsV2Command,
  type ListObjectsV2CommandInput,
  type ListObjectsV2CommandOutput,
  NotFound,
  PutObjectCommand,
  type PutObjectCommandInput,
  type PutObjectCommandOutput,
  S3Client,
  S3ServiceException,
} from "@aws-sdk/client-s3";
import { errorMessage, StorageError, UploadVerificationError } from "../errors";
import type {
  ObjectMetadata,
  S3StorageConfig,
  StorageGateway,
  StoredObject,
  UploadPayload,
  UploadResult,
} from "../types";
import { computeBufferChecksum, computeFileChecksum, hexToBase64 } from "../utils/crypto";
import { type Logger, logger } from "../utils/logger";
import { backupObjectKey } from "../utils/naming";

/** The three S3 calls the gateway needs */
export interface S3Api {
  putObject(input: PutObjectCommandInput): Promise<PutObjectCommandOutput>;
  headObject(input: HeadObjectCommandInput): Promise<HeadObjectCommandOutput>;
  listObjectsV2(input: ListObjectsV2CommandInput): Promise<ListObjectsV2CommandOutput>;
}

export function createS3Client(config: S3StorageConfig): S3Client {
  const accessKeyId =
    config.accessKeyId ?? process.env.S3_ACCESS_KEY_ID ?? process.env.AWS_ACCESS_KEY_ID;
  const secretAccessKey =
    config.secretAccessKey ??
    process.env.S3_SECRET_ACCESS_KEY ??
    process.env.AWS_SECRET_ACCESS_KEY;
  const region = config.region ?? process.env.S3_REGION ?? process.env.AWS_REGION ?? "us-east-1";
  const endpoint = config.endpoint ?? process.env.S3_ENDPOINT;

  // Without explicit keys the SDK default chain applies (profiles, OIDC, instance roles)
  return new S3Client({
    region,
    ...(endpoint && { endpoint, forcePathStyle: true }),
    ...(accessKeyId && secretAccessKey && { credentials: { accessKeyId, secretAccessKey } }),
  });
}

export function createS3Api(client: S3Client): S3Api {
  return {
    putObject: (input) => client.send(new PutObjectCommand(input)),
    headObject: (input) => client.send(new HeadObjectCommand(input)),
    listObjectsV2: (input) => client.send(new ListObjectsV2Command(input)),
  };
}

export function buildS3Key(
  globalPrefix: string | undefined,
  folder: string,
  objectName: string,
): string {
  const parts: string[] = [];
  if (globalPrefix) parts.push(globalPrefix.replace(/\/+$/, ""));
  if (folder) parts.push(folder.replace(/\/+$/, ""));
  parts.push(objectName);
  return parts.filter(Boolean).join("/");
}

export function isKeyWithinPrefix(key: string, prefix: string | undefined): boolean {
  if (!prefix) return true;
  const normalizedPrefix = prefix.endsWith("/") ? prefix : `${prefix}/`;
  return key.startsWith(normalizedPrefix);
}

function isNotFound(error: unknown): boolean {
  if (error instanceof NotFound) return true;
  return error instanceof S3ServiceException && error.$metadata.httpStatusCode === 404;
}

interface LocalObject {
  sizeBytes: number;
  checksum: string;
}

async function describePayload(payload: UploadPayload): Promise<LocalObject> {
  if (payload.type === "file") {
    const { size } = await stat(payload.path);
    return { sizeBytes: size, checksum: await computeFileChecksum(payload.path) };
  }
  return { sizeBytes: payload.data.byteLength, checksum: computeBufferChecksum(payload.data) };
}

export class S3StorageGateway implements StorageGateway {
  readonly bucket: string;
  private readonly prefix: string;
  private readonly api: S3Api;
  private readonly log: Logger;

  constructor(config: S3StorageConfig, api?: S3Api, log: Logger = logger) {
    this.bucket = config.bucket;
    this.prefix = (config.prefix ?? "").replace(/^\/+|\/+$/g, "");
    this.api = api ?? createS3Api(createS3Client(config));
    this.log = log;
  }

  /** Full object key for a key relative to the prefix */
  fullKey(key: string): string {
    return buildS3Key(this.prefix, "", key);
  }

  async upload(key: string, payload: UploadPayload, metadata: ObjectMetadata): Promise<UploadResult> {
    const objectKey = this.fullKey(key);
    const local = await describePayload(payload);
    const location = `s3://${this.bucket}/${objectKey}`;

    this.log.debug(`Uploading to S3: ${location}`);

    try {
      await this.api.putObject({
        Bucket: this.bucket,
        Key: objectKey,
        Body: payload.type === "file" ? createReadStream(payload.path) : payload.data,
        ContentLength: local.sizeBytes,
        ContentType: payload.contentType,
        ChecksumSHA256: hexToBase64(local.checksum),
        Metadata: metadata,
      });
    } catch (error) {
      throw new StorageError(`Failed to upload ${location}: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    await this.verifyUpload(objectKey, local);

    this.log.info(`Uploaded and verified: ${location}`);

    return {
      bucket: this.bucket,
      objectKey,
      sizeBytes: local.sizeBytes,
      checksum: local.checksum,
    };
  }

  /**
   * Compare the stored object's size, and its full-object SHA-256 when S3
   * reports one, against the local bytes.
   */
  private async verifyUpload(objectKey: string, local: LocalObject): Promise<void> {
    let head: HeadObjectCommandOutput;
    try {
      head = await this.api.headObject({
        Bucket: this.bucket,
        Key: objectKey,
        ChecksumMode: "ENABLED",
      });
    } catch (error) {
      throw new StorageError(`Failed to verify s3://${this.bucket}/${objectKey}: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    if (head.ContentLength !== local.sizeBytes) {
      throw new UploadVerificationError(
        `Size mismatch for ${objectKey}: local=${local.sizeBytes} bytes, stored=${head.ContentLength ?? "unknown"} bytes`,
        {
          key: objectKey,
          expected: String(local.sizeBytes),
          actual: String(head.ContentLength ?? "unknown"),
        },
      );
    }

    // Multipart composite checksums ("<hash>-<parts>") are not comparable
    const remoteChecksum = head.ChecksumSHA256;
    const localChecksum = hexToBase64(local.checksum);
    if (remoteChecksum && !remoteChecksum.includes("-") && remoteChecksum !== localChecksum) {
      throw new UploadVerificationError(
        `Checksum mismatch for ${objectKey}: local=${localChecksum}, stored=${remoteChecksum}`,
        { key: objectKey, expected: localChecksum, actual: remoteChecksum },
      );
    }

    this.log.debug(`Verification passed: ${objectKey} (${local.sizeBytes} bytes)`);
  }

  async objectExists(key: string): Promise<boolean> {
    const objectKey = this.fullKey(key);
    try {
      await this.api.headObject({ Bucket: this.bucket, Key: objectKey });
      return true;
    } catch (error) {
      if (isNotFound(error)) return false;
      throw new StorageError(
        `Failed to check s3://${this.bucket}/${objectKey}: ${errorMessage(error)}`,
        { cause: error },
      );
    }
  }

  backupExists(repository: string, date: Date): Promise<boolean> {
    return this.objectExists(backupObjectKey(repository, date));
  }

  async listBackups(repository: string): Promise<StoredObject[]> {
    const folder = `${buildS3Key(this.prefix, "", repository)}/`;
    const objects: StoredObject[] = [];
    let continuationToken: string | undefined;

    try {
      do {
        const page = await this.api.listObjectsV2({
          Bucket: this.bucket,
          Prefix: folder,
          ContinuationToken: continuationToken,
        });

        for (const object of page.Contents ?? []) {
          if (!object.Key || !isKeyWithinPrefix(object.Key, folder)) continue;
          objects.push({
            key: object.Key,
            size: object.Size ?? 0,
            lastModified: object.LastModified ?? new Date(0),
          });
        }

        continuationToken = page.IsTruncated ? page.NextContinuationToken : undefined;
      } while (continuationToken);
    } catch (error) {
      throw new StorageError(`Failed to list backups for ${repository}: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    this.log.debug(`Found ${objects.length} objects for repository: ${repository}`);
    return objects;
  }
}
