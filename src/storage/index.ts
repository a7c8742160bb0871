/**
 * Storage module exports
 */

export {
  buildS3Key,
  createS3Api,
  createS3Client,
  isKeyWithinPrefix,
  type S3Api,
  S3StorageGateway,
} from "./s3";
