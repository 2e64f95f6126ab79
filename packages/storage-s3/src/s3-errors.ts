/**
 * Map AWS SDK failures onto the storage error taxonomy.
 */

import { S3ServiceException } from "@aws-sdk/client-s3";
import { StorageError, type StorageErrorKind } from "@bucketfs/storage-core";

const NOT_FOUND_NAMES = new Set(["NotFound", "NoSuchBucket", "NoSuchKey"]);
const FORBIDDEN_NAMES = new Set(["AccessDenied", "Forbidden", "AllAccessDisabled"]);
const BAD_REQUEST_NAMES = new Set(["InvalidBucketName", "BadRequest", "InvalidArgument"]);
const CONFLICT_NAMES = new Set([
  "BucketAlreadyExists",
  "BucketAlreadyOwnedByYou",
  "BucketNotEmpty",
]);

/**
 * Classify an error thrown by the S3 client.
 * Errors that are not service exceptions (network, abort) map to Unknown.
 */
export const classifyS3Error = (error: unknown): StorageErrorKind => {
  if (!(error instanceof S3ServiceException)) return "Unknown";
  if (NOT_FOUND_NAMES.has(error.name)) return "NotFound";
  if (FORBIDDEN_NAMES.has(error.name)) return "Forbidden";
  if (BAD_REQUEST_NAMES.has(error.name)) return "BadRequest";
  if (CONFLICT_NAMES.has(error.name)) return "Conflict";

  switch (error.$metadata?.httpStatusCode) {
    case 400:
      return "BadRequest";
    case 403:
      return "Forbidden";
    case 404:
      return "NotFound";
    case 409:
      return "Conflict";
    default:
      return "Unknown";
  }
};

/**
 * Wrap any S3 failure into a StorageError (already-wrapped errors pass through)
 */
export const toStorageError = (error: unknown, context: string): StorageError => {
  if (error instanceof StorageError) return error;
  const detail = error instanceof Error ? error.message : String(error);
  return new StorageError(classifyS3Error(error), `${context}: ${detail}`, { cause: error });
};
