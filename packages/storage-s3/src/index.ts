/**
 * bucketfs Storage S3
 *
 * S3 object store for bucketfs.
 */

export { classifyS3Error, toStorageError } from "./s3-errors.ts";
export {
  chunk,
  createS3ObjectStore,
  DELETE_BATCH_SIZE,
  type S3ObjectStoreConfig,
  toCopySource,
} from "./s3-object-store.ts";
