/**
 * bucketfs Storage Core
 *
 * Capability types and the error taxonomy shared by object-store providers.
 */

// Errors
export { isStorageError, StorageError, type StorageErrorKind } from "./errors.ts";
// Types
export type {
  BucketHandle,
  ListOptions,
  ObjectListing,
  ObjectStore,
  StoredObject,
} from "./types.ts";
