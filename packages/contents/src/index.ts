/**
 * @bucketfs/contents
 *
 * Hierarchical contents API (files, notebooks, directories, checkpoints)
 * over a flat bucket/object store.
 *
 * A contents path is "<bucket>/<key>"; the empty path lists the buckets
 * and a trailing "/" marks a directory. Directories exist through their
 * children or through a zero-byte marker object "<key>/".
 *
 * @packageDocumentation
 */

// ============================================================================
// Service
// ============================================================================

export { type ContentsServiceOptions, createContentsService } from "./contents-service.ts";
export type {
  CheckpointModel,
  ContentsApi,
  ContentsModel,
  ContentType,
  DirectoryModel,
  FileCheckpoint,
  FileFormat,
  FileModel,
  GetOptions,
  NewUntitledOptions,
  NotebookCheckpoint,
  NotebookModel,
  PostSaveHook,
  PreSaveHook,
  SaveRequest,
} from "./types.ts";

// ============================================================================
// Building blocks
// ============================================================================

export { type BucketCache, createBucketCache } from "./bucket-cache.ts";
export {
  type ContentsConfig,
  DEFAULT_CONTENTS_CONFIG,
  DEFAULT_HIDE_GLOBS,
  loadContentsConfig,
  type S3Settings,
} from "./config.ts";
export {
  ContentsError,
  type ContentsErrorCode,
  contentsError,
  errorMessage,
  fromStorageError,
  isContentsError,
} from "./errors.ts";
export {
  createConsoleLogger,
  createTracer,
  describeValue,
  LOG_LEVELS,
  type Logger,
  type LogLevel,
  silentLogger,
} from "./logger.ts";
export {
  emptyNotebook,
  isRecord,
  NOTEBOOK_MIME,
  type NotebookDocument,
  parseNotebook,
  serializeNotebook,
  validateNotebook,
} from "./notebook.ts";
export { createNotebookNotary, type NotebookNotary } from "./notary.ts";
export {
  dirName,
  joinPath,
  objectName,
  objectPath,
  type ResolvedPath,
  resolvePath,
  splitExtension,
  trimSlashes,
} from "./paths.ts";
export { createVisibilityFilter } from "./visibility.ts";
