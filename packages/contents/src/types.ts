/**
 * @bucketfs/contents: Types
 *
 * Contents models, save requests, hooks and the context shared by the
 * operation factories.
 */

import type { ObjectStore } from "@bucketfs/storage-core";
import type { BucketCache } from "./bucket-cache.ts";
import type { ContentsConfig } from "./config.ts";
import type { Logger } from "./logger.ts";
import type { NotebookDocument } from "./notebook.ts";
import type { NotebookNotary } from "./notary.ts";

// ============================================================================
// Models
// ============================================================================

export type FileFormat = "text" | "base64";

export type ContentType = "file" | "notebook" | "directory";

type ModelBase = {
  /** Display name (last path segment) */
  name: string;
  /** Full contents path, "<bucket>/<key>" */
  path: string;
  created: Date | null;
  lastModified: Date | null;
  mimetype: string | null;
  writable: boolean;
  /** Notebook validation message, when validation failed */
  message?: string;
};

export type FileModel = ModelBase & {
  type: "file";
  content: string | null;
  format: FileFormat | null;
};

export type NotebookModel = ModelBase & {
  type: "notebook";
  content: NotebookDocument | null;
  format: "json" | null;
};

export type DirectoryModel = ModelBase & {
  type: "directory";
  /** Content-less models of the visible children */
  content: ContentsModel[] | null;
  format: "json" | null;
};

export type ContentsModel = FileModel | NotebookModel | DirectoryModel;

export type GetOptions = {
  /** Include content (default: true) */
  content?: boolean;
  /** Expected type; inferred from the path when omitted */
  type?: ContentType;
  /** File decoding; text with base64 fallback when omitted */
  format?: FileFormat;
};

// ============================================================================
// Save
// ============================================================================

export type SaveRequest =
  | { type: "file"; content: string; format?: string }
  | { type: "notebook"; content: NotebookDocument }
  | { type: "directory" };

export type NewUntitledOptions = {
  type?: ContentType;
  /** Extension including the dot, e.g. ".txt" */
  ext?: string;
};

// ============================================================================
// Checkpoints
// ============================================================================

export type CheckpointModel = {
  id: string;
  lastModified: Date;
};

export type FileCheckpoint = {
  type: "file";
  content: string;
  format: FileFormat;
};

export type NotebookCheckpoint = {
  type: "notebook";
  content: NotebookDocument;
};

// ============================================================================
// Hooks
// ============================================================================

/** Runs before every save; a failure aborts the save */
export type PreSaveHook = (args: { path: string; model: SaveRequest }) => void | Promise<void>;

/** Runs after every successful save; failures are logged only */
export type PostSaveHook = (args: {
  path: string;
  model: ContentsModel;
  contents: ContentsApi;
}) => void | Promise<void>;

// ============================================================================
// Context
// ============================================================================

/**
 * Everything the operation factories share. Built once per service.
 */
export type ContentsContext = {
  store: ObjectStore;
  buckets: BucketCache;
  config: ContentsConfig;
  logger: Logger;
  notary: NotebookNotary;
  /** Visibility of a child's display name in directory listings */
  shouldList: (name: string) => boolean;
  /** Checkpoint id generator */
  generateId: () => string;
  hooks: {
    preSave?: PreSaveHook;
    postSave?: (args: { path: string; model: ContentsModel }) => void | Promise<void>;
  };
};

// ============================================================================
// Public API
// ============================================================================

export type ContentsApi = {
  /** True when the path's bucket is missing or inaccessible */
  isHidden: (path: string) => Promise<boolean>;
  fileExists: (path: string) => Promise<boolean>;
  dirExists: (path: string) => Promise<boolean>;
  get: (path: string, options?: GetOptions) => Promise<ContentsModel>;
  /** Validate and store a model; returns the content-less stored model */
  save: (model: unknown, path: string) => Promise<ContentsModel>;
  deletePath: (path: string) => Promise<void>;
  renamePath: (oldPath: string, newPath: string) => Promise<void>;
  newUntitled: (dirPath?: string, options?: NewUntitledOptions) => Promise<ContentsModel>;
  copyPath: (fromPath: string, toPath?: string) => Promise<ContentsModel>;

  createCheckpoint: (path: string) => Promise<CheckpointModel>;
  listCheckpoints: (path: string) => Promise<CheckpointModel[]>;
  restoreCheckpoint: (checkpointId: string, path: string) => Promise<void>;
  deleteCheckpoint: (checkpointId: string, path: string) => Promise<void>;
  renameCheckpoint: (checkpointId: string, oldPath: string, newPath: string) => Promise<void>;
};
