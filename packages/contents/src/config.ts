/**
 * @bucketfs/contents: Configuration
 *
 * Defaults plus an environment loader. Every option can also be passed
 * directly to createContentsService.
 */

import { z } from "zod";
import { contentsError } from "./errors.ts";
import { LOG_LEVELS, type LogLevel } from "./logger.ts";

export type S3Settings = {
  region?: string;
  endpoint?: string;
  forcePathStyle?: boolean;
};

export type ContentsConfig = {
  /** Upper bound for a single directory listing page */
  maxListSize: number;
  /** Cache bucket handles between calls */
  cacheBuckets: boolean;
  /** Maximum number of cached bucket handles */
  bucketCacheSize: number;
  /** Checkpoint directory name, relative to the file's own directory */
  checkpointDir: string;
  /** Bucket for all checkpoints; empty means "same bucket as the file" */
  checkpointBucket: string;
  untitledFile: string;
  untitledNotebook: string;
  untitledDirectory: string;
  /** List dot-names in directory listings */
  allowHidden: boolean;
  /** Glob patterns of names never listed */
  hideGlobs: string[];
  logLevel: LogLevel;
  /** HMAC key for notebook signatures; null generates a per-process key */
  notarySecret: string | null;
  s3: S3Settings;
};

export const DEFAULT_HIDE_GLOBS = [
  "__pycache__",
  "*.pyc",
  "*.pyo",
  ".DS_Store",
  "*.so",
  "*.dylib",
  "*~",
];

export const DEFAULT_CONTENTS_CONFIG: ContentsConfig = {
  maxListSize: 1024,
  cacheBuckets: true,
  bucketCacheSize: 1000,
  checkpointDir: ".ipynb_checkpoints",
  checkpointBucket: "",
  untitledFile: "untitled",
  untitledNotebook: "Untitled",
  untitledDirectory: "untitled-folder",
  allowHidden: false,
  hideGlobs: DEFAULT_HIDE_GLOBS,
  logLevel: "info",
  notarySecret: null,
  s3: {},
};

// ============================================================================
// Environment loader
// ============================================================================

const flag = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((value) => value === "true" || value === "1" || value === "yes");

const name = z.string().min(1);

const envSchema = z.object({
  BUCKETFS_MAX_LIST_SIZE: z.coerce.number().int().positive().optional(),
  BUCKETFS_CACHE_BUCKETS: flag.optional(),
  BUCKETFS_BUCKET_CACHE_SIZE: z.coerce.number().int().positive().optional(),
  BUCKETFS_CHECKPOINT_DIR: name.optional(),
  BUCKETFS_CHECKPOINT_BUCKET: z.string().optional(),
  BUCKETFS_UNTITLED_FILE: name.optional(),
  BUCKETFS_UNTITLED_NOTEBOOK: name.optional(),
  BUCKETFS_UNTITLED_DIRECTORY: name.optional(),
  BUCKETFS_ALLOW_HIDDEN: flag.optional(),
  BUCKETFS_HIDE_GLOBS: z.string().optional(),
  BUCKETFS_LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  BUCKETFS_NOTARY_SECRET: name.optional(),
  BUCKETFS_S3_REGION: name.optional(),
  BUCKETFS_S3_ENDPOINT: z.string().url().optional(),
  BUCKETFS_S3_FORCE_PATH_STYLE: flag.optional(),
});

const splitGlobs = (value: string): string[] =>
  value
    .split(",")
    .map((glob) => glob.trim())
    .filter((glob) => glob.length > 0);

/**
 * Build a ContentsConfig from environment variables.
 * Unset variables keep their defaults; invalid ones fail with BAD_REQUEST.
 */
export function loadContentsConfig(
  env: Record<string, string | undefined> = process.env
): ContentsConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const variable = issue ? String(issue.path[0]) : "environment";
    throw contentsError(
      "BAD_REQUEST",
      400,
      `Invalid configuration ${variable}: ${issue?.message ?? "invalid value"}`,
      { variable }
    );
  }
  const e = parsed.data;
  const d = DEFAULT_CONTENTS_CONFIG;

  return {
    maxListSize: e.BUCKETFS_MAX_LIST_SIZE ?? d.maxListSize,
    cacheBuckets: e.BUCKETFS_CACHE_BUCKETS ?? d.cacheBuckets,
    bucketCacheSize: e.BUCKETFS_BUCKET_CACHE_SIZE ?? d.bucketCacheSize,
    checkpointDir: e.BUCKETFS_CHECKPOINT_DIR ?? d.checkpointDir,
    checkpointBucket: e.BUCKETFS_CHECKPOINT_BUCKET ?? d.checkpointBucket,
    untitledFile: e.BUCKETFS_UNTITLED_FILE ?? d.untitledFile,
    untitledNotebook: e.BUCKETFS_UNTITLED_NOTEBOOK ?? d.untitledNotebook,
    untitledDirectory: e.BUCKETFS_UNTITLED_DIRECTORY ?? d.untitledDirectory,
    allowHidden: e.BUCKETFS_ALLOW_HIDDEN ?? d.allowHidden,
    hideGlobs:
      e.BUCKETFS_HIDE_GLOBS !== undefined ? splitGlobs(e.BUCKETFS_HIDE_GLOBS) : d.hideGlobs,
    logLevel: e.BUCKETFS_LOG_LEVEL ?? d.logLevel,
    notarySecret: e.BUCKETFS_NOTARY_SECRET ?? d.notarySecret,
    s3: {
      region: e.BUCKETFS_S3_REGION,
      endpoint: e.BUCKETFS_S3_ENDPOINT,
      forcePathStyle: e.BUCKETFS_S3_FORCE_PATH_STYLE,
    },
  };
}
