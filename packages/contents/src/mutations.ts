/**
 * @bucketfs/contents: Mutation engine
 *
 * Object writes plus the multi-object operations (delete, rename).
 * Delete and rename enumerate every affected key first and only then
 * touch the store, so a failure part-way reports exactly which keys were
 * left behind. There is no atomicity across keys.
 */

import { Buffer } from "node:buffer";
import type { BucketHandle, StoredObject } from "@bucketfs/storage-core";
import { ContentsError, contentsError, errorMessage } from "./errors.ts";
import type { FetchOps } from "./fetch.ts";
import { DIRECTORY_MIME } from "./models.ts";
import { NOTEBOOK_MIME, type NotebookDocument, serializeNotebook } from "./notebook.ts";
import { DELIMITER, ensureTrailingSlash, resolvePath, stripTrailingSlash } from "./paths.ts";
import type { ContentsContext } from "./types.ts";

const BASE64 = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

const encoder = new TextEncoder();

/** Decode saved file content; throws with the reason on malformed base64 */
const encodeContent = (content: string, format: "text" | "base64"): Uint8Array => {
  if (format === "text") return encoder.encode(content);
  const compact = content.replace(/\s+/g, "");
  if (!BASE64.test(compact)) {
    throw new Error("Invalid base64 content");
  }
  return Buffer.from(compact, "base64");
};

/** One planned object move */
type Move = { from: string; to: string };

// ============================================================================
// Mutation Operations Factory
// ============================================================================

export type MutationOps = ReturnType<typeof createMutationOps>;

export const createMutationOps = (ctx: ContentsContext, fetchOps: FetchOps) => {
  const { store, buckets, config, logger } = ctx;
  const { fetch, collectTree } = fetchOps;

  // ==========================================================================
  // Writes
  // ==========================================================================

  /**
   * writeNotebook: Serialize and upload a notebook.
   */
  const writeNotebook = async (path: string, nb: NotebookDocument): Promise<StoredObject> => {
    const { bucket: bucketName, key } = resolvePath(path);
    const bucket = await buckets.require(bucketName);
    return bucket.upload(key, encoder.encode(serializeNotebook(nb)), NOTEBOOK_MIME);
  };

  /**
   * writeFile: Upload file content given as text or base64.
   */
  const writeFile = async (
    path: string,
    content: string,
    format: string | undefined
  ): Promise<StoredObject> => {
    const { bucket: bucketName, key } = resolvePath(path);
    const bucket = await buckets.require(bucketName);

    if (format !== "text" && format !== "base64") {
      throw contentsError(
        "BAD_REQUEST",
        400,
        `Must specify format of file contents as "text" or "base64": ${path}`,
        { path, format }
      );
    }
    let data: Uint8Array;
    try {
      data = encodeContent(content, format);
    } catch (error: unknown) {
      throw contentsError("BAD_REQUEST", 400, `Encoding error saving ${path}: ${errorMessage(error)}`, {
        path,
      });
    }
    return bucket.upload(key, data);
  };

  /**
   * writeDirectory: Create a bucket (root level) or a directory marker.
   * Idempotent: an existing directory is left as it is.
   */
  const writeDirectory = async (path: string): Promise<void> => {
    const { bucket: bucketName, key } = resolvePath(path);

    if (key !== "") {
      const bucket = await buckets.require(bucketName);
      if (await bucket.exists(stripTrailingSlash(key))) {
        throw contentsError("BAD_REQUEST", 400, `Not a directory: ${path}`, { path });
      }
    }

    const existing = await fetch(path, false);
    if (existing.exists) {
      logger.debug(`Directory ${path} already exists`);
      return;
    }

    if (key === "") {
      await store.createBucket(bucketName);
      return;
    }
    const bucket = await buckets.require(bucketName);
    await bucket.upload(ensureTrailingSlash(key), new Uint8Array(0), DIRECTORY_MIME);
  };

  // ==========================================================================
  // Delete
  // ==========================================================================

  /**
   * Keys of the object at `key`, or of everything under `key/`.
   * A key ending in "/" never plans the object of the same name.
   */
  const planKeys = async (bucket: BucketHandle, key: string): Promise<string[]> => {
    const objectKey = stripTrailingSlash(key);
    if (objectKey !== key || !(await bucket.exists(objectKey))) {
      return collectTree(bucket, ensureTrailingSlash(objectKey));
    }
    return [objectKey];
  };

  const partialFailure = (
    action: string,
    pending: string[],
    completed: number,
    error: unknown
  ): ContentsError =>
    new ContentsError(
      "PARTIAL_FAILURE",
      500,
      `${action} failed after ${completed} of ${completed + pending.length} objects: ${errorMessage(error)}`,
      { pending, completed },
      { cause: error }
    );

  /** Delete keys in batches, reporting what was left on failure */
  const deleteKeys = async (bucket: BucketHandle, keys: string[], action: string) => {
    let done = 0;
    try {
      for (; done < keys.length; done += config.maxListSize) {
        await bucket.deleteMany(keys.slice(done, done + config.maxListSize));
      }
    } catch (error: unknown) {
      throw partialFailure(action, keys.slice(done), done, error);
    }
  };

  /**
   * deleteFile: Delete an object, a directory tree, or a whole bucket.
   */
  const deleteFile = async (path: string): Promise<void> => {
    const { bucket: bucketName, key } = resolvePath(path);
    const bucket = await buckets.require(bucketName);

    if (key === "") {
      const keys = await collectTree(bucket, "");
      await deleteKeys(bucket, keys, `Delete of ${path}`);
      await bucket.deleteBucket();
      buckets.evict(bucketName);
      logger.debug(`Deleted bucket ${bucketName} (${keys.length} objects)`);
      return;
    }

    const keys = await planKeys(bucket, key);
    if (keys.length === 0) {
      throw contentsError("NOT_FOUND", 404, `No such file or directory: ${path}`, { path });
    }
    await deleteKeys(bucket, keys, `Delete of ${path}`);
    logger.debug(`Deleted ${path} (${keys.length} objects)`);
  };

  // ==========================================================================
  // Rename
  // ==========================================================================

  /** An object or a directory at `key`; only a directory when it ends in "/" */
  const pathExists = async (bucket: BucketHandle, key: string): Promise<boolean> => {
    if (!key.endsWith(DELIMITER) && (await bucket.exists(key))) return true;
    const result = await fetch(`${bucket.name}${DELIMITER}${ensureTrailingSlash(key)}`, false);
    return result.exists;
  };

  /**
   * renameFile: Move an object or a directory tree, within one bucket
   * or across buckets.
   */
  const renameFile = async (oldPath: string, newPath: string): Promise<void> => {
    const from = resolvePath(oldPath);
    const to = resolvePath(newPath);
    if (from.key === "" || to.key === "") {
      throw contentsError("BAD_REQUEST", 400, `Can't rename a bucket: ${oldPath} -> ${newPath}`, {
        oldPath,
        newPath,
      });
    }

    const source = await buckets.require(from.bucket);
    const target = await buckets.require(to.bucket);
    const sameBucket = source.name === target.name;
    const fromKey = stripTrailingSlash(from.key);
    const toKey = stripTrailingSlash(to.key);
    if (sameBucket && fromKey === toKey) return;

    const keys = await planKeys(source, from.key);
    if (keys.length === 0) {
      throw contentsError("NOT_FOUND", 404, `No such file or directory: ${oldPath}`, {
        path: oldPath,
      });
    }
    if (sameBucket && toKey.startsWith(`${fromKey}${DELIMITER}`)) {
      throw contentsError("BAD_REQUEST", 400, `Cannot move ${oldPath} into itself`, {
        oldPath,
        newPath,
      });
    }
    if (await pathExists(target, to.key)) {
      throw contentsError("CONFLICT", 409, `File already exists: ${newPath}`, { path: newPath });
    }

    const moves: Move[] = keys.map((key) => ({ from: key, to: toKey + key.slice(fromKey.length) }));
    let done = 0;
    try {
      for (const move of moves) {
        if (sameBucket) {
          await source.rename(move.from, move.to);
        } else {
          await source.copy(move.from, target, move.to);
          await source.delete(move.from);
        }
        done++;
      }
    } catch (error: unknown) {
      throw partialFailure(
        `Rename of ${oldPath} to ${newPath}`,
        moves.slice(done).map((move) => move.from),
        done,
        error
      );
    }
    logger.debug(`Renamed ${oldPath} to ${newPath} (${moves.length} objects)`);
  };

  return { writeNotebook, writeFile, writeDirectory, deleteFile, renameFile };
};
