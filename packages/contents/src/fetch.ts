/**
 * @bucketfs/contents: Fetch / listing engine
 *
 * Answers "does this path exist, and what is there" with at most one
 * listing per call. The empty path is the root of all buckets; a key that
 * is empty or ends in "/" is a directory, anything else an object.
 */

import { type BucketHandle, isStorageError, type StoredObject } from "@bucketfs/storage-core";
import { DELIMITER, resolvePath } from "./paths.ts";
import type { ContentsContext } from "./types.ts";

// ============================================================================
// Types
// ============================================================================

export type DirectoryListing = {
  /** Direct child objects (may include the directory's own marker) */
  objects: StoredObject[];
  /** Direct sub-prefixes without the trailing "/", e.g. "dir/sub" */
  folders: string[];
};

export type FetchResult =
  | { exists: false }
  | { exists: true; kind: "root"; buckets: string[] | null }
  /** The bucket denies access: it exists but nothing can be said about it */
  | { exists: true; kind: "opaque" }
  | { exists: true; kind: "directory"; bucket: BucketHandle; listing: DirectoryListing | null }
  | { exists: true; kind: "file"; bucket: BucketHandle; object: StoredObject | null };

const NOT_FOUND: FetchResult = { exists: false };

// ============================================================================
// Fetch Operations Factory
// ============================================================================

export type FetchOps = ReturnType<typeof createFetchOps>;

export const createFetchOps = (ctx: ContentsContext) => {
  const { store, buckets, config } = ctx;

  /**
   * fetch: Resolve a path to what exists there.
   *
   * Without content only existence is established: directories are
   * listed with a single result and objects are probed, not read.
   */
  const fetch = async (path: string, wantContent = true): Promise<FetchResult> => {
    if (path === "") {
      return {
        exists: true,
        kind: "root",
        buckets: wantContent ? await store.listBuckets() : null,
      };
    }

    const { bucket: bucketName, key } = resolvePath(path);
    let bucket: BucketHandle | null;
    try {
      bucket = await buckets.get(bucketName);
    } catch (error: unknown) {
      if (isStorageError(error, "Forbidden")) {
        return { exists: true, kind: "opaque" };
      }
      throw error;
    }
    if (!bucket) return NOT_FOUND;

    try {
      return await probe(bucket, key, wantContent);
    } catch (error: unknown) {
      // The bucket vanished after it was cached
      if (isStorageError(error, "NotFound")) {
        buckets.evict(bucketName);
        return NOT_FOUND;
      }
      throw error;
    }
  };

  const probe = async (
    bucket: BucketHandle,
    key: string,
    wantContent: boolean
  ): Promise<FetchResult> => {
    if (key === "" || key.endsWith(DELIMITER)) {
      if (key !== "" && !wantContent && (await bucket.exists(key))) {
        return { exists: true, kind: "directory", bucket, listing: null };
      }

      const page = await bucket.list({
        prefix: key,
        delimiter: DELIMITER,
        maxResults: wantContent ? config.maxListSize : 1,
      });
      const folders = page.prefixes.map((prefix) => prefix.slice(0, -DELIMITER.length));
      if (page.objects.length === 0 && folders.length === 0 && key !== "") {
        return NOT_FOUND;
      }
      return {
        exists: true,
        kind: "directory",
        bucket,
        listing: wantContent ? { objects: page.objects, folders } : null,
      };
    }

    if (!wantContent) {
      return (await bucket.exists(key))
        ? { exists: true, kind: "file", bucket, object: null }
        : NOT_FOUND;
    }
    const object = await bucket.get(key);
    return object ? { exists: true, kind: "file", bucket, object } : NOT_FOUND;
  };

  /**
   * collectTree: Every key under a prefix, at any depth.
   *
   * Walks delimiter listings level by level, following page tokens, so
   * the result is complete regardless of the listing page size.
   */
  const collectTree = async (bucket: BucketHandle, prefix: string): Promise<string[]> => {
    const keys: string[] = [];
    const pending = [prefix];

    for (let current = pending.shift(); current !== undefined; current = pending.shift()) {
      let pageToken: string | undefined;
      do {
        const page = await bucket.list({
          prefix: current,
          delimiter: DELIMITER,
          maxResults: config.maxListSize,
          pageToken,
        });
        keys.push(...page.objects.map((object) => object.key));
        pending.push(...page.prefixes);
        pageToken = page.nextPageToken ?? undefined;
      } while (pageToken !== undefined);
    }

    return keys;
  };

  return { fetch, collectTree };
};
