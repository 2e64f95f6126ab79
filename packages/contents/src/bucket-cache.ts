/**
 * @bucketfs/contents: Bucket cache
 *
 * Memoizes bucket handles so repeated operations skip the existence
 * round-trip. Owned by one contents service; no cross-instance state.
 *
 * Only successful lookups are cached: a missing bucket is looked up again
 * on every call, since it may be created at any time.
 */

import { type BucketHandle, isStorageError, type ObjectStore } from "@bucketfs/storage-core";
import QuickLRU from "quick-lru";
import { contentsError } from "./errors.ts";

export type BucketCacheOptions = {
  store: ObjectStore;
  /** When false every lookup round-trips to the backend */
  enabled: boolean;
  maxSize: number;
};

export type BucketCache = {
  /**
   * Bucket handle, or null when the bucket does not exist or its name is
   * invalid. Forbidden propagates as a StorageError.
   */
  get: (name: string) => Promise<BucketHandle | null>;
  /** Like get, but a missing bucket fails with NOT_FOUND */
  require: (name: string) => Promise<BucketHandle>;
  /** Drop one entry (bucket deleted or found missing) */
  evict: (name: string) => void;
  clear: () => void;
  size: () => number;
};

export const createBucketCache = (options: BucketCacheOptions): BucketCache => {
  const { store, enabled } = options;
  const cache = new QuickLRU<string, BucketHandle>({ maxSize: options.maxSize });

  const lookup = async (name: string): Promise<BucketHandle | null> => {
    try {
      return await store.getBucket(name);
    } catch (error: unknown) {
      if (isStorageError(error, "NotFound") || isStorageError(error, "BadRequest")) {
        return null;
      }
      throw error;
    }
  };

  const get = async (name: string): Promise<BucketHandle | null> => {
    if (!enabled) return lookup(name);

    const cached = cache.get(name);
    if (cached) return cached;

    const bucket = await lookup(name);
    if (bucket) cache.set(name, bucket);
    return bucket;
  };

  const require = async (name: string): Promise<BucketHandle> => {
    const bucket = await get(name);
    if (!bucket) {
      throw contentsError("NOT_FOUND", 404, `No such bucket: ${name}`, { bucket: name });
    }
    return bucket;
  };

  return {
    get,
    require,
    evict: (name) => {
      cache.delete(name);
    },
    clear: () => cache.clear(),
    size: () => cache.size,
  };
};
