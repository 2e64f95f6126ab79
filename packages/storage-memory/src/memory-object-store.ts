/**
 * In-Memory Object Store
 *
 * Useful for testing and local development. Mirrors the listing semantics
 * of real object stores: lexicographic order, delimiter collapsing,
 * maxResults counting objects and prefixes together, page tokens.
 */

import {
  type BucketHandle,
  type ListOptions,
  type ObjectListing,
  type ObjectStore,
  StorageError,
  type StoredObject,
} from "@bucketfs/storage-core";

/**
 * Memory object store configuration
 */
export type MemoryObjectStoreConfig = {
  /** Buckets to create up front */
  buckets?: string[];
  /** Bucket names that exist but deny access (getBucket fails with Forbidden) */
  forbidden?: string[];
  /** Clock used for `updated` timestamps */
  now?: () => Date;
};

type Entry = {
  data: Uint8Array;
  contentType: string | null;
  updated: Date;
};

type Bucket = Map<string, Entry>;

const BUCKET_NAME = /^[a-z0-9][a-z0-9._-]*$/;

/** One row of a listing before paging: either an object key or a collapsed prefix */
type ListingRow = { kind: "object"; key: string } | { kind: "prefix"; prefix: string };

const rowName = (row: ListingRow): string => (row.kind === "object" ? row.key : row.prefix);

/**
 * Create an in-memory object store with inspection methods
 */
export const createMemoryObjectStore = (config: MemoryObjectStoreConfig = {}) => {
  const now = config.now ?? (() => new Date());
  const buckets = new Map<string, Bucket>();
  const forbidden = new Set(config.forbidden ?? []);
  const calls = { getBucket: 0, list: 0 };

  for (const name of config.buckets ?? []) {
    buckets.set(name, new Map());
  }

  const requireBucket = (name: string): Bucket => {
    const bucket = buckets.get(name);
    if (!bucket) {
      throw new StorageError("NotFound", `Bucket not found: ${name}`);
    }
    return bucket;
  };

  const validateName = (name: string): void => {
    if (!BUCKET_NAME.test(name)) {
      throw new StorageError("BadRequest", `Invalid bucket name: ${JSON.stringify(name)}`);
    }
  };

  const toStored = (bucket: string, key: string, entry: Entry): StoredObject => ({
    bucket,
    key,
    size: entry.data.length,
    contentType: entry.contentType,
    updated: entry.updated,
  });

  const listRows = (bucket: Bucket, prefix: string, delimiter?: string): ListingRow[] => {
    const rows: ListingRow[] = [];
    const seenPrefixes = new Set<string>();
    const keys = [...bucket.keys()].filter((k) => k.startsWith(prefix)).sort();

    for (const key of keys) {
      const rest = key.slice(prefix.length);
      const cut = delimiter ? rest.indexOf(delimiter) : -1;
      if (delimiter && cut >= 0) {
        const common = prefix + rest.slice(0, cut + delimiter.length);
        if (!seenPrefixes.has(common)) {
          seenPrefixes.add(common);
          rows.push({ kind: "prefix", prefix: common });
        }
        continue;
      }
      rows.push({ kind: "object", key });
    }
    return rows.sort((a, b) => (rowName(a) < rowName(b) ? -1 : rowName(a) > rowName(b) ? 1 : 0));
  };

  const createHandle = (name: string): BucketHandle => {
    const handle: BucketHandle = {
      name,

      exists: async (key) => requireBucket(name).has(key),

      get: async (key) => {
        const entry = requireBucket(name).get(key);
        return entry ? toStored(name, key, entry) : null;
      },

      download: async (key) => {
        const entry = requireBucket(name).get(key);
        if (!entry) {
          throw new StorageError("NotFound", `No such object: ${name}/${key}`);
        }
        return entry.data.slice();
      },

      upload: async (key, data, contentType) => {
        const entry: Entry = { data: data.slice(), contentType: contentType ?? null, updated: now() };
        requireBucket(name).set(key, entry);
        return toStored(name, key, entry);
      },

      delete: async (key) => {
        const bucket = requireBucket(name);
        if (!bucket.delete(key)) {
          throw new StorageError("NotFound", `No such object: ${name}/${key}`);
        }
      },

      deleteMany: async (keys) => {
        const bucket = requireBucket(name);
        for (const key of keys) {
          bucket.delete(key);
        }
      },

      list: async (options: ListOptions): Promise<ObjectListing> => {
        calls.list++;
        const bucket = requireBucket(name);
        const rows = listRows(bucket, options.prefix, options.delimiter);
        const start = options.pageToken
          ? rows.findIndex((row) => rowName(row) > (options.pageToken ?? ""))
          : 0;
        const remaining = start < 0 ? [] : rows.slice(start);
        const page =
          options.maxResults !== undefined ? remaining.slice(0, options.maxResults) : remaining;
        const last = page[page.length - 1];
        const nextPageToken = last && page.length < remaining.length ? rowName(last) : null;

        const objects: StoredObject[] = [];
        const prefixes: string[] = [];
        for (const row of page) {
          if (row.kind === "prefix") {
            prefixes.push(row.prefix);
            continue;
          }
          const entry = bucket.get(row.key);
          if (entry) objects.push(toStored(name, row.key, entry));
        }
        return { objects, prefixes, nextPageToken };
      },

      rename: async (key, newKey) => {
        const bucket = requireBucket(name);
        const entry = bucket.get(key);
        if (!entry) {
          throw new StorageError("NotFound", `No such object: ${name}/${key}`);
        }
        const moved: Entry = { ...entry, updated: now() };
        bucket.delete(key);
        bucket.set(newKey, moved);
        return toStored(name, newKey, moved);
      },

      copy: async (key, target, targetKey) => {
        const entry = requireBucket(name).get(key);
        if (!entry) {
          throw new StorageError("NotFound", `No such object: ${name}/${key}`);
        }
        return target.upload(targetKey, entry.data, entry.contentType ?? undefined);
      },

      deleteBucket: async () => {
        const bucket = requireBucket(name);
        if (bucket.size > 0) {
          throw new StorageError("Conflict", `Bucket not empty: ${name}`);
        }
        buckets.delete(name);
      },
    };
    return handle;
  };

  const store: ObjectStore = {
    listBuckets: async () => [...buckets.keys(), ...forbidden].sort(),

    getBucket: async (name) => {
      calls.getBucket++;
      validateName(name);
      if (forbidden.has(name)) {
        throw new StorageError("Forbidden", `Access denied to bucket: ${name}`);
      }
      requireBucket(name);
      return createHandle(name);
    },

    createBucket: async (name) => {
      validateName(name);
      if (buckets.has(name) || forbidden.has(name)) {
        throw new StorageError("Conflict", `Bucket already exists: ${name}`);
      }
      buckets.set(name, new Map());
      return createHandle(name);
    },
  };

  return {
    ...store,
    /** Round-trip counters (getBucket, list) */
    calls,
    /** Whether a bucket exists */
    hasBucket: (name: string) => buckets.has(name),
    /** All keys of a bucket, sorted */
    keys: (bucket: string) => [...requireBucket(bucket).keys()].sort(),
    /** Raw content of an object, null if absent */
    read: (bucket: string, key: string) => buckets.get(bucket)?.get(key)?.data ?? null,
    /** Drop a bucket and everything in it, bypassing the API (simulates out-of-band deletion) */
    dropBucket: (name: string) => buckets.delete(name),
  };
};

export type MemoryObjectStore = ReturnType<typeof createMemoryObjectStore>;
