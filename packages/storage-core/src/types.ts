/**
 * Object store capability
 *
 * A flat bucket/object store: buckets hold byte blobs addressed by key.
 * There are no directories; hierarchy is simulated by callers through
 * delimiter-scoped prefix listings.
 */

/**
 * Metadata of a stored object
 */
export type StoredObject = {
  /** Bucket the object lives in */
  bucket: string;
  /** Object key within the bucket */
  key: string;
  /** Size in bytes */
  size: number;
  /** Content type as reported by the backend (null when unknown) */
  contentType: string | null;
  /** Last modification time */
  updated: Date;
};

/**
 * Options for a prefix listing
 */
export type ListOptions = {
  /** Only keys starting with this prefix are returned */
  prefix: string;
  /**
   * Hierarchy delimiter. Keys containing the delimiter after the prefix
   * collapse into a single common prefix entry.
   */
  delimiter?: string;
  /** Upper bound on objects + prefixes returned in one page */
  maxResults?: number;
  /** Resume token from a previous page */
  pageToken?: string;
};

/**
 * One page of a prefix listing
 */
export type ObjectListing = {
  objects: StoredObject[];
  /** Common prefixes, each including the trailing delimiter */
  prefixes: string[];
  /** Token for the next page, null when the listing is complete */
  nextPageToken: string | null;
};

/**
 * Handle to an existing bucket
 */
export type BucketHandle = {
  readonly name: string;

  /** Cheap existence probe for a single key */
  exists: (key: string) => Promise<boolean>;

  /**
   * Object metadata by key
   * Returns null if not found
   */
  get: (key: string) => Promise<StoredObject | null>;

  /** Object content; fails with NotFound when the key is absent */
  download: (key: string) => Promise<Uint8Array>;

  /** Create or overwrite an object */
  upload: (key: string, data: Uint8Array, contentType?: string) => Promise<StoredObject>;

  delete: (key: string) => Promise<void>;

  /** Bulk delete; missing keys are ignored */
  deleteMany: (keys: string[]) => Promise<void>;

  /** Prefix listing; fails with NotFound when the bucket itself vanished */
  list: (options: ListOptions) => Promise<ObjectListing>;

  /** Rename within this bucket */
  rename: (key: string, newKey: string) => Promise<StoredObject>;

  /** Copy to another (or the same) bucket */
  copy: (key: string, target: BucketHandle, targetKey: string) => Promise<StoredObject>;

  /** Delete the bucket itself (must be empty on most backends) */
  deleteBucket: () => Promise<void>;
};

/**
 * Object store entry point
 */
export type ObjectStore = {
  listBuckets: () => Promise<string[]>;

  /**
   * Look up a bucket.
   * Fails with a StorageError of kind NotFound, BadRequest or Forbidden.
   */
  getBucket: (name: string) => Promise<BucketHandle>;

  createBucket: (name: string) => Promise<BucketHandle>;
};
