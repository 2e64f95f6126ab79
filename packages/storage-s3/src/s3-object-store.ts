/**
 * S3 Object Store
 *
 * Implements ObjectStore on @aws-sdk/client-s3. S3 has no native rename,
 * so rename is CopyObject followed by DeleteObject.
 */

import {
  CopyObjectCommand,
  CreateBucketCommand,
  DeleteBucketCommand,
  DeleteObjectCommand,
  DeleteObjectsCommand,
  GetObjectCommand,
  HeadBucketCommand,
  HeadObjectCommand,
  ListBucketsCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  S3Client,
  type S3ClientConfig,
} from "@aws-sdk/client-s3";
import {
  type BucketHandle,
  type ObjectListing,
  type ObjectStore,
  StorageError,
  type StoredObject,
} from "@bucketfs/storage-core";
import { classifyS3Error, toStorageError } from "./s3-errors.ts";

/**
 * S3 object store configuration
 */
export type S3ObjectStoreConfig = {
  /** AWS region (e.g. "us-west-2") */
  region?: string;
  /** Custom endpoint for S3-compatible services */
  endpoint?: string;
  /** Use path-style addressing (required by most S3-compatible services) */
  forcePathStyle?: boolean;
  /** Optional S3 client (for custom credentials or config) */
  client?: S3Client;
};

/** DeleteObjects accepts at most this many keys per request */
export const DELETE_BATCH_SIZE = 1000;

/** CopySource is "<bucket>/<key>" with the key URL-encoded segment by segment */
export const toCopySource = (bucket: string, key: string): string =>
  `${bucket}/${key.split("/").map(encodeURIComponent).join("/")}`;

export const chunk = <T>(items: T[], size: number): T[][] => {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
};

/**
 * Create an S3-backed object store
 */
export const createS3ObjectStore = (config: S3ObjectStoreConfig = {}): ObjectStore => {
  const clientConfig: S3ClientConfig = {};
  if (config.region) clientConfig.region = config.region;
  if (config.endpoint) clientConfig.endpoint = config.endpoint;
  if (config.forcePathStyle !== undefined) clientConfig.forcePathStyle = config.forcePathStyle;
  const client = config.client ?? new S3Client(clientConfig);

  const head = async (bucket: string, key: string): Promise<StoredObject | null> => {
    try {
      const result = await client.send(new HeadObjectCommand({ Bucket: bucket, Key: key }));
      return {
        bucket,
        key,
        size: result.ContentLength ?? 0,
        contentType: result.ContentType ?? null,
        updated: result.LastModified ?? new Date(0),
      };
    } catch (error: unknown) {
      if (classifyS3Error(error) === "NotFound") {
        return null;
      }
      throw toStorageError(error, `HeadObject ${bucket}/${key}`);
    }
  };

  const requireHead = async (bucket: string, key: string): Promise<StoredObject> => {
    const stored = await head(bucket, key);
    if (!stored) {
      throw new StorageError("NotFound", `Object vanished after write: ${bucket}/${key}`);
    }
    return stored;
  };

  const createHandle = (name: string): BucketHandle => {
    const handle: BucketHandle = {
      name,

      exists: async (key) => (await head(name, key)) !== null,

      get: (key) => head(name, key),

      download: async (key) => {
        try {
          const result = await client.send(new GetObjectCommand({ Bucket: name, Key: key }));
          if (!result.Body) {
            throw new StorageError("NotFound", `Empty body for ${name}/${key}`);
          }
          return new Uint8Array(await result.Body.transformToByteArray());
        } catch (error: unknown) {
          throw toStorageError(error, `GetObject ${name}/${key}`);
        }
      },

      upload: async (key, data, contentType) => {
        try {
          await client.send(
            new PutObjectCommand({
              Bucket: name,
              Key: key,
              Body: data,
              ContentType: contentType,
            })
          );
        } catch (error: unknown) {
          throw toStorageError(error, `PutObject ${name}/${key}`);
        }
        return requireHead(name, key);
      },

      delete: async (key) => {
        try {
          await client.send(new DeleteObjectCommand({ Bucket: name, Key: key }));
        } catch (error: unknown) {
          throw toStorageError(error, `DeleteObject ${name}/${key}`);
        }
      },

      deleteMany: async (keys) => {
        for (const batch of chunk(keys, DELETE_BATCH_SIZE)) {
          let failed: string[];
          try {
            const result = await client.send(
              new DeleteObjectsCommand({
                Bucket: name,
                Delete: { Objects: batch.map((Key) => ({ Key })), Quiet: true },
              })
            );
            failed = (result.Errors ?? [])
              .filter((e) => e.Code !== "NoSuchKey")
              .map((e) => `${e.Key ?? "?"} (${e.Code ?? "error"})`);
          } catch (error: unknown) {
            throw toStorageError(error, `DeleteObjects ${name}`);
          }
          if (failed.length > 0) {
            throw new StorageError("Unknown", `DeleteObjects ${name} failed for ${failed.join(", ")}`);
          }
        }
      },

      list: async (options): Promise<ObjectListing> => {
        try {
          const result = await client.send(
            new ListObjectsV2Command({
              Bucket: name,
              Prefix: options.prefix,
              Delimiter: options.delimiter,
              MaxKeys: options.maxResults,
              ContinuationToken: options.pageToken,
            })
          );
          const objects: StoredObject[] = [];
          for (const item of result.Contents ?? []) {
            if (item.Key === undefined) continue;
            objects.push({
              bucket: name,
              key: item.Key,
              size: item.Size ?? 0,
              contentType: null,
              updated: item.LastModified ?? new Date(0),
            });
          }
          const prefixes = (result.CommonPrefixes ?? []).flatMap((p) =>
            p.Prefix === undefined ? [] : [p.Prefix]
          );
          return {
            objects,
            prefixes,
            nextPageToken: result.IsTruncated ? (result.NextContinuationToken ?? null) : null,
          };
        } catch (error: unknown) {
          throw toStorageError(error, `ListObjectsV2 ${name}/${options.prefix}`);
        }
      },

      rename: async (key, newKey) => {
        const copied = await handle.copy(key, handle, newKey);
        await handle.delete(key);
        return copied;
      },

      copy: async (key, target, targetKey) => {
        try {
          await client.send(
            new CopyObjectCommand({
              Bucket: target.name,
              Key: targetKey,
              CopySource: toCopySource(name, key),
            })
          );
        } catch (error: unknown) {
          throw toStorageError(error, `CopyObject ${name}/${key} -> ${target.name}/${targetKey}`);
        }
        return requireHead(target.name, targetKey);
      },

      deleteBucket: async () => {
        try {
          await client.send(new DeleteBucketCommand({ Bucket: name }));
        } catch (error: unknown) {
          throw toStorageError(error, `DeleteBucket ${name}`);
        }
      },
    };
    return handle;
  };

  return {
    listBuckets: async () => {
      try {
        const result = await client.send(new ListBucketsCommand({}));
        return (result.Buckets ?? []).flatMap((b) => (b.Name === undefined ? [] : [b.Name]));
      } catch (error: unknown) {
        throw toStorageError(error, "ListBuckets");
      }
    },

    getBucket: async (name) => {
      try {
        await client.send(new HeadBucketCommand({ Bucket: name }));
      } catch (error: unknown) {
        throw toStorageError(error, `HeadBucket ${name}`);
      }
      return createHandle(name);
    },

    createBucket: async (name) => {
      try {
        await client.send(new CreateBucketCommand({ Bucket: name }));
      } catch (error: unknown) {
        throw toStorageError(error, `CreateBucket ${name}`);
      }
      return createHandle(name);
    },
  };
};
