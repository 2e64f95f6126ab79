/**
 * Unit tests for createMemoryObjectStore
 *
 * Focus on the listing semantics the contents layer depends on:
 * delimiter collapsing, maxResults over objects + prefixes, paging.
 */
import { isStorageError } from "@bucketfs/storage-core";
import { beforeEach, describe, expect, it } from "vitest";
import { createMemoryObjectStore, type MemoryObjectStore } from "../src/index.ts";

const bytes = (text: string) => new TextEncoder().encode(text);

describe("createMemoryObjectStore", () => {
  let store: MemoryObjectStore;

  beforeEach(async () => {
    store = createMemoryObjectStore({ buckets: ["data"], forbidden: ["secret"] });
    const bucket = await store.getBucket("data");
    for (const key of ["dir/", "dir/a", "dir/b", "dir/sub/c", "dir/sub/d/e", "top.txt"]) {
      await bucket.upload(key, bytes(key));
    }
  });

  describe("getBucket", () => {
    it("fails with NotFound for a missing bucket", async () => {
      const error = await store.getBucket("nope").catch((e: unknown) => e);
      expect(isStorageError(error, "NotFound")).toBe(true);
    });

    it("fails with Forbidden for a denied bucket", async () => {
      const error = await store.getBucket("secret").catch((e: unknown) => e);
      expect(isStorageError(error, "Forbidden")).toBe(true);
    });

    it("fails with BadRequest for an invalid name", async () => {
      const error = await store.getBucket("Bad Name").catch((e: unknown) => e);
      expect(isStorageError(error, "BadRequest")).toBe(true);
    });
  });

  describe("list", () => {
    it("collapses deeper keys into prefixes with a delimiter", async () => {
      const bucket = await store.getBucket("data");
      const listing = await bucket.list({ prefix: "dir/", delimiter: "/" });
      expect(listing.objects.map((o) => o.key)).toEqual(["dir/", "dir/a", "dir/b"]);
      expect(listing.prefixes).toEqual(["dir/sub/"]);
      expect(listing.nextPageToken).toBeNull();
    });

    it("lists recursively without a delimiter", async () => {
      const bucket = await store.getBucket("data");
      const listing = await bucket.list({ prefix: "dir/sub/" });
      expect(listing.objects.map((o) => o.key)).toEqual(["dir/sub/c", "dir/sub/d/e"]);
      expect(listing.prefixes).toEqual([]);
    });

    it("pages through objects and prefixes together", async () => {
      const bucket = await store.getBucket("data");
      const first = await bucket.list({ prefix: "dir/", delimiter: "/", maxResults: 3 });
      expect(first.objects.map((o) => o.key)).toEqual(["dir/", "dir/a", "dir/b"]);
      expect(first.prefixes).toEqual([]);
      expect(first.nextPageToken).toBe("dir/b");

      const second = await bucket.list({
        prefix: "dir/",
        delimiter: "/",
        maxResults: 3,
        pageToken: first.nextPageToken ?? undefined,
      });
      expect(second.objects).toEqual([]);
      expect(second.prefixes).toEqual(["dir/sub/"]);
      expect(second.nextPageToken).toBeNull();
    });

    it("fails with NotFound once the bucket is dropped", async () => {
      const bucket = await store.getBucket("data");
      store.dropBucket("data");
      const error = await bucket.list({ prefix: "" }).catch((e: unknown) => e);
      expect(isStorageError(error, "NotFound")).toBe(true);
    });
  });

  describe("copy / rename", () => {
    it("copies across buckets keeping content type", async () => {
      await store.createBucket("archive");
      const data = await store.getBucket("data");
      const archive = await store.getBucket("archive");
      await data.upload("nb.ipynb", bytes("{}"), "application/x-ipynb+json");

      const copied = await data.copy("nb.ipynb", archive, "copy.ipynb");

      expect(copied.bucket).toBe("archive");
      expect(copied.contentType).toBe("application/x-ipynb+json");
      expect(store.keys("archive")).toEqual(["copy.ipynb"]);
      expect(await data.exists("nb.ipynb")).toBe(true);
    });

    it("renames within a bucket", async () => {
      const data = await store.getBucket("data");
      await data.rename("top.txt", "moved.txt");
      expect(await data.exists("top.txt")).toBe(false);
      expect(new TextDecoder().decode(store.read("data", "moved.txt") ?? new Uint8Array())).toBe(
        "top.txt"
      );
    });
  });

  describe("deleteBucket", () => {
    it("refuses to delete a non-empty bucket", async () => {
      const data = await store.getBucket("data");
      const error = await data.deleteBucket().catch((e: unknown) => e);
      expect(isStorageError(error, "Conflict")).toBe(true);
    });

    it("deletes an emptied bucket", async () => {
      const data = await store.getBucket("data");
      await data.deleteMany(store.keys("data"));
      await data.deleteBucket();
      expect(store.hasBucket("data")).toBe(false);
    });
  });
});
