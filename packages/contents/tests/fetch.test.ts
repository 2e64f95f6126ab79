import type { MemoryObjectStore } from "@bucketfs/storage-memory";
import { beforeEach, describe, expect, it } from "vitest";
import { createFetchOps, type FetchOps } from "../src/fetch.ts";
import { createStore, createTestContext } from "./helpers.ts";

describe("fetch", () => {
  let store: MemoryObjectStore;
  let ops: FetchOps;

  beforeEach(async () => {
    store = await createStore({
      buckets: ["data", "empty"],
      objects: {
        "data/dir/": "",
        "data/dir/a.txt": "a",
        "data/dir/sub/b.txt": "b",
        "data/implicit/x.txt": "x",
        "data/top.txt": "top",
      },
    });
    ops = createFetchOps(createTestContext(store));
  });

  it("lists every bucket at the root", async () => {
    expect(await ops.fetch("")).toEqual({
      exists: true,
      kind: "root",
      buckets: ["data", "empty", "secret"],
    });
    expect(await ops.fetch("", false)).toEqual({ exists: true, kind: "root", buckets: null });
  });

  it("reports a forbidden bucket as opaque", async () => {
    expect(await ops.fetch("secret/any/thing")).toEqual({ exists: true, kind: "opaque" });
  });

  it("reports a missing bucket as not existing", async () => {
    expect(await ops.fetch("nope/dir/")).toEqual({ exists: false });
  });

  it("lists direct children of a directory", async () => {
    const result = await ops.fetch("data/dir/");
    if (!result.exists || result.kind !== "directory" || !result.listing) {
      throw new Error(`unexpected result ${JSON.stringify(result)}`);
    }
    expect(result.listing.objects.map((object) => object.key)).toEqual(["dir/", "dir/a.txt"]);
    expect(result.listing.folders).toEqual(["dir/sub"]);
  });

  it("finds directories without a marker", async () => {
    const result = await ops.fetch("data/implicit/", false);
    expect(result).toMatchObject({ exists: true, kind: "directory", listing: null });
  });

  it("short-circuits on a marker when no content is wanted", async () => {
    const before = store.calls.list;
    const result = await ops.fetch("data/dir/", false);
    expect(result).toMatchObject({ exists: true, kind: "directory", listing: null });
    expect(store.calls.list).toBe(before);
  });

  it("treats an empty prefix as missing", async () => {
    expect(await ops.fetch("data/missing/")).toEqual({ exists: false });
  });

  it("always finds the root of an existing bucket", async () => {
    const result = await ops.fetch("empty");
    expect(result).toMatchObject({
      exists: true,
      kind: "directory",
      listing: { objects: [], folders: [] },
    });
  });

  it("reads object metadata", async () => {
    const result = await ops.fetch("data/top.txt");
    expect(result).toMatchObject({
      exists: true,
      kind: "file",
      object: { bucket: "data", key: "top.txt", size: 3, contentType: null },
    });
  });

  it("only probes objects when no content is wanted", async () => {
    expect(await ops.fetch("data/top.txt", false)).toMatchObject({
      exists: true,
      kind: "file",
      object: null,
    });
    expect(await ops.fetch("data/nothing.txt", false)).toEqual({ exists: false });
    expect(await ops.fetch("data/nothing.txt")).toEqual({ exists: false });
  });

  it("evicts a bucket that vanished between lookup and listing", async () => {
    await ops.fetch("data/dir/");
    store.dropBucket("data");

    expect(await ops.fetch("data/dir/")).toEqual({ exists: false });

    const lookups = store.calls.getBucket;
    await ops.fetch("data/dir/");
    expect(store.calls.getBucket).toBe(lookups + 1);
  });
});

describe("fetch after a cached bucket vanished", () => {
  let store: MemoryObjectStore;
  let ops: FetchOps;

  beforeEach(async () => {
    store = await createStore({ objects: { "data/dir/a.txt": "a", "data/top.txt": "top" } });
    ops = createFetchOps(createTestContext(store));
    await ops.fetch("data/dir/");
    store.dropBucket("data");
  });

  it("reports a directory probe as missing and evicts the bucket", async () => {
    expect(await ops.fetch("data/dir/", false)).toEqual({ exists: false });

    const lookups = store.calls.getBucket;
    expect(await ops.fetch("data/dir/", false)).toEqual({ exists: false });
    expect(store.calls.getBucket).toBe(lookups + 1);
  });

  it("reports object probes as missing", async () => {
    expect(await ops.fetch("data/top.txt", false)).toEqual({ exists: false });
  });

  it("reports object reads as missing", async () => {
    expect(await ops.fetch("data/top.txt")).toEqual({ exists: false });
  });
});

describe("collectTree", () => {
  it("returns every key under a prefix at any depth", async () => {
    const store = await createStore({
      objects: {
        "data/dir/": "",
        "data/dir/a.txt": "a",
        "data/dir/sub/b.txt": "b",
        "data/dir/sub/deeper/c.txt": "c",
        "data/other.txt": "o",
      },
    });
    const ops = createFetchOps(createTestContext(store));
    const bucket = await store.getBucket("data");

    const keys = await ops.collectTree(bucket, "dir/");

    expect([...keys].sort()).toEqual([
      "dir/",
      "dir/a.txt",
      "dir/sub/b.txt",
      "dir/sub/deeper/c.txt",
    ]);
  });

  it("follows page tokens past the listing size", async () => {
    const objects: Record<string, string> = {};
    for (let i = 0; i < 7; i++) {
      objects[`data/dir/f${i}`] = String(i);
    }
    objects["data/dir/sub/g"] = "g";
    const store = await createStore({ objects });
    const ops = createFetchOps(createTestContext(store, { maxListSize: 2 }));

    const keys = await ops.collectTree(await store.getBucket("data"), "");

    expect([...keys].sort()).toEqual(store.keys("data"));
    expect(keys).toHaveLength(8);
  });
});
