import { createMemoryObjectStore } from "@bucketfs/storage-memory";
import { describe, expect, it } from "vitest";
import { createCheckpointOps } from "../src/checkpoints.ts";
import { createContentsService } from "../src/contents-service.ts";
import { createFetchOps } from "../src/fetch.ts";
import { createModelOps } from "../src/models.ts";
import { createMutationOps } from "../src/mutations.ts";
import { silentLogger } from "../src/logger.ts";
import { emptyNotebook } from "../src/notebook.ts";
import {
  bytes,
  checkpointId,
  createStore,
  createTestContext,
  rejection,
  sequentialIds,
  setup,
  text,
} from "./helpers.ts";

const textFile = (content: string) => ({ type: "file", content, format: "text" });

describe("checkpointPath", () => {
  const build = async (config: { checkpointBucket?: string; checkpointDir?: string } = {}) => {
    const ctx = createTestContext(await createStore(), config);
    const fetchOps = createFetchOps(ctx);
    return createCheckpointOps(ctx, {
      fetchOps,
      models: createModelOps(ctx, fetchOps),
      mutations: createMutationOps(ctx, fetchOps),
    });
  };

  it("places checkpoints next to the file", async () => {
    const ops = await build();

    expect(ops.checkpointPath("id1", "data/dir/a.txt")).toBe(
      "data/dir/.ipynb_checkpoints/a-id1.txt"
    );
    expect(ops.checkpointPath("id1", "/data/nb.ipynb")).toBe(
      "data/.ipynb_checkpoints/nb-id1.ipynb"
    );
    expect(ops.checkpointPath(null, "data/dir/a.txt")).toBe("data/dir/.ipynb_checkpoints/a");
  });

  it("honours the checkpoint bucket and directory", async () => {
    const ops = await build({ checkpointBucket: "cps", checkpointDir: ".versions" });

    expect(ops.checkpointPath("id1", "data/dir/a.txt")).toBe("cps/dir/.versions/a-id1.txt");
  });
});

describe("checkpoints", () => {
  it("stores a checkpoint under the derived key", async () => {
    const { store, contents } = await setup({ objects: { "data/dir/a.txt": "v1" } });

    const checkpoint = await contents.createCheckpoint("data/dir/a.txt");

    expect(checkpoint.id).toBe(checkpointId(1));
    expect(checkpoint.lastModified).toBeInstanceOf(Date);
    const key = `dir/.ipynb_checkpoints/a-${checkpointId(1)}.txt`;
    expect(store.keys("data")).toEqual([key, "dir/a.txt"]);
    expect(text(store.read("data", key))).toBe("v1");
  });

  it("lists the most recent checkpoint first", async () => {
    const { contents } = await setup({ objects: { "data/a.txt": "v1" } });

    const c1 = await contents.createCheckpoint("data/a.txt");
    const c2 = await contents.createCheckpoint("data/a.txt");

    const listed = await contents.listCheckpoints("data/a.txt");
    expect(listed.map((cp) => cp.id)).toEqual([c2.id, c1.id]);
  });

  it("does not pick up checkpoints of similarly named files", async () => {
    const { contents } = await setup({ objects: { "data/a.txt": "a", "data/a-b.txt": "ab" } });

    const own = await contents.createCheckpoint("data/a.txt");
    await contents.createCheckpoint("data/a-b.txt");

    expect(await contents.listCheckpoints("data/a.txt")).toEqual([own]);
  });

  it("lists checkpoints made with random ids", async () => {
    const store = await createStore({ objects: { "data/a.txt": "a" } });
    const contents = createContentsService({ store, logger: silentLogger });

    const checkpoint = await contents.createCheckpoint("data/a.txt");

    expect(await contents.listCheckpoints("data/a.txt")).toEqual([checkpoint]);
  });

  it("refuses generated ids that are not UUIDs", async () => {
    const { store, contents } = await setup(
      { objects: { "data/a.txt": "a" } },
      { generateId: () => "cp1" }
    );

    expect(await rejection(contents.createCheckpoint("data/a.txt"))).toMatchObject({
      code: "UNEXPECTED",
      status: 500,
      message: "Checkpoint id is not a UUID: cp1",
    });
    expect(store.keys("data")).toEqual(["a.txt"]);
  });

  it("ignores checkpoint-like keys without a UUID", async () => {
    const { contents } = await setup({
      objects: { "data/a.txt": "a", "data/.ipynb_checkpoints/a-cp1.txt": "old" },
    });

    expect(await contents.listCheckpoints("data/a.txt")).toEqual([]);
  });

  it("keeps key order for checkpoints with the same timestamp", async () => {
    const store = createMemoryObjectStore({
      buckets: ["data"],
      now: () => new Date(Date.UTC(2024, 0, 1)),
    });
    await (await store.getBucket("data")).upload("a.txt", bytes("a"));
    const contents = createContentsService({
      store,
      logger: silentLogger,
      generateId: sequentialIds(),
    });

    await contents.createCheckpoint("data/a.txt");
    await contents.createCheckpoint("data/a.txt");

    const listed = await contents.listCheckpoints("data/a.txt");
    expect(listed.map((cp) => cp.id)).toEqual([checkpointId(1), checkpointId(2)]);
  });

  it("lists nothing for a file without checkpoints or bucket", async () => {
    const { contents } = await setup({ objects: { "data/a.txt": "a" } });

    expect(await contents.listCheckpoints("data/a.txt")).toEqual([]);
    expect(await contents.listCheckpoints("nope/a.txt")).toEqual([]);
  });

  it("keeps checkpoints in the configured bucket", async () => {
    const { store, contents } = await setup(
      { buckets: ["data", "cps"], objects: { "data/a.txt": "a" } },
      { config: { checkpointBucket: "cps" } }
    );

    await contents.createCheckpoint("data/a.txt");

    expect(store.keys("cps")).toEqual([`.ipynb_checkpoints/a-${checkpointId(1)}.txt`]);
    expect(await contents.listCheckpoints("data/a.txt")).toHaveLength(1);
  });

  it("restores file content from a checkpoint", async () => {
    const { contents } = await setup({ objects: { "data/a.txt": "v1" } });
    const checkpoint = await contents.createCheckpoint("data/a.txt");
    await contents.save(textFile("v2"), "data/a.txt");

    await contents.restoreCheckpoint(checkpoint.id, "data/a.txt");

    expect(await contents.get("data/a.txt")).toMatchObject({ content: "v1" });
  });

  it("restores notebooks from a checkpoint", async () => {
    const { contents } = await setup();
    const first = emptyNotebook();
    first.metadata = { title: "first" };
    await contents.save({ type: "notebook", content: first }, "data/nb.ipynb");
    const [checkpoint] = await contents.listCheckpoints("data/nb.ipynb");
    await contents.save({ type: "notebook", content: emptyNotebook() }, "data/nb.ipynb");

    if (!checkpoint) throw new Error("expected a checkpoint");
    await contents.restoreCheckpoint(checkpoint.id, "data/nb.ipynb");

    const model = await contents.get("data/nb.ipynb");
    if (model.type !== "notebook" || !model.content) throw new Error("expected notebook content");
    expect(model.content.metadata).toEqual({ title: "first" });
  });

  it("fails with 404 for an unknown checkpoint", async () => {
    const { contents } = await setup({ objects: { "data/a.txt": "v1" } });
    const id = checkpointId(99);

    expect(await rejection(contents.restoreCheckpoint(id, "data/a.txt"))).toMatchObject({
      code: "NOT_FOUND",
      status: 404,
      message: `No such checkpoint: ${id} for data/a.txt`,
    });
    expect(await rejection(contents.deleteCheckpoint(id, "data/a.txt"))).toMatchObject({
      code: "NOT_FOUND",
    });
  });

  it("deletes a single checkpoint", async () => {
    const { contents } = await setup({ objects: { "data/a.txt": "v1" } });
    const c1 = await contents.createCheckpoint("data/a.txt");
    const c2 = await contents.createCheckpoint("data/a.txt");

    await contents.deleteCheckpoint(c1.id, "data/a.txt");

    expect(await contents.listCheckpoints("data/a.txt")).toEqual([c2]);
  });

  it("renames a checkpoint to another owner", async () => {
    const { contents } = await setup({ objects: { "data/a.txt": "v1", "data/b.txt": "v2" } });
    const checkpoint = await contents.createCheckpoint("data/a.txt");

    await contents.renameCheckpoint(checkpoint.id, "data/a.txt", "data/b.txt");

    expect(await contents.listCheckpoints("data/a.txt")).toEqual([]);
    expect((await contents.listCheckpoints("data/b.txt")).map((cp) => cp.id)).toEqual([
      checkpoint.id,
    ]);
  });

  it("creates exactly one checkpoint on the first notebook save", async () => {
    const { contents } = await setup();

    await contents.save({ type: "notebook", content: emptyNotebook() }, "data/nb.ipynb");
    expect(await contents.listCheckpoints("data/nb.ipynb")).toHaveLength(1);

    await contents.save({ type: "notebook", content: emptyNotebook() }, "data/nb.ipynb");
    expect(await contents.listCheckpoints("data/nb.ipynb")).toHaveLength(1);
  });

  it("does not checkpoint plain file saves", async () => {
    const { contents } = await setup();

    await contents.save(textFile("x"), "data/a.txt");

    expect(await contents.listCheckpoints("data/a.txt")).toEqual([]);
  });
});

describe("checkpoint cascade", () => {
  it("deleting a file deletes its checkpoints", async () => {
    const { store, contents } = await setup({ objects: { "data/a.txt": "v1", "data/b.txt": "b" } });
    await contents.createCheckpoint("data/a.txt");
    await contents.createCheckpoint("data/b.txt");

    await contents.deletePath("data/a.txt");

    expect(store.keys("data")).toEqual([`.ipynb_checkpoints/b-${checkpointId(2)}.txt`, "b.txt"]);
  });

  it("renaming a file renames its checkpoints", async () => {
    const { store, contents } = await setup({ objects: { "data/a.txt": "v1" } });
    const checkpoint = await contents.createCheckpoint("data/a.txt");

    await contents.renamePath("data/a.txt", "data/c.txt");

    expect(store.keys("data")).toEqual([`.ipynb_checkpoints/c-${checkpoint.id}.txt`, "c.txt"]);
    expect(await contents.listCheckpoints("data/c.txt")).toHaveLength(1);
  });

  it("directory moves carry the checkpoints inside them", async () => {
    const { store, contents } = await setup({ objects: { "data/dir/a.txt": "v1" } });
    const checkpoint = await contents.createCheckpoint("data/dir/a.txt");

    await contents.renamePath("data/dir", "data/moved");

    expect(store.keys("data")).toEqual([
      `moved/.ipynb_checkpoints/a-${checkpoint.id}.txt`,
      "moved/a.txt",
    ]);
    expect(await contents.listCheckpoints("data/moved/a.txt")).toHaveLength(1);
  });
});
