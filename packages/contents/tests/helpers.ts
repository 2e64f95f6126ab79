/**
 * Shared fixtures for contents tests
 */

import { createMemoryObjectStore, type MemoryObjectStore } from "@bucketfs/storage-memory";
import { vi } from "vitest";
import { createBucketCache } from "../src/bucket-cache.ts";
import { type ContentsConfig, DEFAULT_CONTENTS_CONFIG } from "../src/config.ts";
import { type ContentsServiceOptions, createContentsService } from "../src/contents-service.ts";
import type { Logger } from "../src/logger.ts";
import { silentLogger } from "../src/logger.ts";
import { createNotebookNotary } from "../src/notary.ts";
import type { ContentsContext } from "../src/types.ts";
import { createVisibilityFilter } from "../src/visibility.ts";

export const bytes = (text: string): Uint8Array => new TextEncoder().encode(text);

export const text = (data: Uint8Array | null): string | null =>
  data === null ? null : new TextDecoder().decode(data);

/** Deterministic UUID-shaped checkpoint ids */
export const sequentialIds = () => {
  let n = 0;
  return () => `00000000-0000-4000-8000-${String(++n).padStart(12, "0")}`;
};

export const checkpointId = (n: number): string =>
  `00000000-0000-4000-8000-${String(n).padStart(12, "0")}`;

/** Clock that advances one second per reading */
export const steppingClock = (start = Date.UTC(2024, 0, 1)) => {
  let t = start;
  return () => new Date((t += 1000));
};

/** Logger whose methods are vi.fn() spies */
export const spyLogger = () => ({
  debug: vi.fn<Logger["debug"]>(),
  info: vi.fn<Logger["info"]>(),
  warn: vi.fn<Logger["warn"]>(),
  error: vi.fn<Logger["error"]>(),
});

export type StoreSetup = {
  buckets?: string[];
  forbidden?: string[];
  /** "bucket/key" -> text content */
  objects?: Record<string, string>;
};

export const createStore = async (setup: StoreSetup = {}): Promise<MemoryObjectStore> => {
  const store = createMemoryObjectStore({
    buckets: setup.buckets ?? ["data"],
    forbidden: setup.forbidden ?? ["secret"],
    now: steppingClock(),
  });
  for (const [path, content] of Object.entries(setup.objects ?? {})) {
    const slash = path.indexOf("/");
    const bucket = await store.getBucket(path.slice(0, slash));
    await bucket.upload(path.slice(slash + 1), bytes(content));
  }
  return store;
};

/** Context for driving the operation factories directly */
export const createTestContext = (
  store: MemoryObjectStore,
  config: Partial<ContentsConfig> = {}
): ContentsContext => {
  const merged = { ...DEFAULT_CONTENTS_CONFIG, ...config };
  return {
    store,
    buckets: createBucketCache({
      store,
      enabled: merged.cacheBuckets,
      maxSize: merged.bucketCacheSize,
    }),
    config: merged,
    logger: silentLogger,
    notary: createNotebookNotary({ secret: "test-secret", logger: silentLogger }),
    shouldList: createVisibilityFilter(merged),
    generateId: sequentialIds(),
    hooks: {},
  };
};

/** Contents service over a fresh memory store */
export const setup = async (
  storeSetup: StoreSetup = {},
  options: Omit<ContentsServiceOptions, "store"> = {}
) => {
  const store = await createStore(storeSetup);
  const contents = createContentsService({
    logger: silentLogger,
    generateId: sequentialIds(),
    ...options,
    store,
  });
  return { store, contents };
};

/** Await a rejection and hand back the thrown value */
export const rejection = async (promise: Promise<unknown>): Promise<unknown> =>
  promise.then(
    () => {
      throw new Error("expected a rejection");
    },
    (error: unknown) => error
  );
