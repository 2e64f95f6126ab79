import { describe, expect, it } from "vitest";
import { DEFAULT_CONTENTS_CONFIG, loadContentsConfig } from "../src/config.ts";
import { isContentsError } from "../src/errors.ts";

describe("loadContentsConfig", () => {
  it("falls back to defaults", () => {
    expect(loadContentsConfig({})).toEqual(DEFAULT_CONTENTS_CONFIG);
  });

  it("reads overrides from the environment", () => {
    const config = loadContentsConfig({
      BUCKETFS_MAX_LIST_SIZE: "50",
      BUCKETFS_CACHE_BUCKETS: "false",
      BUCKETFS_CHECKPOINT_BUCKET: "cps",
      BUCKETFS_ALLOW_HIDDEN: "yes",
      BUCKETFS_HIDE_GLOBS: "*.tmp, build,,",
      BUCKETFS_LOG_LEVEL: "debug",
      BUCKETFS_NOTARY_SECRET: "test-secret",
      BUCKETFS_S3_ENDPOINT: "http://localhost:9000",
      BUCKETFS_S3_FORCE_PATH_STYLE: "1",
    });

    expect(config).toMatchObject({
      maxListSize: 50,
      cacheBuckets: false,
      checkpointBucket: "cps",
      allowHidden: true,
      hideGlobs: ["*.tmp", "build"],
      logLevel: "debug",
      notarySecret: "test-secret",
      s3: { endpoint: "http://localhost:9000", forcePathStyle: true },
    });
  });

  it("names the offending variable", () => {
    let caught: unknown;
    try {
      loadContentsConfig({ BUCKETFS_MAX_LIST_SIZE: "zero" });
    } catch (error: unknown) {
      caught = error;
    }

    expect(isContentsError(caught)).toBe(true);
    expect(caught).toMatchObject({
      code: "BAD_REQUEST",
      details: { variable: "BUCKETFS_MAX_LIST_SIZE" },
    });
    expect(caught).toHaveProperty(
      "message",
      expect.stringMatching(/^Invalid configuration BUCKETFS_MAX_LIST_SIZE: /)
    );
  });

  it("rejects unknown log levels", () => {
    expect(() => loadContentsConfig({ BUCKETFS_LOG_LEVEL: "loud" })).toThrow(
      /^Invalid configuration BUCKETFS_LOG_LEVEL: /
    );
  });
});
