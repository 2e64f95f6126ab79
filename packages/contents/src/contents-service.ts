/**
 * @bucketfs/contents: Contents service
 *
 * Wires the operation factories over one object store and exposes the
 * public contents API. Every public operation is traced at debug level
 * and backend storage errors are mapped to contents errors naming the
 * path.
 */

import { randomUUID } from "node:crypto";
import type { ObjectStore } from "@bucketfs/storage-core";
import { createBucketCache } from "./bucket-cache.ts";
import { createCheckpointOps } from "./checkpoints.ts";
import { type ContentsConfig, DEFAULT_CONTENTS_CONFIG } from "./config.ts";
import { contentsError, fromStorageError } from "./errors.ts";
import { createFetchOps } from "./fetch.ts";
import { createConsoleLogger, createTracer, type Logger } from "./logger.ts";
import { createModelOps } from "./models.ts";
import { createMutationOps } from "./mutations.ts";
import { emptyNotebook } from "./notebook.ts";
import { createNotebookNotary, type NotebookNotary } from "./notary.ts";
import {
  DELIMITER,
  ensureTrailingSlash,
  joinPath,
  objectName,
  resolvePath,
  splitExtension,
  stripLeadingSlash,
  trimSlashes,
} from "./paths.ts";
import { createSaveOps } from "./save.ts";
import type {
  CheckpointModel,
  ContentsApi,
  ContentsContext,
  ContentsModel,
  ContentType,
  NewUntitledOptions,
  PostSaveHook,
  PreSaveHook,
  SaveRequest,
} from "./types.ts";
import { createVisibilityFilter } from "./visibility.ts";

export type ContentsServiceOptions = {
  store: ObjectStore;
  /** Overrides on top of DEFAULT_CONTENTS_CONFIG */
  config?: Partial<ContentsConfig>;
  logger?: Logger;
  notary?: NotebookNotary;
  /** Replaces the visibility filter built from allowHidden / hideGlobs */
  shouldList?: (name: string) => boolean;
  preSaveHook?: PreSaveHook;
  postSaveHook?: PostSaveHook;
  /** Checkpoint id generator; ids must be UUIDs (default: random UUID) */
  generateId?: () => string;
};

const COPY_SUFFIX = /-Copy\d*\./;

/**
 * Create a contents service over an object store.
 */
export const createContentsService = (options: ContentsServiceOptions): ContentsApi => {
  const config: ContentsConfig = { ...DEFAULT_CONTENTS_CONFIG, ...options.config };
  const logger = options.logger ?? createConsoleLogger({ level: config.logLevel });
  const { postSaveHook } = options;

  const ctx: ContentsContext = {
    store: options.store,
    buckets: createBucketCache({
      store: options.store,
      enabled: config.cacheBuckets,
      maxSize: config.bucketCacheSize,
    }),
    config,
    logger,
    notary: options.notary ?? createNotebookNotary({ secret: config.notarySecret, logger }),
    shouldList: options.shouldList ?? createVisibilityFilter(config),
    generateId: options.generateId ?? randomUUID,
    hooks: {
      preSave: options.preSaveHook,
      postSave: postSaveHook ? (args) => postSaveHook({ ...args, contents: api }) : undefined,
    },
  };

  const fetchOps = createFetchOps(ctx);
  const models = createModelOps(ctx, fetchOps);
  const mutations = createMutationOps(ctx, fetchOps);
  const checkpoints = createCheckpointOps(ctx, { fetchOps, models, mutations });
  const { save } = createSaveOps(ctx, { models, mutations, checkpoints });
  const traced = createTracer(logger);

  // ==========================================================================
  // Existence
  // ==========================================================================

  const fileExists = async (rawPath: string): Promise<boolean> => {
    const path = stripLeadingSlash(rawPath);
    if (path === "") return false;
    const { bucket: bucketName, key } = resolvePath(path);
    if (key === "" || key.endsWith(DELIMITER)) return false;
    const result = await fetchOps.fetch(`${bucketName}${DELIMITER}${key}`, false);
    return result.exists && result.kind === "file";
  };

  const dirExists = async (rawPath: string): Promise<boolean> => {
    const path = stripLeadingSlash(rawPath);
    if (path === "") return true;
    return (await fetchOps.fetch(ensureTrailingSlash(path), false)).exists;
  };

  const exists = async (path: string): Promise<boolean> =>
    (await fileExists(path)) || (await dirExists(path));

  /**
   * First free name in `dir`: "untitled.txt", "untitled1.txt", ...
   * `insert` goes between the base name and the counter.
   */
  const incrementFilename = async (filename: string, dir: string, insert = ""): Promise<string> => {
    const { base, ext } = splitExtension(filename);
    for (let i = 0; ; i++) {
      const name = i === 0 ? `${base}${ext}` : `${base}${insert}${i}${ext}`;
      if (!(await exists(joinPath(dir, name)))) return name;
    }
  };

  // ==========================================================================
  // Delete / Rename
  // ==========================================================================

  /** A trailing "/" limits the delete to the directory of that name */
  const deletePath = async (rawPath: string): Promise<void> => {
    const path = stripLeadingSlash(rawPath);
    if (path === "") {
      throw contentsError("BAD_REQUEST", 400, "Can't delete root", { path });
    }
    const isFile = await fileExists(path);
    await mutations.deleteFile(path);
    if (isFile) {
      await checkpoints.deleteAllCheckpoints(path);
    }
  };

  const renamePath = async (rawOld: string, rawNew: string): Promise<void> => {
    const oldPath = stripLeadingSlash(rawOld);
    const newPath = stripLeadingSlash(rawNew);
    if (oldPath === newPath) return;
    const isFile = await fileExists(oldPath);
    await mutations.renameFile(oldPath, newPath);
    if (isFile) {
      await checkpoints.renameAllCheckpoints(oldPath, newPath);
    }
  };

  // ==========================================================================
  // New / Copy
  // ==========================================================================

  const untitledRequest = (
    type: ContentType,
    ext: string
  ): { request: SaveRequest; filename: string; insert: string } => {
    if (type === "directory") {
      return { request: { type }, filename: config.untitledDirectory, insert: " " };
    }
    if (type === "notebook") {
      return {
        request: { type, content: emptyNotebook() },
        filename: `${config.untitledNotebook}${ext || ".ipynb"}`,
        insert: "",
      };
    }
    return {
      request: { type, content: "", format: "text" },
      filename: `${config.untitledFile}${ext}`,
      insert: "",
    };
  };

  /**
   * Create "untitled" content in a directory under the first free name.
   * The type defaults to notebook for ".ipynb", file otherwise.
   */
  const newUntitled = async (
    rawDir = "",
    { type, ext = "" }: NewUntitledOptions = {}
  ): Promise<ContentsModel> => {
    const dir = trimSlashes(rawDir);
    if (!(await dirExists(dir))) {
      throw contentsError("NOT_FOUND", 404, `No such directory: ${dir}`, { path: dir });
    }
    const { request, filename, insert } = untitledRequest(
      type ?? (ext === ".ipynb" ? "notebook" : "file"),
      ext
    );
    return save(request, joinPath(dir, await incrementFilename(filename, dir, insert)));
  };

  /**
   * Copy a file or notebook. When `toPath` is a directory (default: the
   * source's own directory) the copy is named "<base>-Copy<n><ext>".
   */
  const copyPath = async (rawFrom: string, rawTo?: string): Promise<ContentsModel> => {
    const fromPath = trimSlashes(rawFrom);
    const model = await models.get(fromPath);
    if (model.type === "directory") {
      throw contentsError("BAD_REQUEST", 400, `Can't copy directories: ${fromPath}`, {
        path: fromPath,
      });
    }
    if (model.content === null) {
      throw contentsError("NOT_FOUND", 404, `No such file: ${fromPath}`, { path: fromPath });
    }
    const request: SaveRequest =
      model.type === "notebook"
        ? { type: "notebook", content: model.content }
        : { type: "file", content: model.content, format: model.format ?? "text" };

    const fromDir = fromPath.slice(0, fromPath.lastIndexOf(DELIMITER) + 1);
    const toPath = trimSlashes(rawTo ?? fromDir);
    if (await dirExists(toPath)) {
      const name = objectName(fromPath).replace(COPY_SUFFIX, ".");
      return save(request, joinPath(toPath, await incrementFilename(name, toPath, "-Copy")));
    }
    return save(request, toPath);
  };

  // ==========================================================================
  // Checkpoints
  // ==========================================================================

  const createCheckpoint = async (path: string): Promise<CheckpointModel> => {
    const model = await models.get(path);
    if (model.type === "notebook" && model.content !== null) {
      return checkpoints.createNotebookCheckpoint(model.content, model.path);
    }
    if (model.type === "file" && model.content !== null && model.format !== null) {
      return checkpoints.createFileCheckpoint(model.content, model.format, model.path);
    }
    throw contentsError("BAD_REQUEST", 400, `Can't create a checkpoint of ${path}`, { path });
  };

  const restoreCheckpoint = async (checkpointId: string, path: string): Promise<void> => {
    const model = await models.get(path, { content: false });
    if (model.type === "notebook") {
      const checkpoint = await checkpoints.getNotebookCheckpoint(checkpointId, path);
      await save(checkpoint, path);
      return;
    }
    if (model.type === "file") {
      const checkpoint = await checkpoints.getFileCheckpoint(checkpointId, path);
      await save(checkpoint, path);
      return;
    }
    throw contentsError("BAD_REQUEST", 400, `Can't restore a checkpoint of ${path}`, { path });
  };

  // ==========================================================================
  // Public API
  // ==========================================================================

  /**
   * Trace an operation and translate storage errors, naming the path
   * found at `pathIndex` among its arguments.
   */
  const expose = <A extends unknown[], R>(
    name: string,
    fn: (...args: A) => Promise<R>,
    pathIndex = 0
  ) =>
    traced(name, async (...args: A): Promise<R> => {
      try {
        return await fn(...args);
      } catch (error: unknown) {
        const path = args[pathIndex];
        throw fromStorageError(error, typeof path === "string" ? path : "");
      }
    });

  const api: ContentsApi = {
    isHidden: expose("isHidden", models.isHidden),
    fileExists: expose("fileExists", fileExists),
    dirExists: expose("dirExists", dirExists),
    get: expose("get", models.get),
    save: expose("save", save, 1),
    deletePath: expose("deletePath", deletePath),
    renamePath: expose("renamePath", renamePath),
    newUntitled: expose("newUntitled", newUntitled),
    copyPath: expose("copyPath", copyPath),
    createCheckpoint: expose("createCheckpoint", createCheckpoint),
    listCheckpoints: expose("listCheckpoints", checkpoints.listCheckpoints),
    restoreCheckpoint: expose("restoreCheckpoint", restoreCheckpoint, 1),
    deleteCheckpoint: expose("deleteCheckpoint", checkpoints.deleteCheckpoint, 1),
    renameCheckpoint: expose("renameCheckpoint", checkpoints.renameCheckpoint, 1),
  };

  return api;
};
