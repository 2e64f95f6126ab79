/**
 * @bucketfs/contents: Checkpoints
 *
 * A checkpoint is a snapshot of a file stored next to it:
 *
 *   <bucket>/<dir>/<checkpointDir>/<base>-<id><ext>
 *
 * With `checkpointBucket` set, every checkpoint goes to that bucket under
 * the same relative key instead.
 */

import { isStorageError, type StoredObject } from "@bucketfs/storage-core";
import { contentsError } from "./errors.ts";
import type { FetchOps } from "./fetch.ts";
import type { ModelOps } from "./models.ts";
import type { MutationOps } from "./mutations.ts";
import type { NotebookDocument } from "./notebook.ts";
import { DELIMITER, resolvePath, splitExtension, stripLeadingSlash } from "./paths.ts";
import type {
  CheckpointModel,
  ContentsContext,
  FileCheckpoint,
  NotebookCheckpoint,
} from "./types.ts";

/**
 * Checkpoint ids are UUIDs. The fixed shape is what tells the checkpoints
 * of "a.txt" ("a-<id>.txt") apart from those of "a-b.txt" ("a-b-<id>.txt").
 */
export const CHECKPOINT_ID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export type CheckpointDeps = {
  fetchOps: FetchOps;
  models: ModelOps;
  mutations: MutationOps;
};

// ============================================================================
// Checkpoint Operations Factory
// ============================================================================

export type CheckpointOps = ReturnType<typeof createCheckpointOps>;

export const createCheckpointOps = (ctx: ContentsContext, deps: CheckpointDeps) => {
  const { buckets, config, logger, generateId } = ctx;
  const { fetchOps, models, mutations } = deps;

  /**
   * Contents path of checkpoint `id` of `path`; with a null id, the common
   * prefix of all its checkpoints (without the "-").
   */
  const checkpointPath = (id: string | null, path: string): string => {
    const resolved = resolvePath(stripLeadingSlash(path));
    const bucket = config.checkpointBucket || resolved.bucket;
    const slash = resolved.key.lastIndexOf(DELIMITER) + 1;
    const dir = resolved.key.slice(0, slash);
    const { base, ext } = splitExtension(resolved.key.slice(slash));
    const prefix = `${bucket}${DELIMITER}${dir}${config.checkpointDir}${DELIMITER}${base}`;
    return id === null ? prefix : `${prefix}-${id}${ext}`;
  };

  const toModel = (id: string, object: StoredObject): CheckpointModel => ({
    id,
    lastModified: object.updated,
  });

  const nextId = (): string => {
    const id = generateId();
    if (!CHECKPOINT_ID.test(id)) {
      throw contentsError("UNEXPECTED", 500, `Checkpoint id is not a UUID: ${id}`, {
        checkpointId: id,
      });
    }
    return id;
  };

  const requireCheckpoint = async (id: string, path: string): Promise<StoredObject> => {
    const result = await fetchOps.fetch(checkpointPath(id, path));
    if (!result.exists || result.kind !== "file" || !result.object) {
      throw contentsError("NOT_FOUND", 404, `No such checkpoint: ${id} for ${path}`, {
        checkpointId: id,
        path,
      });
    }
    return result.object;
  };

  // ==========================================================================
  // Create / Get
  // ==========================================================================

  const createFileCheckpoint = async (
    content: string,
    format: string,
    path: string
  ): Promise<CheckpointModel> => {
    const id = nextId();
    const cp = checkpointPath(id, path);
    logger.debug(`Creating checkpoint ${id} for ${path} as ${cp}`);
    return toModel(id, await mutations.writeFile(cp, content, format));
  };

  const createNotebookCheckpoint = async (
    nb: NotebookDocument,
    path: string
  ): Promise<CheckpointModel> => {
    const id = nextId();
    const cp = checkpointPath(id, path);
    logger.debug(`Creating checkpoint ${id} for ${path} as ${cp}`);
    return toModel(id, await mutations.writeNotebook(cp, nb));
  };

  const getFileCheckpoint = async (id: string, path: string): Promise<FileCheckpoint> => {
    logger.info(`Restoring ${path} from checkpoint ${id}`);
    const object = await requireCheckpoint(id, path);
    const { content, format } = await models.readFile(object);
    return { type: "file", content, format };
  };

  const getNotebookCheckpoint = async (id: string, path: string): Promise<NotebookCheckpoint> => {
    logger.info(`Restoring ${path} from checkpoint ${id}`);
    const object = await requireCheckpoint(id, path);
    return { type: "notebook", content: await models.readNotebook(object) };
  };

  // ==========================================================================
  // List / Delete / Rename
  // ==========================================================================

  /**
   * listCheckpoints: All checkpoints of a path, most recent first.
   * Only keys shaped exactly "<base>-<id><ext>" count, so "a.txt" does
   * not pick up the checkpoints of "a-b.txt". Checkpoints with the same
   * timestamp keep key order; S3 timestamps have one-second resolution.
   */
  const listCheckpoints = async (path: string): Promise<CheckpointModel[]> => {
    const resolved = resolvePath(checkpointPath(null, path));
    const { ext } = splitExtension(resolvePath(stripLeadingSlash(path)).key);
    const prefix = `${resolved.key}-`;

    const bucket = await buckets.get(resolved.bucket);
    if (!bucket) return [];

    const checkpoints: CheckpointModel[] = [];
    let pageToken: string | undefined;
    try {
      do {
        const page = await bucket.list({
          prefix,
          delimiter: DELIMITER,
          maxResults: config.maxListSize,
          pageToken,
        });
        for (const object of page.objects) {
          const rest = object.key.slice(prefix.length);
          const id = rest.slice(0, rest.length - ext.length);
          if (rest.endsWith(ext) && CHECKPOINT_ID.test(id)) {
            checkpoints.push(toModel(id, object));
          }
        }
        pageToken = page.nextPageToken ?? undefined;
      } while (pageToken !== undefined);
    } catch (error: unknown) {
      if (isStorageError(error, "NotFound")) return [];
      throw error;
    }

    checkpoints.sort((a, b) => b.lastModified.getTime() - a.lastModified.getTime());
    logger.debug(`listCheckpoints: ${path}: ${checkpoints.map((cp) => cp.id).join(", ")}`);
    return checkpoints;
  };

  const deleteCheckpoint = async (id: string, path: string): Promise<void> => {
    await requireCheckpoint(id, path);
    await mutations.deleteFile(checkpointPath(id, path));
  };

  const renameCheckpoint = async (id: string, oldPath: string, newPath: string): Promise<void> => {
    await requireCheckpoint(id, oldPath);
    await mutations.renameFile(checkpointPath(id, oldPath), checkpointPath(id, newPath));
  };

  const deleteAllCheckpoints = async (path: string): Promise<void> => {
    for (const checkpoint of await listCheckpoints(path)) {
      await deleteCheckpoint(checkpoint.id, path);
    }
  };

  const renameAllCheckpoints = async (oldPath: string, newPath: string): Promise<void> => {
    for (const checkpoint of await listCheckpoints(oldPath)) {
      await renameCheckpoint(checkpoint.id, oldPath, newPath);
    }
  };

  return {
    checkpointPath,
    createFileCheckpoint,
    createNotebookCheckpoint,
    getFileCheckpoint,
    getNotebookCheckpoint,
    listCheckpoints,
    deleteCheckpoint,
    renameCheckpoint,
    deleteAllCheckpoints,
    renameAllCheckpoints,
  };
};
