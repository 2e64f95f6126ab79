/**
 * @bucketfs/contents: Save
 *
 * Validates an incoming model, dispatches it to the matching write and
 * returns the stored, content-less model. Validation errors are raised
 * before any store call; failures inside the write are wrapped unless
 * they are already contents errors.
 */

import { z } from "zod";
import type { CheckpointOps } from "./checkpoints.ts";
import { ContentsError, contentsError, errorMessage, isContentsError } from "./errors.ts";
import type { ModelOps } from "./models.ts";
import type { MutationOps } from "./mutations.ts";
import { notebookDocumentSchema, validateNotebook } from "./notebook.ts";
import { ensureTrailingSlash, resolvePath, stripLeadingSlash } from "./paths.ts";
import type { ContentsContext, ContentsModel, SaveRequest } from "./types.ts";

// ============================================================================
// Request parsing
// ============================================================================

const saveRequestSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("file"), content: z.string(), format: z.string().optional() }),
  z.object({ type: z.literal("notebook"), content: notebookDocumentSchema }),
  z.object({ type: z.literal("directory") }),
]);

const SAVE_TYPES: ReadonlySet<unknown> = new Set(["file", "notebook", "directory"]);

/**
 * Parse an untyped save payload into a SaveRequest.
 */
export function parseSaveRequest(input: unknown, path: string): SaveRequest {
  if (typeof input !== "object" || input === null || !("type" in input)) {
    throw contentsError("BAD_REQUEST", 400, `No file type provided: ${path}`, { path });
  }
  if (input.type !== "directory" && !("content" in input)) {
    throw contentsError("BAD_REQUEST", 400, `No file content provided: ${path}`, { path });
  }
  if (!SAVE_TYPES.has(input.type)) {
    throw contentsError("BAD_REQUEST", 400, `Unhandled contents type: ${String(input.type)} for ${path}`, {
      path,
    });
  }

  const parsed = saveRequestSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "model"}: ${issue.message}`)
      .join("; ");
    throw contentsError("BAD_REQUEST", 400, `Invalid ${String(input.type)} model for ${path}: ${issues}`, {
      path,
    });
  }
  return parsed.data;
}

// ============================================================================
// Save Operation Factory
// ============================================================================

export type SaveDeps = {
  models: ModelOps;
  mutations: MutationOps;
  checkpoints: CheckpointOps;
};

export type SaveOps = ReturnType<typeof createSaveOps>;

export const createSaveOps = (ctx: ContentsContext, deps: SaveDeps) => {
  const { logger, notary, hooks } = ctx;
  const { models, mutations, checkpoints } = deps;

  const dispatch = async (request: SaveRequest, path: string): Promise<string | null> => {
    switch (request.type) {
      case "notebook": {
        const nb = structuredClone(request.content);
        notary.checkAndSign(nb, path);
        await mutations.writeNotebook(path, nb);
        // Every saved notebook has at least one checkpoint
        if ((await checkpoints.listCheckpoints(path)).length === 0) {
          await checkpoints.createNotebookCheckpoint(nb, path);
        }
        return validateNotebook(nb);
      }
      case "file":
        await mutations.writeFile(path, request.content, request.format);
        return null;
      case "directory":
        await mutations.writeDirectory(path);
        return null;
    }
  };

  /**
   * save: Store a model at a path.
   *
   * Only directories (buckets) can be saved at the root level.
   */
  const save = async (input: unknown, rawPath: string): Promise<ContentsModel> => {
    let path = stripLeadingSlash(rawPath);
    const request = parseSaveRequest(input, path);

    const { key } = resolvePath(path);
    if (key === "" && request.type !== "directory") {
      throw contentsError(
        "FORBIDDEN",
        403,
        `You may only create directories (buckets) at the root level: ${path}`,
        { path }
      );
    }
    if (key !== "" && request.type === "directory") {
      path = ensureTrailingSlash(path);
    }
    logger.debug(`Saving ${path}`);

    await hooks.preSave?.({ path, model: request });

    let validationMessage: string | null;
    try {
      validationMessage = await dispatch(request, path);
    } catch (error: unknown) {
      if (isContentsError(error)) throw error;
      logger.error(`Error while saving file: ${path} ${errorMessage(error)}`);
      throw new ContentsError(
        "UNEXPECTED",
        500,
        `Unexpected error while saving file: ${path} ${errorMessage(error)}`,
        { path },
        { cause: error }
      );
    }

    const stored = await models.get(path, { content: false, type: request.type });
    const model: ContentsModel =
      validationMessage !== null ? { ...stored, message: validationMessage } : stored;

    if (hooks.postSave) {
      try {
        logger.debug(`Running post-save hook on ${path}`);
        await hooks.postSave({ path, model });
      } catch (error: unknown) {
        logger.error(`Post-save hook failed on ${path}: ${errorMessage(error)}`);
      }
    }

    return model;
  };

  return { save };
};
