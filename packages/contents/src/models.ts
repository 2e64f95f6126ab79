/**
 * @bucketfs/contents: Model builders
 *
 * Turns fetch results into file, notebook and directory models. Directory
 * listings re-enter get() for every visible child.
 */

import { Buffer, isUtf8 } from "node:buffer";
import { isStorageError, type StoredObject } from "@bucketfs/storage-core";
import { contentsError, errorMessage } from "./errors.ts";
import type { FetchOps, FetchResult } from "./fetch.ts";
import { type NotebookDocument, parseNotebook, validateNotebook } from "./notebook.ts";
import {
  DELIMITER,
  dirName,
  objectName,
  objectPath,
  resolvePath,
  stripLeadingSlash,
} from "./paths.ts";
import type {
  ContentsContext,
  ContentsModel,
  DirectoryModel,
  FileFormat,
  FileModel,
  GetOptions,
  NotebookModel,
} from "./types.ts";

export const DIRECTORY_MIME = "application/x-directory";

const DEFAULT_MIME: Record<FileFormat, string> = {
  text: "text/plain",
  base64: "application/octet-stream",
};

type DirectoryResult = Extract<FetchResult, { kind: "root" | "opaque" | "directory" }>;

// ============================================================================
// Model Operations Factory
// ============================================================================

export type ModelOps = ReturnType<typeof createModelOps>;

export const createModelOps = (ctx: ContentsContext, fetchOps: FetchOps) => {
  const { buckets, notary, shouldList } = ctx;
  const { fetch } = fetchOps;

  /** A path is hidden when its bucket is missing or denies access */
  const isHidden = async (path: string): Promise<boolean> => {
    if (path === "") return false;
    const { bucket } = resolvePath(stripLeadingSlash(path));
    try {
      return (await buckets.get(bucket)) === null;
    } catch (error: unknown) {
      if (isStorageError(error, "Forbidden")) return true;
      throw error;
    }
  };

  const download = async (object: StoredObject): Promise<Buffer> => {
    const bucket = await buckets.require(object.bucket);
    return Buffer.from(await bucket.download(object.key));
  };

  /**
   * Read a non-notebook object.
   * "text" must decode as UTF-8; no format tries UTF-8 then falls back to base64.
   */
  const readFile = async (
    object: StoredObject,
    format?: FileFormat
  ): Promise<{ content: string; format: FileFormat }> => {
    const bytes = await download(object);
    if (format !== "base64") {
      if (isUtf8(bytes)) {
        return { content: bytes.toString("utf8"), format: "text" };
      }
      if (format === "text") {
        throw contentsError("BAD_REQUEST", 400, `${objectPath(object)} is not UTF-8 encoded`, {
          path: objectPath(object),
        });
      }
    }
    return { content: bytes.toString("base64"), format: "base64" };
  };

  /** Read and parse a notebook, marking cells the user already trusted */
  const readNotebook = async (object: StoredObject): Promise<NotebookDocument> => {
    const path = objectPath(object);
    const bytes = await download(object);
    let nb: NotebookDocument;
    try {
      if (!isUtf8(bytes)) throw new Error("not UTF-8 encoded");
      nb = parseNotebook(bytes.toString("utf8"));
    } catch (error: unknown) {
      throw contentsError("BAD_REQUEST", 400, `Unreadable notebook: ${path} ${errorMessage(error)}`, {
        path,
      });
    }
    notary.markTrustedCells(nb, path);
    return nb;
  };

  // ==========================================================================
  // Builders
  // ==========================================================================

  const baseModel = (object: StoredObject) => ({
    name: objectName(object.key),
    path: objectPath(object),
    created: object.updated,
    lastModified: object.updated,
    mimetype: object.contentType,
    writable: true,
  });

  const fileModel = async (
    object: StoredObject,
    content: boolean,
    format?: FileFormat
  ): Promise<FileModel> => {
    const model: FileModel = { ...baseModel(object), type: "file", content: null, format: null };
    if (!content) return model;

    const read = await readFile(object, format);
    return {
      ...model,
      mimetype: model.mimetype ?? DEFAULT_MIME[read.format],
      content: read.content,
      format: read.format,
    };
  };

  const notebookModel = async (object: StoredObject, content: boolean): Promise<NotebookModel> => {
    const model: NotebookModel = {
      ...baseModel(object),
      type: "notebook",
      content: null,
      format: null,
    };
    if (!content) return model;

    const nb = await readNotebook(object);
    const message = validateNotebook(nb);
    return {
      ...model,
      content: nb,
      format: "json",
      ...(message !== null ? { message } : {}),
    };
  };

  const directoryModel = async (
    path: string,
    result: DirectoryResult,
    content: boolean
  ): Promise<DirectoryModel> => {
    const members =
      result.kind === "root" ? result.buckets : result.kind === "directory" ? result.listing : null;
    const model: DirectoryModel = {
      type: "directory",
      name: dirName(path),
      path,
      created: null,
      lastModified: null,
      content: null,
      format: null,
      mimetype: DIRECTORY_MIME,
      writable: path !== "" && (members !== null || !(await isHidden(path))),
    };
    if (!content) return model;

    const children: ContentsModel[] = [];
    if (result.kind === "root") {
      for (const name of result.buckets ?? []) {
        if (shouldList(name)) {
          children.push(await get(name, { content: false }));
        }
      }
    } else if (result.kind === "directory" && result.listing) {
      const { bucket, key } = resolvePath(path);
      for (const object of result.listing.objects) {
        const childPath = objectPath(object);
        if (childPath !== path && shouldList(objectName(object.key))) {
          children.push(await get(childPath, { content: false }));
        }
      }
      for (const folder of result.listing.folders) {
        if (folder !== key && shouldList(objectName(folder))) {
          children.push(await get(`${bucket}${DELIMITER}${folder}${DELIMITER}`, { content: false }));
        }
      }
    }
    return { ...model, content: children, format: "json" };
  };

  // ==========================================================================
  // get
  // ==========================================================================

  /**
   * get: Model of a path.
   *
   * Bucket names, paths ending in "/" and type "directory" build a
   * directory model; anything else an object model, a notebook when the
   * type says so or the name ends in ".ipynb".
   */
  async function get(rawPath: string, options: GetOptions = {}): Promise<ContentsModel> {
    const content = options.content ?? true;
    let path = stripLeadingSlash(rawPath);

    if (!path.includes(DELIMITER) || path.endsWith(DELIMITER) || options.type === "directory") {
      if (options.type !== undefined && options.type !== "directory") {
        throw contentsError("BAD_REQUEST", 400, `${path} is not a directory`, { path });
      }
      if (path.includes(DELIMITER) && !path.endsWith(DELIMITER)) {
        path += DELIMITER;
      }
      const result = await fetch(path, content);
      if (!result.exists || result.kind === "file") {
        throw contentsError("NOT_FOUND", 404, `No such directory: ${path}`, { path });
      }
      return directoryModel(path, result, content);
    }

    const result = await fetch(path);
    if (!result.exists) {
      throw contentsError("NOT_FOUND", 404, `No such file: ${path}`, { path });
    }
    if (result.kind === "opaque") {
      throw contentsError("FORBIDDEN", 403, `Permission denied: ${path}`, { path });
    }
    if (result.kind !== "file" || !result.object) {
      throw contentsError("NOT_FOUND", 404, `No such file: ${path}`, { path });
    }

    if (options.type === "notebook" || (options.type === undefined && path.endsWith(".ipynb"))) {
      return notebookModel(result.object, content);
    }
    return fileModel(result.object, content, options.format);
  }

  return { get, isHidden, readFile, readNotebook };
};
