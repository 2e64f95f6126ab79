/**
 * @bucketfs/contents: Path resolution
 *
 * A contents path is "<bucket>/<key>". The empty path is the root listing
 * of all buckets; a trailing "/" marks directory intent.
 */

export const DELIMITER = "/";

export type ResolvedPath = {
  bucket: string;
  key: string;
};

/** Split at the first "/": "a/b/c" -> { bucket: "a", key: "b/c" }, "a" -> { bucket: "a", key: "" } */
export const resolvePath = (path: string): ResolvedPath => {
  const slash = path.indexOf(DELIMITER);
  if (slash < 0) return { bucket: path, key: "" };
  return { bucket: path.slice(0, slash), key: path.slice(slash + 1) };
};

export const stripLeadingSlash = (path: string): string => path.replace(/^\/+/, "");

/** Strip slashes on both ends */
export const trimSlashes = (path: string): string => path.replace(/^\/+|\/+$/g, "");

export const ensureTrailingSlash = (path: string): string =>
  path.endsWith(DELIMITER) ? path : `${path}${DELIMITER}`;

export const stripTrailingSlash = (path: string): string =>
  path.endsWith(DELIMITER) ? path.slice(0, -1) : path;

/** Last segment of an object key */
export const objectName = (key: string): string => key.slice(key.lastIndexOf(DELIMITER) + 1);

/** Display name of a directory path ("b/dir/" -> "dir", "b" -> "b") */
export const dirName = (path: string): string => objectName(stripTrailingSlash(path));

/** Contents path of a stored object */
export const objectPath = (object: { bucket: string; key: string }): string =>
  `${object.bucket}${DELIMITER}${object.key}`;

/** Join a directory path and a child name */
export const joinPath = (dir: string, name: string): string =>
  dir === "" ? name : `${ensureTrailingSlash(dir)}${name}`;

/** "nb.ipynb" -> { base: "nb", ext: ".ipynb" }; leading dots are not extensions */
export const splitExtension = (name: string): { base: string; ext: string } => {
  const dot = name.lastIndexOf(".");
  if (dot <= 0 || name.slice(0, dot).replace(/\./g, "") === "") {
    return { base: name, ext: "" };
  }
  return { base: name.slice(0, dot), ext: name.slice(dot) };
};
