/**
 * @bucketfs/contents: Visibility filter
 */

import { minimatch } from "minimatch";

export type VisibilityOptions = {
  /** List dot-names */
  allowHidden: boolean;
  /** Names matching any of these globs are never listed */
  hideGlobs: string[];
};

/** Build the shouldList(name) predicate applied to every listed child */
export const createVisibilityFilter =
  (options: VisibilityOptions) =>
  (name: string): boolean => {
    if (!options.allowHidden && name.startsWith(".")) return false;
    return !options.hideGlobs.some((glob) => minimatch(name, glob, { dot: true }));
  };
