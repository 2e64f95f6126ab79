/**
 * @bucketfs/contents: Errors
 *
 * Every failure surfaced to a caller carries a stable code, an HTTP-like
 * status and a message naming the offending path.
 */

import { isStorageError } from "@bucketfs/storage-core";

export type ContentsErrorCode =
  | "BAD_REQUEST"
  | "FORBIDDEN"
  | "NOT_FOUND"
  | "CONFLICT"
  | "UNEXPECTED"
  | "PARTIAL_FAILURE";

export class ContentsError extends Error {
  readonly code: ContentsErrorCode;
  readonly status: number;
  readonly details?: Record<string, unknown>;

  constructor(
    code: ContentsErrorCode,
    status: number,
    message: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "ContentsError";
    this.code = code;
    this.status = status;
    this.details = details;
  }
}

/** Type guard for ContentsError */
export function isContentsError(value: unknown): value is ContentsError {
  return value instanceof ContentsError;
}

/** Convenience constructor for ContentsError */
export function contentsError(
  code: ContentsErrorCode,
  status: number,
  message: string,
  details?: Record<string, unknown>
): ContentsError {
  return new ContentsError(code, status, message, details);
}

/** Message of an unknown thrown value */
export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

const STORAGE_ERROR_CODES = {
  NotFound: ["NOT_FOUND", 404, "No such file or directory"],
  Forbidden: ["FORBIDDEN", 403, "Permission denied"],
  BadRequest: ["BAD_REQUEST", 400, "Invalid path"],
  Conflict: ["CONFLICT", 409, "Conflict"],
  Unknown: ["UNEXPECTED", 500, "Unexpected storage error"],
} as const;

/**
 * Map a backend StorageError onto the contents taxonomy, naming the path.
 * Anything else is returned unchanged.
 */
export function fromStorageError(error: unknown, path: string): unknown {
  if (!isStorageError(error)) return error;
  const [code, status, label] = STORAGE_ERROR_CODES[error.kind];
  return new ContentsError(code, status, `${label}: ${path} (${error.message})`, { path }, {
    cause: error,
  });
}
