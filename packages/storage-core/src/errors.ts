/**
 * Storage error taxonomy shared by every provider.
 */

export type StorageErrorKind = "NotFound" | "Forbidden" | "BadRequest" | "Conflict" | "Unknown";

export class StorageError extends Error {
  readonly kind: StorageErrorKind;

  constructor(kind: StorageErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StorageError";
    this.kind = kind;
  }
}

/** Type guard for StorageError, optionally narrowed to one kind */
export function isStorageError(value: unknown, kind?: StorageErrorKind): value is StorageError {
  if (!(value instanceof StorageError)) return false;
  return kind === undefined || value.kind === kind;
}
