/**
 * @bucketfs/contents: Notebook documents
 *
 * JSON notebook (nbformat v4) codec: lenient parsing, schema validation
 * with a human-readable message, and the canonical on-disk formatting
 * (sorted keys, one-space indent, multi-line sources split into lines).
 */

import { z } from "zod";

export const NOTEBOOK_MIME = "application/x-ipynb+json";

export const NBFORMAT = 4;
export const NBFORMAT_MINOR = 5;

// ============================================================================
// Schemas
// ============================================================================

const record = z.record(z.string(), z.unknown());

/**
 * Lenient shape used when reading or accepting a notebook. Missing
 * top-level fields are filled with defaults; cells stay opaque records.
 */
export const notebookDocumentSchema = z
  .object({
    nbformat: z.number().int().default(NBFORMAT),
    nbformat_minor: z.number().int().default(NBFORMAT_MINOR),
    metadata: record.default({}),
    cells: z.array(record).default([]),
  })
  .passthrough();

export type NotebookDocument = z.infer<typeof notebookDocumentSchema>;
export type NotebookCell = NotebookDocument["cells"][number];

const source = z.union([z.string(), z.array(z.string())]);

const cellSchema = z.discriminatedUnion("cell_type", [
  z
    .object({
      cell_type: z.literal("code"),
      source,
      metadata: record,
      outputs: z.array(record),
      execution_count: z.number().int().nullable(),
    })
    .passthrough(),
  z.object({ cell_type: z.literal("markdown"), source, metadata: record }).passthrough(),
  z.object({ cell_type: z.literal("raw"), source, metadata: record }).passthrough(),
]);

const strictNotebookSchema = z
  .object({
    nbformat: z.literal(NBFORMAT),
    nbformat_minor: z.number().int().nonnegative(),
    metadata: record,
    cells: z.array(cellSchema),
  })
  .passthrough();

// ============================================================================
// Helpers
// ============================================================================

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/** Cell metadata, created in place when absent */
export const cellMetadata = (cell: NotebookCell): Record<string, unknown> => {
  const metadata = cell.metadata;
  if (isRecord(metadata)) return metadata;
  const fresh: Record<string, unknown> = {};
  cell.metadata = fresh;
  return fresh;
};

/** "a\nb" -> ["a\n", "b"]; "" -> [] */
export const splitLines = (text: string): string[] =>
  text === "" ? [] : text.split(/(?<=\n)/);

const joinSource = (cell: NotebookCell): NotebookCell => {
  const value = cell.source;
  if (Array.isArray(value) && value.every((line) => typeof line === "string")) {
    return { ...cell, source: value.join("") };
  }
  return cell;
};

const splitSource = (cell: NotebookCell): NotebookCell => {
  const value = cell.source;
  return typeof value === "string" ? { ...cell, source: splitLines(value) } : cell;
};

const sortKeys = (value: unknown): unknown => {
  if (Array.isArray(value)) return value.map(sortKeys);
  if (!isRecord(value)) return value;
  const sorted: Record<string, unknown> = {};
  for (const key of Object.keys(value).sort()) {
    sorted[key] = sortKeys(value[key]);
  }
  return sorted;
};

// ============================================================================
// Codec
// ============================================================================

/**
 * Parse notebook JSON text. Sources stored as line arrays are joined back
 * into strings. Throws on malformed JSON or a non-object document.
 */
export function parseNotebook(text: string): NotebookDocument {
  const raw: unknown = JSON.parse(text);
  const parsed = notebookDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Not a notebook document: ${formatIssues(parsed.error)}`);
  }
  return { ...parsed.data, cells: parsed.data.cells.map(joinSource) };
}

/** Canonical serialization, terminated by a newline */
export function serializeNotebook(nb: NotebookDocument): string {
  const document = { ...nb, cells: nb.cells.map(splitSource) };
  return `${JSON.stringify(sortKeys(document), null, 1)}\n`;
}

/** Validate against the v4 schema; returns a message or null when valid */
export function validateNotebook(nb: unknown): string | null {
  const result = strictNotebookSchema.safeParse(nb);
  if (result.success) return null;
  return `Notebook validation failed: ${formatIssues(result.error)}`;
}

/** A new, empty v4 notebook */
export function emptyNotebook(): NotebookDocument {
  return { nbformat: NBFORMAT, nbformat_minor: NBFORMAT_MINOR, metadata: {}, cells: [] };
}

const formatIssues = (error: z.ZodError): string =>
  error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
