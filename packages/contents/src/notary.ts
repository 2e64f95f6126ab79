/**
 * @bucketfs/contents: Notebook notary
 *
 * Tracks which notebooks the user has trusted. A notebook is trusted when
 * the HMAC of its content is in the signature store; cells of an
 * untrusted notebook are marked untrusted on read.
 */

import { createHmac, randomBytes } from "node:crypto";
import type { Logger } from "./logger.ts";
import { cellMetadata, isRecord, type NotebookDocument, serializeNotebook } from "./notebook.ts";

export type NotebookNotary = {
  /** Set metadata.trusted on every code cell from the stored signature */
  markTrustedCells: (nb: NotebookDocument, path: string) => void;
  /** Sign the notebook when every code cell that needs trust is trusted */
  checkAndSign: (nb: NotebookDocument, path: string) => void;
  /** Whether the notebook's signature is known */
  isSigned: (nb: NotebookDocument) => boolean;
};

export type NotaryOptions = {
  /** HMAC key; a random per-process key when omitted */
  secret?: string | null;
  /** Signature store, shared between notaries if needed */
  signatures?: Set<string>;
  logger: Logger;
};

const codeCells = (nb: NotebookDocument) => nb.cells.filter((cell) => cell.cell_type === "code");

/** Only cells with output need to be trusted */
const needsTrust = (cell: NotebookDocument["cells"][number]): boolean =>
  Array.isArray(cell.outputs) && cell.outputs.length > 0;

export const createNotebookNotary = (options: NotaryOptions): NotebookNotary => {
  const secret = options.secret ?? randomBytes(32).toString("hex");
  const signatures = options.signatures ?? new Set<string>();
  const { logger } = options;

  /** Signature over the notebook without trust markers and stored signature */
  const compute = (nb: NotebookDocument): string => {
    const metadata = { ...nb.metadata };
    delete metadata.signature;
    const cells = nb.cells.map((cell) => {
      if (!isRecord(cell.metadata)) return cell;
      const { trusted: _trusted, ...rest } = cell.metadata;
      return { ...cell, metadata: rest };
    });
    return createHmac("sha256", secret)
      .update(serializeNotebook({ ...nb, metadata, cells }))
      .digest("hex");
  };

  const isSigned = (nb: NotebookDocument): boolean => signatures.has(compute(nb));

  const markTrustedCells = (nb: NotebookDocument, path: string): void => {
    const trusted = isSigned(nb);
    if (!trusted) {
      logger.warn(`Notebook ${path} is not trusted`);
    }
    for (const cell of codeCells(nb)) {
      cellMetadata(cell).trusted = trusted;
    }
  };

  const checkAndSign = (nb: NotebookDocument, path: string): void => {
    let trusted = true;
    for (const cell of codeCells(nb)) {
      const metadata = cellMetadata(cell);
      const flag = metadata.trusted;
      delete metadata.trusted;
      if (needsTrust(cell) && flag !== true) {
        trusted = false;
      }
    }
    if (trusted) {
      signatures.add(compute(nb));
    } else {
      logger.warn(`Notebook ${path} is not trusted`);
    }
  };

  return { markTrustedCells, checkAndSign, isSigned };
};
