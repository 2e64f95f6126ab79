import {
  type ContentsApi,
  type ContentType,
  createConsoleLogger,
  createContentsService,
  loadContentsConfig,
} from "@bucketfs/contents";
import { createS3ObjectStore } from "@bucketfs/storage-s3";
import type { OutputFormatter } from "./output";

/** Options registered on the root program */
export type GlobalOptions = {
  format?: string;
  verbose?: boolean;
  quiet?: boolean;
  endpoint?: string;
  region?: string;
  pathStyle?: boolean;
};

/** Builds the contents service a command runs against */
export type ContentsResolver = (opts: GlobalOptions) => ContentsApi;

/**
 * Contents service over S3, configured from BUCKETFS_* environment
 * variables with command line overrides.
 */
export const createS3Contents: ContentsResolver = (opts) => {
  const config = loadContentsConfig(process.env);
  const store = createS3ObjectStore({
    region: opts.region ?? config.s3.region,
    endpoint: opts.endpoint ?? config.s3.endpoint,
    forcePathStyle: opts.pathStyle ?? config.s3.forcePathStyle,
  });
  return createContentsService({
    store,
    config,
    logger: createConsoleLogger({ level: opts.verbose ? "debug" : config.logLevel }),
  });
};

const CONTENT_TYPES: readonly ContentType[] = ["file", "notebook", "directory"];

export function parseContentType(value: string | undefined): ContentType | undefined {
  if (value === undefined) return undefined;
  const type = CONTENT_TYPES.find((candidate) => candidate === value);
  if (!type) {
    throw new Error(`Unknown content type: ${value} (expected ${CONTENT_TYPES.join("|")})`);
  }
  return type;
}

/** Print a command failure and mark the process as failed */
export function reportError(formatter: OutputFormatter, error: unknown): void {
  formatter.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
}
