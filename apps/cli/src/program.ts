import { Command } from "commander";
import { registerCheckpointCommands } from "./commands/checkpoint";
import { registerFileCommands } from "./commands/files";
import { type ContentsResolver, createS3Contents } from "./lib/contents";

export type ProgramDeps = {
  /** Contents service factory (default: S3 from the environment) */
  contents?: ContentsResolver;
};

export function createProgram(deps: ProgramDeps = {}): Command {
  const resolve = deps.contents ?? createS3Contents;
  const program = new Command();

  program
    .name("bucketfs")
    .description("Browse and edit object storage buckets as a file tree")
    .version("0.1.0")
    .option("--endpoint <url>", "S3-compatible endpoint (overrides BUCKETFS_S3_ENDPOINT)")
    .option("--region <region>", "S3 region (overrides BUCKETFS_S3_REGION)")
    .option("--path-style", "use path-style bucket addressing")
    .option("-f, --format <type>", "output format: text|json|yaml|table", "text")
    .option("-v, --verbose", "verbose output")
    .option("-q, --quiet", "quiet mode");

  registerFileCommands(program, resolve);
  registerCheckpointCommands(program, resolve);

  program.exitOverride();
  return program;
}
