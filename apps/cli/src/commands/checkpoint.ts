import type { CheckpointModel } from "@bucketfs/contents";
import type { Command } from "commander";
import { type ContentsResolver, type GlobalOptions, reportError } from "../lib/contents";
import { createFormatter } from "../lib/output";

const checkpointRow = (checkpoint: CheckpointModel) => ({
  id: checkpoint.id,
  lastModified: checkpoint.lastModified.toISOString(),
});

export function registerCheckpointCommands(program: Command, resolve: ContentsResolver): void {
  const checkpoint = program.command("checkpoint").description("Checkpoint operations");

  const context = () => {
    const opts = program.opts<GlobalOptions>();
    return { contents: resolve(opts), formatter: createFormatter(opts) };
  };

  checkpoint
    .command("create <path>")
    .description("Snapshot the current content of a file or notebook")
    .action(async (path: string) => {
      const { contents, formatter } = context();
      try {
        const created = checkpointRow(await contents.createCheckpoint(path));
        formatter.output(created, () => `Created checkpoint ${created.id} of ${path}`);
      } catch (error: unknown) {
        reportError(formatter, error);
      }
    });

  checkpoint
    .command("list <path>")
    .description("List checkpoints, most recent first")
    .action(async (path: string) => {
      const { contents, formatter } = context();
      try {
        const rows = (await contents.listCheckpoints(path)).map(checkpointRow);
        formatter.output(rows, () =>
          rows.length === 0
            ? "(no checkpoints)"
            : rows.map((row) => `${row.id}  ${row.lastModified}`).join("\n")
        );
      } catch (error: unknown) {
        reportError(formatter, error);
      }
    });

  checkpoint
    .command("restore <path> <id>")
    .description("Restore a file or notebook from a checkpoint")
    .action(async (path: string, id: string) => {
      const { contents, formatter } = context();
      try {
        await contents.restoreCheckpoint(id, path);
        formatter.success(`Restored ${path} from checkpoint ${id}`);
      } catch (error: unknown) {
        reportError(formatter, error);
      }
    });

  checkpoint
    .command("rm <path> <id>")
    .description("Delete a checkpoint")
    .action(async (path: string, id: string) => {
      const { contents, formatter } = context();
      try {
        await contents.deleteCheckpoint(id, path);
        formatter.success(`Deleted checkpoint ${id} of ${path}`);
      } catch (error: unknown) {
        reportError(formatter, error);
      }
    });
}
