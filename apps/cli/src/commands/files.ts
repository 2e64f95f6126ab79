import { Buffer, isUtf8 } from "node:buffer";
import { readFile } from "node:fs/promises";
import {
  type ContentsModel,
  parseNotebook,
  type SaveRequest,
  serializeNotebook,
} from "@bucketfs/contents";
import type { Command } from "commander";
import {
  type ContentsResolver,
  type GlobalOptions,
  parseContentType,
  reportError,
} from "../lib/contents";
import { createFormatter, formatRelativeTime, type OutputFormatter } from "../lib/output";

type ListingRow = {
  name: string;
  type: string;
  path: string;
  lastModified: string | null;
};

const listingRow = (model: ContentsModel): ListingRow => ({
  name: model.type === "directory" ? `${model.name}/` : model.name,
  type: model.type,
  path: model.path,
  lastModified: model.lastModified?.toISOString() ?? null,
});

/** Save request for a local file: notebooks by extension, text when UTF-8, base64 otherwise */
const localFileRequest = (data: Buffer, target: string): SaveRequest => {
  if (target.endsWith(".ipynb")) {
    return { type: "notebook", content: parseNotebook(data.toString("utf8")) };
  }
  if (isUtf8(data)) {
    return { type: "file", format: "text", content: data.toString("utf8") };
  }
  return { type: "file", format: "base64", content: data.toString("base64") };
};

/** Success line in text mode, the model itself otherwise */
const reportModel = (formatter: OutputFormatter, model: ContentsModel, message: string) => {
  if (formatter.format === "text") {
    formatter.success(message);
  } else {
    formatter.output(model);
  }
};

export function registerFileCommands(program: Command, resolve: ContentsResolver): void {
  const context = () => {
    const opts = program.opts<GlobalOptions>();
    return { contents: resolve(opts), formatter: createFormatter(opts) };
  };

  program
    .command("ls [path]")
    .description("List a directory (the root lists buckets)")
    .action(async (path: string = "") => {
      const { contents, formatter } = context();
      try {
        const model = await contents.get(path, { type: "directory" });
        const rows = model.type === "directory" ? (model.content ?? []).map(listingRow) : [];
        formatter.output(rows, () => {
          if (rows.length === 0) return "(empty)";
          return rows
            .map((row) => {
              const modified = formatter.isVerbose && row.lastModified
                ? `${formatRelativeTime(row.lastModified).padEnd(12)}`
                : "";
              return `${row.type.padEnd(10)}${modified}${row.name}`;
            })
            .join("\n");
        });
      } catch (error: unknown) {
        reportError(formatter, error);
      }
    });

  program
    .command("cat <path>")
    .description("Print the content of a file or notebook")
    .action(async (path: string) => {
      const { contents, formatter } = context();
      try {
        const model = await contents.get(path);
        if (formatter.format !== "text") {
          formatter.output(model);
          return;
        }
        switch (model.type) {
          case "directory":
            throw new Error(`${model.path} is a directory`);
          case "notebook":
            if (model.content !== null) formatter.write(serializeNotebook(model.content));
            return;
          case "file":
            if (model.content === null) return;
            formatter.write(
              model.format === "base64" ? Buffer.from(model.content, "base64") : model.content
            );
        }
      } catch (error: unknown) {
        reportError(formatter, error);
      }
    });

  program
    .command("put <local> <path>")
    .description("Upload a local file (notebooks are detected by the .ipynb extension)")
    .action(async (local: string, path: string) => {
      const { contents, formatter } = context();
      try {
        const model = await contents.save(localFileRequest(await readFile(local), path), path);
        reportModel(formatter, model, `Saved ${model.path}`);
        if (model.message) formatter.debug(model.message);
      } catch (error: unknown) {
        reportError(formatter, error);
      }
    });

  program
    .command("mkdir <path>")
    .description("Create a directory, or a bucket at the root level")
    .action(async (path: string) => {
      const { contents, formatter } = context();
      try {
        const model = await contents.save({ type: "directory" }, path);
        reportModel(formatter, model, `Created ${model.path}`);
      } catch (error: unknown) {
        reportError(formatter, error);
      }
    });

  program
    .command("rm <path>")
    .description("Delete a file, a directory tree or a bucket")
    .action(async (path: string) => {
      const { contents, formatter } = context();
      try {
        await contents.deletePath(path);
        formatter.success(`Deleted ${path}`);
      } catch (error: unknown) {
        reportError(formatter, error);
      }
    });

  program
    .command("mv <from> <to>")
    .description("Rename or move a file or directory")
    .action(async (from: string, to: string) => {
      const { contents, formatter } = context();
      try {
        await contents.renamePath(from, to);
        formatter.success(`Renamed ${from} to ${to}`);
      } catch (error: unknown) {
        reportError(formatter, error);
      }
    });

  program
    .command("cp <from> [to]")
    .description("Copy a file; into a directory the copy is named <name>-Copy<n>")
    .action(async (from: string, to: string | undefined) => {
      const { contents, formatter } = context();
      try {
        const model = await contents.copyPath(from, to);
        reportModel(formatter, model, `Copied ${from} to ${model.path}`);
      } catch (error: unknown) {
        reportError(formatter, error);
      }
    });

  program
    .command("touch [dir]")
    .description("Create untitled content under the first free name")
    .option("-t, --type <type>", "content type: file|notebook|directory")
    .option("-e, --ext <ext>", "file extension, e.g. .txt")
    .action(async (dir: string = "", cmdOpts: { type?: string; ext?: string }) => {
      const { contents, formatter } = context();
      try {
        const model = await contents.newUntitled(dir, {
          type: parseContentType(cmdOpts.type),
          ext: cmdOpts.ext,
        });
        reportModel(formatter, model, `Created ${model.path}`);
      } catch (error: unknown) {
        reportError(formatter, error);
      }
    });
}
