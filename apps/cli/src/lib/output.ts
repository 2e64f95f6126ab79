import { isRecord } from "@bucketfs/contents";
import chalk from "chalk";
import Table from "cli-table3";
import YAML from "yaml";

export const OUTPUT_FORMATS = ["text", "json", "yaml", "table"] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export interface OutputOptions {
  format: OutputFormat;
  quiet: boolean;
  verbose: boolean;
}

export class OutputFormatter {
  constructor(private options: OutputOptions) {}

  get format(): OutputFormat {
    return this.options.format;
  }

  get isVerbose(): boolean {
    return this.options.verbose;
  }

  // Output structured data
  output(data: unknown, textFormatter?: (data: unknown) => string): void {
    if (this.options.quiet && this.options.format === "text") {
      return;
    }

    switch (this.options.format) {
      case "json":
        console.log(JSON.stringify(data, null, 2));
        break;
      case "yaml":
        console.log(YAML.stringify(data));
        break;
      case "table":
        if (Array.isArray(data)) {
          this.printTable(data.filter(isRecord));
        } else if (isRecord(data)) {
          this.printObjectTable(data);
        } else {
          console.log(data);
        }
        break;
      default:
        if (textFormatter) {
          console.log(textFormatter(data));
        } else {
          console.log(data);
        }
    }
  }

  // Print array as table
  printTable(rows: Array<Record<string, unknown>>): void {
    const firstRow = rows[0];
    if (!firstRow) {
      console.log("(empty)");
      return;
    }

    const cols = Object.keys(firstRow);
    const table = new Table({
      head: cols.map((c) => chalk.bold(c.toUpperCase())),
      style: { head: [], border: [] },
    });

    for (const row of rows) {
      table.push(cols.map((c) => formatValue(row[c])));
    }

    console.log(table.toString());
  }

  // Print object as key-value table
  printObjectTable(obj: Record<string, unknown>): void {
    const table = new Table({
      style: { head: [], border: [] },
    });

    for (const [key, value] of Object.entries(obj)) {
      table.push([chalk.bold(key), formatValue(value)]);
    }

    console.log(table.toString());
  }

  // Print success message
  success(message: string): void {
    if (!this.options.quiet) {
      console.log(chalk.green("✓"), message);
    }
  }

  // Print error message
  error(message: string): void {
    console.error(chalk.red("✗"), message);
  }

  // Print verbose/debug message
  debug(message: string): void {
    if (this.options.verbose) {
      console.log(chalk.gray("⋯"), chalk.gray(message));
    }
  }

  // Write file content as-is (no trailing newline)
  write(data: string | Uint8Array): void {
    process.stdout.write(data);
  }
}

function formatValue(value: unknown): string {
  if (value === null || value === undefined) {
    return chalk.gray("—");
  }
  if (typeof value === "boolean") {
    return value ? chalk.green("true") : chalk.red("false");
  }
  if (typeof value === "number") {
    return chalk.cyan(String(value));
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (Array.isArray(value)) {
    return value.join(", ");
  }
  if (typeof value === "object") {
    return JSON.stringify(value);
  }
  return String(value);
}

export function isOutputFormat(value: unknown): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

// Helper to create formatter from command options
export function createFormatter(options: {
  format?: string;
  quiet?: boolean;
  verbose?: boolean;
}): OutputFormatter {
  const format = options.format ?? "text";
  if (!isOutputFormat(format)) {
    throw new Error(`Unknown output format: ${format} (expected ${OUTPUT_FORMATS.join("|")})`);
  }
  return new OutputFormatter({
    format,
    quiet: options.quiet || false,
    verbose: options.verbose || false,
  });
}

// Format relative time
export function formatRelativeTime(date: Date | number | string, now = Date.now()): string {
  const timestamp = typeof date === "number" ? date : new Date(date).getTime();
  const diff = now - timestamp;

  const seconds = Math.floor(diff / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);
  const days = Math.floor(hours / 24);

  if (days > 30) {
    return new Date(timestamp).toISOString().slice(0, 10);
  }
  if (days > 0) return `${days}d ago`;
  if (hours > 0) return `${hours}h ago`;
  if (minutes > 0) return `${minutes}m ago`;
  return "just now";
}
