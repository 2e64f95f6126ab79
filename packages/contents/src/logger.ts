/**
 * @bucketfs/contents: Logging
 *
 * Console-backed leveled logger plus the call/result tracer applied to
 * every public contents operation.
 */

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type Logger = {
  debug: (message: string, ...args: unknown[]) => void;
  info: (message: string, ...args: unknown[]) => void;
  warn: (message: string, ...args: unknown[]) => void;
  error: (message: string, ...args: unknown[]) => void;
};

export type ConsoleLoggerOptions = {
  /** Minimum level written (default: "info") */
  level?: LogLevel;
  /** Tag prepended to every line (default: "bucketfs") */
  tag?: string;
  /** Sink, defaults to the global console */
  sink?: Pick<Console, "debug" | "info" | "warn" | "error">;
};

const rank = (level: LogLevel): number => LOG_LEVELS.indexOf(level);

export const createConsoleLogger = (options: ConsoleLoggerOptions = {}): Logger => {
  const threshold = rank(options.level ?? "info");
  const tag = `[${options.tag ?? "bucketfs"}]`;
  const sink = options.sink ?? console;

  const emit =
    (level: Exclude<LogLevel, "silent">) =>
    (message: string, ...args: unknown[]) => {
      if (rank(level) < threshold) return;
      sink[level](`${tag} ${message}`, ...args);
    };

  return {
    debug: emit("debug"),
    info: emit("info"),
    warn: emit("warn"),
    error: emit("error"),
  };
};

export const silentLogger: Logger = createConsoleLogger({ level: "silent" });

// ============================================================================
// Tracing
// ============================================================================

const MAX_REPR = 120;

/**
 * Short, log-friendly rendering of an argument or result.
 * Contents models render as "<type>:<path>".
 */
export const describeValue = (value: unknown): string => {
  if (value === undefined) return "undefined";
  if (value instanceof Uint8Array) return `<${value.length} bytes>`;
  if (value instanceof Date) return value.toISOString();
  if (Array.isArray(value)) return `[${value.length} items]`;
  if (typeof value === "object" && value !== null && "type" in value && "path" in value) {
    return `${String(value.type)}:${String(value.path)}`;
  }
  const text = JSON.stringify(value) ?? String(value);
  return text.length > MAX_REPR ? `${text.slice(0, MAX_REPR)}…` : text;
};

export type Tracer = <A extends unknown[], R>(
  name: string,
  fn: (...args: A) => Promise<R>
) => (...args: A) => Promise<R>;

/**
 * Wrap operations so each call and its result are logged at debug level.
 * Failures are logged and rethrown unchanged.
 */
export const createTracer =
  (logger: Logger): Tracer =>
  (name, fn) =>
  async (...args) => {
    logger.debug(`call ${name}(${args.map(describeValue).join(", ")})`);
    try {
      const result = await fn(...args);
      logger.debug(`result ${name} ${describeValue(result)}`);
      return result;
    } catch (error: unknown) {
      logger.debug(`failed ${name} ${error instanceof Error ? error.message : String(error)}`);
      throw error;
    }
  };
