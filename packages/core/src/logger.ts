/**
 * Scoped stderr logging.
 *
 * Every server in the workspace speaks MCP over stdio, so stdout belongs to the
 * transport and log lines go to stderr as `[scope] message`.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  readonly scope: string;
  readonly level: LogLevel;
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, cause?: unknown): void;
  /** Logger for a sub-component, e.g. `supervisor:relay`. */
  child(name: string): Logger;
}

export interface LoggerOptions {
  /** Lowest level that is written. Default: "info" */
  level?: LogLevel;
  /** Line sink. Default: console.error */
  write?: (line: string) => void;
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const level = options.level ?? "info";
  const write = options.write ?? ((line: string) => console.error(line));

  const emit = (at: LogLevel, message: string): void => {
    if (LEVEL_RANK[at] < LEVEL_RANK[level]) return;
    const tag = at === "info" ? "" : `${at}: `;
    write(`[${scope}] ${tag}${message}`);
  };

  return {
    scope,
    level,
    debug: (message) => emit("debug", message),
    info: (message) => emit("info", message),
    warn: (message) => emit("warn", message),
    error: (message, cause) =>
      emit("error", cause === undefined ? message : `${message}: ${describeCause(cause)}`),
    child: (name) => createLogger(`${scope}:${name}`, { level, write }),
  };
}

/** Logger that drops everything. */
export const silentLogger: Logger = createLogger("silent", { write: () => undefined });
