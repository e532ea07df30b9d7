import process from "node:process";

/**
 * Structured stderr logging.
 *
 * Stdout belongs to the MCP JSON-RPC stream, so every line goes to stderr.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  child(scope: string): Logger;
}

export type LoggerOptions = {
  level?: LogLevel;
  /** Line sink, defaults to process.stderr */
  sink?: (line: string) => void;
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

const REDACTED_KEYS = new Set([
  "token",
  "authorization",
  "secret",
  "secretaccesskey",
  "sessiontoken",
  "password"
]);

export function redact(value: unknown, depth = 0): unknown {
  if (depth > 6 || value === null || typeof value !== "object") {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map(v => redact(v, depth + 1));
  }
  const out: Record<string, unknown> = {};
  for (const [key, v] of Object.entries(value)) {
    out[key] = REDACTED_KEYS.has(key.toLowerCase()) ? "[redacted]" : redact(v, depth + 1);
  }
  return out;
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? "info"];
  const sink = options.sink ?? ((line: string) => {
    process.stderr.write(line);
  });

  const write = (level: LogLevel, message: string, fields?: LogFields): void => {
    if (LEVEL_ORDER[level] < threshold) return;
    const suffix = fields && Object.keys(fields).length > 0
      ? ` ${JSON.stringify(redact(fields))}`
      : "";
    sink(`[lakegate:${scope}] ${level.toUpperCase()} ${message}${suffix}\n`);
  };

  return {
    debug: (message, fields) => write("debug", message, fields),
    info: (message, fields) => write("info", message, fields),
    warn: (message, fields) => write("warn", message, fields),
    error: (message, fields) => write("error", message, fields),
    child: (child) => createLogger(`${scope}:${child}`, options)
  };
}

/** Logger that drops everything; used as the default in library classes. */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => silentLogger
};
