/**
 * Scoped logger for form hooks and components
 *
 * @example
 * ```ts
 * logger.info("Form submitted", { fields: 3 });
 * logger.error("Form submission failed", error);
 * const log = logger.child("login");
 * ```
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type LogContext = Record<string, unknown>;

export interface LogEntry {
  level: Exclude<LogLevel, "silent">;
  scope: string;
  message: string;
  context?: LogContext;
  error?: Error;
  timestamp: string;
}

export type LogSink = (entry: LogEntry) => void;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  /** Accepts an Error, a context object, or any other thrown value */
  error(message: string, errorOrContext?: unknown, context?: LogContext): void;
  child(scope: string): Logger;
}

export interface LoggerOptions {
  scope?: string;
  level?: LogLevel;
  sink?: LogSink;
}

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export const consoleSink: LogSink = (entry) => {
  const line = `[${entry.scope}] ${entry.message}`;
  const details: unknown[] = [];
  if (entry.context) details.push(entry.context);
  if (entry.error) details.push(entry.error);

  switch (entry.level) {
    case "debug":
      console.debug(line, ...details);
      break;
    case "info":
      console.info(line, ...details);
      break;
    case "warn":
      console.warn(line, ...details);
      break;
    case "error":
      console.error(line, ...details);
      break;
  }
};

function isLogContext(value: unknown): value is LogContext {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function defaultLogLevel(nodeEnv: string | undefined): LogLevel {
  if (nodeEnv === "test") return "silent";
  return nodeEnv === "production" ? "warn" : "info";
}

function readNodeEnv(): string | undefined {
  // `process` is not defined in every browser bundle
  return typeof process === "undefined" ? undefined : process.env.NODE_ENV;
}

export function createLogger({
  scope = "forms",
  level = defaultLogLevel(readNodeEnv()),
  sink = consoleSink,
}: LoggerOptions = {}): Logger {
  const emit = (
    entryLevel: LogEntry["level"],
    message: string,
    context?: LogContext,
    error?: Error
  ) => {
    if (LEVEL_WEIGHT[entryLevel] < LEVEL_WEIGHT[level]) return;
    sink({
      level: entryLevel,
      scope,
      message,
      context,
      error,
      timestamp: new Date().toISOString(),
    });
  };

  return {
    debug: (message, context) => emit("debug", message, context),
    info: (message, context) => emit("info", message, context),
    warn: (message, context) => emit("warn", message, context),
    error: (message, errorOrContext, context) => {
      if (errorOrContext instanceof Error) {
        emit("error", message, context, errorOrContext);
      } else if (errorOrContext === undefined) {
        emit("error", message, context);
      } else if (isLogContext(errorOrContext)) {
        emit("error", message, { ...errorOrContext, ...context });
      } else {
        emit("error", message, { ...context, error: String(errorOrContext) });
      }
    },
    child: (childScope) => createLogger({ scope: `${scope}:${childScope}`, level, sink }),
  };
}

export const logger = createLogger();
