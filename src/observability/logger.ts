/**
 * Structured JSON logger. Every line is one JSON object with a timestamp,
 * level, message and whatever bindings/fields the caller attached.
 *
 * Loggers are created explicitly and handed to the components that need them;
 * there is no shared module-level instance.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  child(bindings: LogFields): Logger;
}

export type LogWriter = (level: LogLevel, line: string) => void;

export type LoggerOptions = {
  level?: LogLevel;
  bindings?: LogFields;
  write?: LogWriter;
};

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && value in LOG_LEVEL_PRIORITY;
}

const writeToStdio: LogWriter = (level, line) => {
  if (level === "error") {
    process.stderr.write(line + "\n");
  } else {
    process.stdout.write(line + "\n");
  }
};

export function createLogger(options: LoggerOptions = {}): Logger {
  const minLevel: LogLevel = options.level ?? "info";
  const bindings: LogFields = options.bindings ?? {};
  const write = options.write ?? writeToStdio;

  const log = (level: LogLevel, message: string, fields?: LogFields): void => {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[minLevel]) return;
    const entry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...bindings,
      ...(fields ?? {}),
    };
    write(level, JSON.stringify(entry));
  };

  return {
    debug: (message, fields) => log("debug", message, fields),
    info: (message, fields) => log("info", message, fields),
    warn: (message, fields) => log("warn", message, fields),
    error: (message, fields) => log("error", message, fields),
    child: (extra) => createLogger({ level: minLevel, write, bindings: { ...bindings, ...extra } }),
  };
}

export const noopLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => noopLogger,
};

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return typeof error === "string" ? error : JSON.stringify(error) ?? String(error);
}

export function errorFields(error: unknown): LogFields {
  if (error instanceof Error) {
    return { error: { name: error.name, message: error.message, stack: error.stack?.slice(0, 500) } };
  }
  return { error: { message: errorMessage(error) } };
}
