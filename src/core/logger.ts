export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFields = Record<string, unknown>;

export type WriteLine = (line: string) => void;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

export interface CreateLoggerOptions {
  level?: LogLevel;
  writeLine?: WriteLine;
  timestamps?: boolean;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export const isLogLevel = (value: unknown): value is LogLevel => {
  return value === "debug" || value === "info" || value === "warn" || value === "error";
};

export const formatLogLine = (
  level: LogLevel,
  message: string,
  fields?: LogFields,
  timestamp?: string
): string => {
  const parts: string[] = [];
  if (timestamp) {
    parts.push(timestamp);
  }
  parts.push(`[${level.toUpperCase()}]`, message);
  if (fields && Object.keys(fields).length > 0) {
    parts.push(JSON.stringify(fields));
  }
  return parts.join(" ");
};

export const createLogger = (options: CreateLoggerOptions = {}): Logger => {
  const threshold = LEVEL_RANK[options.level ?? "info"];
  const writeLine =
    options.writeLine ??
    ((line: string) => {
      process.stderr.write(`${line}\n`);
    });
  const timestamps = options.timestamps ?? true;

  const emit = (level: LogLevel, message: string, fields?: LogFields): void => {
    if (LEVEL_RANK[level] < threshold) {
      return;
    }
    writeLine(formatLogLine(level, message, fields, timestamps ? new Date().toISOString() : undefined));
  };

  return {
    debug: (message, fields) => emit("debug", message, fields),
    info: (message, fields) => emit("info", message, fields),
    warn: (message, fields) => emit("warn", message, fields),
    error: (message, fields) => emit("error", message, fields),
  };
};

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
