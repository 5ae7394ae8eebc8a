// src/utils/logger.ts

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const rank: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export type Logger = {
  readonly level: LogLevel;
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  child: (prefix: string) => Logger;
};

export type LoggerOptions = {
  level?: string;
  prefix?: string;
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(rank, value);
}

export function parseLogLevel(level: string | undefined): LogLevel {
  const normalized = (level ?? "").trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : "info";
}

/**
 * Built once in server.ts and handed to whatever needs it; components take
 * a child for their own prefix.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const level = parseLogLevel(options.level);
  const tag = options.prefix ? [`[${options.prefix}]`] : [];

  const enabled = (l: LogLevel) => rank[l] >= rank[level];

  return {
    level,
    debug: (...args) => {
      if (enabled("debug")) console.log("[DEBUG]", ...tag, ...args);
    },
    info: (...args) => {
      if (enabled("info")) console.log("[INFO]", ...tag, ...args);
    },
    warn: (...args) => {
      if (enabled("warn")) console.warn("[WARN]", ...tag, ...args);
    },
    error: (...args) => {
      if (enabled("error")) console.error("[ERROR]", ...tag, ...args);
    },
    child: (prefix) =>
      createLogger({
        level,
        prefix: options.prefix ? `${options.prefix}:${prefix}` : prefix,
      }),
  };
}
