/* Leveled console logger, optionally scoped to a component */
export type LogLevel = "error" | "warn" | "info" | "debug";

const levelOrder: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(levelOrder, value);
}

export function resolveLevel(raw: string | undefined): LogLevel {
  const value = raw?.trim().toLowerCase() ?? "";
  return isLogLevel(value) ? value : "info";
}

const currentLevel = resolveLevel(process.env.LOG_LEVEL);

function shouldLog(level: LogLevel): boolean {
  return levelOrder[level] <= levelOrder[currentLevel];
}

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
  debug(message: string): void;
  child(scope: string): Logger;
}

export function createLogger(scope?: string): Logger {
  const prefix = scope ? ` [${scope}]` : "";
  const format = (level: LogLevel, message: string): string =>
    `[${new Date().toISOString()}] [${level.toUpperCase()}]${prefix} ${message}`;

  return {
    info: (message) => {
      if (shouldLog("info")) {
        console.log(format("info", message));
      }
    },
    warn: (message) => {
      if (shouldLog("warn")) {
        console.warn(format("warn", message));
      }
    },
    error: (message, error) => {
      if (shouldLog("error")) {
        console.error(format("error", message), error ?? "");
      }
    },
    debug: (message) => {
      if (shouldLog("debug")) {
        console.debug(format("debug", message));
      }
    },
    child: (child) => createLogger(scope ? `${scope}:${child}` : child),
  };
}

export const logger = createLogger();
