export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
  child(scope: string): Logger;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_RANK, value);
}

export function createConsoleLogger(options: { level?: LogLevel; scope?: string } = {}): Logger {
  const threshold = LEVEL_RANK[options.level ?? "info"];
  const prefix = options.scope ? `[${options.scope}]` : "";

  const emit = (level: LogLevel, message: string, data: unknown) => {
    if (LEVEL_RANK[level] < threshold) return;
    const line = prefix ? `${prefix} ${message}` : message;
    const args: unknown[] = data === undefined ? [line] : [line, data];
    switch (level) {
      case "debug":
        console.debug(...args);
        break;
      case "info":
        console.log(...args);
        break;
      case "warn":
        console.warn(...args);
        break;
      case "error":
        console.error(...args);
        break;
    }
  };

  return {
    debug: (message, data) => emit("debug", message, data),
    info: (message, data) => emit("info", message, data),
    warn: (message, data) => emit("warn", message, data),
    error: (message, data) => emit("error", message, data),
    child: (scope) =>
      createConsoleLogger({
        level: options.level,
        scope: options.scope ? `${options.scope}:${scope}` : scope,
      }),
  };
}

/** For tests and embedding. */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => silentLogger,
};
