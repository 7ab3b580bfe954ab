export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

let currentLevel: LogLevel = "info";

const order: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export function setLogLevel(level: LogLevel) {
  currentLevel = level;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(order, value);
}

/**
 * Parse a user-supplied level name. Returns undefined for unknown names.
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (!value) return undefined;
  const normalized = value.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : undefined;
}

function shouldLog(level: Exclude<LogLevel, "silent">) {
  return order[level] >= order[currentLevel];
}

export function debug(...args: unknown[]) {
  if (shouldLog("debug")) console.debug(...args);
}

export function info(...args: unknown[]) {
  if (shouldLog("info")) console.info(...args);
}

export function warn(...args: unknown[]) {
  if (shouldLog("warn")) console.warn(...args);
}

export function error(...args: unknown[]) {
  if (shouldLog("error")) console.error(...args);
}

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

/**
 * Logger whose lines are prefixed with `[scope]`, e.g. `[server] Listening`.
 */
export function createLogger(scope: string): Logger {
  const tag = `[${scope}]`;
  return {
    debug: (...args) => debug(tag, ...args),
    info: (...args) => info(tag, ...args),
    warn: (...args) => warn(tag, ...args),
    error: (...args) => error(tag, ...args),
  };
}
