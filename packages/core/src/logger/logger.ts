export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

class ConsoleLogger implements Logger {
  // undefined follows the process-wide default, resolved on every call
  private level: LogLevel | undefined;
  private prefix: string;

  constructor(prefix: string = "", level?: LogLevel) {
    this.prefix = prefix;
    this.level = level;
  }

  private shouldLog(level: LogLevel): boolean {
    const current = this.level ?? resolveLevel();
    const currentLevelIndex = LOG_LEVELS.indexOf(current);
    const messageLevelIndex = LOG_LEVELS.indexOf(level);

    return currentLevelIndex <= messageLevelIndex && current !== "silent";
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.shouldLog("debug")) {
      console.log(`${this.prefix}${message}`, ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.shouldLog("info")) {
      console.log(`${this.prefix}${message}`, ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.shouldLog("warn")) {
      console.warn(`${this.prefix}${message}`, ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.shouldLog("error")) {
      console.error(`${this.prefix}${message}`, ...args);
    }
  }
}

let defaultLevel: LogLevel | undefined;

/**
 * Overrides the level of every logger created without an explicit level,
 * including ones that already exist. The CLI calls this for `--verbose`.
 */
export function setDefaultLogLevel(level: LogLevel | undefined): void {
  defaultLevel = level;
}

function resolveLevel(): LogLevel {
  if (defaultLevel) return defaultLevel;

  const fromEnv = process.env['LOG_LEVEL'];
  if (isLogLevel(fromEnv)) return fromEnv;

  return process.env['NODE_ENV'] === "test" ? "silent" : "info";
}

// Factory function to create prefixed loggers
export function createLogger(prefix: string = "", level?: LogLevel): Logger {
  return new ConsoleLogger(prefix, level);
}

// Global logger for direct use
export const logger = createLogger("[watchrun] ");
