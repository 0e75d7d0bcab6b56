export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const LOG_LEVELS: readonly LogLevel[] = [
  "debug",
  "info",
  "warn",
  "error",
  "silent",
];

// Everything goes to stderr; stdout carries reports.
class ConsoleLogger implements Logger {
  private readonly level: LogLevel;
  private readonly prefix: string;

  constructor(prefix: string = "", level: LogLevel = "info") {
    this.prefix = prefix;
    this.level = level;
  }

  private shouldLog(level: LogLevel): boolean {
    const currentLevelIndex = LOG_LEVELS.indexOf(this.level);
    const messageLevelIndex = LOG_LEVELS.indexOf(level);
    return currentLevelIndex <= messageLevelIndex && this.level !== "silent";
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.shouldLog("debug")) {
      console.error(`${this.prefix}${message}`, ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.shouldLog("info")) {
      console.error(`${this.prefix}${message}`, ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.shouldLog("warn")) {
      console.error(`${this.prefix}warning: ${message}`, ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.shouldLog("error")) {
      console.error(`${this.prefix}error: ${message}`, ...args);
    }
  }
}

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  return LOG_LEVELS.find((level) => level === value?.trim().toLowerCase());
}

export function createLogger(prefix: string = "", level?: LogLevel): Logger {
  const logLevel =
    level ??
    (process.env["NODE_ENV"] === "test"
      ? "silent"
      : (parseLogLevel(process.env["LOG_LEVEL"]) ?? "warn"));
  return new ConsoleLogger(prefix, logLevel);
}

/** Collects entries in memory; used as a diagnostics sink in tests and embeddings. */
export class MemoryLogger implements Logger {
  readonly entries: { level: Exclude<LogLevel, "silent">; message: string }[] =
    [];

  debug(message: string): void {
    this.entries.push({ level: "debug", message });
  }

  info(message: string): void {
    this.entries.push({ level: "info", message });
  }

  warn(message: string): void {
    this.entries.push({ level: "warn", message });
  }

  error(message: string): void {
    this.entries.push({ level: "error", message });
  }

  messages(level: Exclude<LogLevel, "silent">): string[] {
    return this.entries
      .filter((entry) => entry.level === level)
      .map((entry) => entry.message);
  }
}
