/**
 * Structured logging for corpus loading, indexing and queries
 * All logs go to stderr so command output on stdout stays parseable
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface LogEntry {
  ts: string;
  level: LogLevel;
  event: string;
  source?: string;
  message?: string;
  details?: Record<string, unknown>;
}

/**
 * Parse a log level name, falling back when unknown
 */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = "warn"): LogLevel {
  const lower = value?.trim().toLowerCase();
  return LEVELS.find((level) => level === lower) ?? fallback;
}

export class Logger {
  #minLevel: LogLevel;
  #enabled = true;

  constructor(minLevel: LogLevel = "warn") {
    this.#minLevel = minLevel;
  }

  #shouldLog(level: LogLevel): boolean {
    return this.#enabled && LEVELS.indexOf(level) >= LEVELS.indexOf(this.#minLevel);
  }

  /**
   * Log an event as one JSON line
   */
  log(level: LogLevel, event: string, data?: Omit<Partial<LogEntry>, "ts" | "level" | "event">): void {
    if (!this.#shouldLog(level)) return;

    const entry: LogEntry = {
      ts: new Date().toISOString(),
      level,
      event,
      ...data,
    };

    console.error(JSON.stringify(entry));
  }

  debug(event: string, data?: Omit<Partial<LogEntry>, "ts" | "level" | "event">): void {
    this.log("debug", event, data);
  }

  info(event: string, data?: Omit<Partial<LogEntry>, "ts" | "level" | "event">): void {
    this.log("info", event, data);
  }

  warn(event: string, data?: Omit<Partial<LogEntry>, "ts" | "level" | "event">): void {
    this.log("warn", event, data);
  }

  error(event: string, data?: Omit<Partial<LogEntry>, "ts" | "level" | "event">): void {
    this.log("error", event, data);
  }

  setLevel(level: LogLevel): void {
    this.#minLevel = level;
  }

  get level(): LogLevel {
    return this.#minLevel;
  }

  /**
   * Enable/disable logging
   */
  setEnabled(enabled: boolean): void {
    this.#enabled = enabled;
  }
}

/**
 * Global logger instance, level from DTCREF_LOG_LEVEL
 */
export const logger = new Logger(parseLogLevel(process.env.DTCREF_LOG_LEVEL));
