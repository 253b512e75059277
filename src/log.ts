/**
 * Operator-facing output. Lines carry the tool prefix so they stand out in CI logs;
 * debug/info go to stdout, warn/error to stderr.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };
const PREFIX = "approval-gate:";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export class ConsoleLogger implements Logger {
  private readonly minLevel: LogLevel;

  constructor(minLevel: LogLevel = "info") {
    this.minLevel = minLevel;
  }

  debug(message: string): void {
    if (this.enabled("debug")) console.log(`${PREFIX} [debug] ${message}`);
  }

  info(message: string): void {
    if (this.enabled("info")) console.log(`${PREFIX} ${message}`);
  }

  warn(message: string): void {
    if (this.enabled("warn")) console.error(`${PREFIX} warning: ${message}`);
  }

  error(message: string): void {
    console.error(`${PREFIX} error: ${message}`);
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.minLevel];
  }
}

export interface LogEntry {
  level: LogLevel;
  message: string;
}

export class InMemoryLogger implements Logger {
  private entries: LogEntry[] = [];

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

  getEntries(): LogEntry[] {
    return [...this.entries];
  }

  /** Messages at the given level, in order. */
  messages(level: LogLevel): string[] {
    return this.entries.filter((e) => e.level === level).map((e) => e.message);
  }
}
