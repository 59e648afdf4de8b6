import type { Logger, LogLevel } from "./logger.js";

export interface LogEntry {
  id: number;
  level: LogLevel;
  message: string;
  timestamp: Date;
}

/**
 * Keeps records in memory instead of printing them, for tests and for
 * callers that render the log later.
 */
export class MemoryLogger implements Logger {
  private entries: LogEntry[] = [];
  private nextId = 0;

  record(level: LogLevel, message: string): void {
    this.entries.push({
      id: this.nextId++,
      level,
      message,
      timestamp: new Date(),
    });
  }

  getEntries(): readonly LogEntry[] {
    return this.entries;
  }

  messages(level?: LogLevel): string[] {
    return this.entries
      .filter((entry) => level === undefined || entry.level === level)
      .map((entry) => entry.message);
  }

  clear(): void {
    this.entries = [];
  }
}
