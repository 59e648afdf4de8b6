/**
 * Logger capability handed to commands and library code.
 *
 * Nothing holds a process-wide logger: the CLI builds a ConsoleLogger per
 * invocation, tests pass a MemoryLogger, and callers that want quiet pass
 * `silentLogger`. Messages may contain markup tags.
 */

export const LOG_LEVELS = [
  "debug",
  "info",
  "notice",
  "warning",
  "error",
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  record(level: LogLevel, message: string): void;
}

export const silentLogger: Logger = {
  record: () => {},
};

export function isLevelEnabled(level: LogLevel, threshold: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(threshold);
}
