import { renderMarkup } from "../render/markup/formatter.js";
import { wrap } from "../render/wrap/wrapper.js";
import { isLevelEnabled, type Logger, type LogLevel } from "./logger.js";

type OutputStream = Pick<NodeJS.WritableStream, "write">;

export interface ConsoleLoggerOptions {
  threshold?: LogLevel;
  /** Wrap width for each record; 0 leaves records unwrapped. */
  width?: number;
  decorated?: boolean;
  /** Destination for records below `warning`; defaults to stdout. */
  output?: OutputStream;
  /** Destination for `warning` and `error`; defaults to stderr. */
  errorOutput?: OutputStream;
}

const LEVEL_PREFIXES: Record<LogLevel, string> = {
  debug: "[debug] ",
  info: "",
  notice: "<info>Notice:</info> ",
  warning: "<comment>Warning:</comment> ",
  error: "<error>Error:</error> ",
};

export class ConsoleLogger implements Logger {
  private readonly threshold: LogLevel;
  private readonly width: number;
  private readonly decorated: boolean;
  private readonly output: OutputStream;
  private readonly errorOutput: OutputStream;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.threshold = options.threshold ?? "notice";
    this.width = options.width ?? 0;
    this.decorated = options.decorated ?? false;
    this.output = options.output ?? process.stdout;
    this.errorOutput = options.errorOutput ?? process.stderr;
  }

  record(level: LogLevel, message: string): void {
    if (!isLevelEnabled(level, this.threshold)) {
      return;
    }

    const wrapped = wrap(`${LEVEL_PREFIXES[level]}${message}`, this.width);
    const line = `${renderMarkup(wrapped, { decorated: this.decorated })}\n`;

    if (level === "warning" || level === "error") {
      this.errorOutput.write(line);
    } else {
      this.output.write(line);
    }
  }
}
