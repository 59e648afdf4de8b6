export const DEFAULT_TERMINAL_WIDTH = 80;

export interface TerminalWidthOptions {
  output?: Pick<NodeJS.WriteStream, "isTTY" | "columns"> | null;
  env?: NodeJS.ProcessEnv;
}

/**
 * Column count of the attached terminal. Falls back to `COLUMNS` when stdout
 * is piped, then to {@link DEFAULT_TERMINAL_WIDTH}.
 */
export function resolveTerminalWidth(
  options: TerminalWidthOptions = {},
): number {
  const output = options.output === undefined ? process.stdout : options.output;
  if (output?.isTTY && output.columns > 0) {
    return output.columns;
  }

  const fromEnv = (options.env ?? process.env).COLUMNS?.trim();
  if (fromEnv && /^\d+$/u.test(fromEnv)) {
    const parsed = Number.parseInt(fromEnv, 10);
    if (parsed > 0) {
      return parsed;
    }
  }

  return DEFAULT_TERMINAL_WIDTH;
}
