import type { ReflowSettings } from "../../configs/settings/types.js";
import type { LogLevel } from "../../logs/logger.js";
import {
  resolveTerminalWidth,
  type TerminalWidthOptions,
} from "../../utils/terminal.js";

export interface WrapOptionSources {
  settings: ReflowSettings;
  width?: number;
  cutUrls?: boolean;
  color?: boolean;
  verbose?: boolean;
  output?: TerminalWidthOptions["output"];
  env?: NodeJS.ProcessEnv;
}

export interface ResolvedWrapOptions {
  width: number;
  allowCutUrls: boolean;
  decorated: boolean;
  logLevel: LogLevel;
}

/**
 * Merges command-line flags over settings. Width falls back to the terminal
 * when neither names one.
 */
export function resolveWrapOptions(
  sources: WrapOptionSources,
): ResolvedWrapOptions {
  const { settings } = sources;
  const env = sources.env ?? process.env;
  const output = sources.output === undefined ? process.stdout : sources.output;

  return {
    width:
      sources.width ?? settings.width ?? resolveTerminalWidth({ output, env }),
    allowCutUrls: sources.cutUrls ?? settings.allowCutUrls,
    decorated: sources.color ?? resolveColorMode(settings, output, env),
    logLevel: sources.verbose ? "debug" : settings.logLevel,
  };
}

function resolveColorMode(
  settings: ReflowSettings,
  output: TerminalWidthOptions["output"],
  env: NodeJS.ProcessEnv,
): boolean {
  switch (settings.color) {
    case "always":
      return true;
    case "never":
      return false;
    case "auto":
      return Boolean(output?.isTTY) && env.NO_COLOR === undefined;
  }
}
