import { resolve } from "node:path";

import { parseYamlDocument } from "../../utils/yaml-reader.js";
import {
  createConfigLoader,
  type ReadFileFn,
} from "../shared/loader-factory.js";
import { DEFAULT_SETTINGS, SETTINGS_FILENAME } from "./defaults.js";
import {
  SettingsEnvironmentError,
  SettingsError,
  SettingsNotFoundError,
} from "./errors.js";
import {
  logLevelSchema,
  type ReflowSettings,
  type ReflowSettingsDocument,
  reflowSettingsSchema,
} from "./types.js";

export const LOG_LEVEL_ENV = "REFLOW_LOG_LEVEL" as const;

export interface LoadReflowSettingsOptions {
  root?: string;
  filePath?: string;
  readFile?: ReadFileFn;
  env?: NodeJS.ProcessEnv;
}

const reflowSettingsLoader = createConfigLoader<
  ReflowSettings,
  LoadReflowSettingsOptions
>({
  resolveFilePath: (root, options) =>
    options.filePath
      ? resolve(root, options.filePath)
      : resolve(root, SETTINGS_FILENAME),
  handleMissing: (context) => {
    if (context.options.filePath) {
      throw new SettingsNotFoundError(context.filePath);
    }
    return { ...DEFAULT_SETTINGS };
  },
  parse: (content, context) => {
    const document = parseSettingsYaml(content, context.filePath);
    return {
      width: document.width,
      allowCutUrls: document.allowCutUrls ?? DEFAULT_SETTINGS.allowCutUrls,
      color: document.color ?? DEFAULT_SETTINGS.color,
      logLevel: document.logLevel ?? DEFAULT_SETTINGS.logLevel,
    };
  },
});

export function loadReflowSettings(
  options: LoadReflowSettingsOptions = {},
): ReflowSettings {
  const settings = reflowSettingsLoader(options);
  return applyEnvironmentOverrides(settings, options.env ?? process.env);
}

function applyEnvironmentOverrides(
  settings: ReflowSettings,
  env: NodeJS.ProcessEnv,
): ReflowSettings {
  const raw = env[LOG_LEVEL_ENV]?.trim();
  if (!raw) {
    return settings;
  }

  const parsed = logLevelSchema.safeParse(raw.toLowerCase());
  if (!parsed.success) {
    throw new SettingsEnvironmentError(
      LOG_LEVEL_ENV,
      raw,
      logLevelSchema.options,
    );
  }
  return { ...settings, logLevel: parsed.data };
}

function parseSettingsYaml(
  content: string,
  filePath: string,
): ReflowSettingsDocument {
  const document = parseYamlDocument(content, {
    formatError: (detail) => {
      const reason = detail.reason.replace(/\s+/gu, " ").trim();
      return new SettingsError(
        filePath,
        detail.line !== undefined ? `${reason} (line ${detail.line})` : reason,
      );
    },
    emptyValue: {},
  });

  const result = reflowSettingsSchema.safeParse(document);
  if (!result.success) {
    const issue = result.error.issues[0];
    if (!issue) {
      throw new SettingsError(filePath, "Invalid settings value");
    }
    const location = issue.path.join(".");
    throw new SettingsError(
      filePath,
      location ? `${location}: ${issue.message}` : issue.message,
    );
  }
  return result.data;
}
