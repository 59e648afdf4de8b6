import { load } from "js-yaml";

import { toErrorMessage } from "./errors.js";
import { isYamlException } from "./yaml.js";

export interface YamlParseErrorDetail {
  reason: string;
  line?: number;
  column?: number;
}

export interface ParseYamlDocumentOptions<TError extends Error> {
  emptyValue?: unknown;
  formatError: (detail: YamlParseErrorDetail) => TError;
}

export function parseYamlDocument<TError extends Error>(
  content: string,
  options: ParseYamlDocumentOptions<TError>,
): unknown {
  const { emptyValue = {}, formatError } = options;
  const source = content.trim();

  if (source.length === 0) {
    return emptyValue;
  }

  try {
    const document = load(source, { json: false });
    return document ?? emptyValue;
  } catch (error) {
    throw formatError(buildYamlParseErrorDetail(error));
  }
}

function buildYamlParseErrorDetail(error: unknown): YamlParseErrorDetail {
  if (!isYamlException(error)) {
    return { reason: toErrorMessage(error) };
  }

  const { reason, message, mark } = error;
  return {
    reason: reason || message,
    line: typeof mark?.line === "number" ? mark.line + 1 : undefined,
    column: typeof mark?.column === "number" ? mark.column + 1 : undefined,
  };
}
