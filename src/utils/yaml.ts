import { readFile, writeFile } from "node:fs/promises";

import type { YAMLException } from "js-yaml";

import { isFileSystemError } from "./fs.js";

export interface ConfigSnapshot {
  content: string;
  normalized: string;
  exists: boolean;
}

/**
 * Reads a YAML (or general text) config file and returns its snapshot.
 */
export async function readConfigSnapshot(
  filePath: string,
): Promise<ConfigSnapshot> {
  try {
    const content = await readFile(filePath, "utf8");
    return {
      content,
      normalized: normalizeConfigText(content),
      exists: true,
    };
  } catch (error) {
    if (isFileSystemError(error) && error.code === "ENOENT") {
      return { content: "", normalized: "", exists: false };
    }
    throw error;
  }
}

export function normalizeConfigText(value: string): string {
  if (value.length === 0) {
    return "";
  }
  return value.replace(/\r\n/g, "\n").trim();
}

/**
 * Writes config content to disk if the normalized version differs from the previous snapshot.
 */
export async function writeConfigIfChanged(
  filePath: string,
  nextContent: string,
  previous: ConfigSnapshot,
): Promise<boolean> {
  const previousNormalized = previous.exists ? previous.normalized : null;
  if (normalizeConfigText(nextContent) === previousNormalized) {
    return false;
  }

  await writeFile(filePath, ensureTrailingNewline(nextContent), "utf8");
  return true;
}

function ensureTrailingNewline(content: string): string {
  return content.endsWith("\n") ? content : `${content}\n`;
}

export function isYamlException(error: unknown): error is YAMLException {
  return (
    typeof error === "object" &&
    error !== null &&
    "name" in error &&
    error.name === "YAMLException"
  );
}
