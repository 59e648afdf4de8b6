import { readFileSync } from "node:fs";

import { z } from "zod";

import { getCliAssetPath } from "./cli-root.js";

const packageManifestSchema = z.object({
  version: z.string().trim().min(1).optional(),
});

let cachedVersion: string | undefined;

export function getReflowVersion(): string {
  if (cachedVersion) {
    return cachedVersion;
  }

  cachedVersion = readPackageVersion() ?? "unknown";
  return cachedVersion;
}

function readPackageVersion(): string | undefined {
  let raw: string;
  try {
    raw = readFileSync(getCliAssetPath("package.json"), "utf-8");
  } catch {
    return undefined;
  }

  let manifest: unknown;
  try {
    manifest = JSON.parse(raw);
  } catch {
    return undefined;
  }

  const parsed = packageManifestSchema.safeParse(manifest);
  return parsed.success ? parsed.data.version : undefined;
}
