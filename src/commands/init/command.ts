import { relative, resolve } from "node:path";

import {
  buildDefaultSettingsTemplate,
  SETTINGS_FILENAME,
} from "../../configs/settings/defaults.js";
import { readConfigSnapshot, writeConfigIfChanged } from "../../utils/yaml.js";
import type {
  InitCommandInput,
  InitCommandResult,
  InitSettingsStatus,
} from "./types.js";

export async function executeInitCommand(
  input: InitCommandInput,
): Promise<InitCommandResult> {
  const configPath = resolve(input.root, SETTINGS_FILENAME);
  const displayPath = relative(input.root, configPath);
  const snapshot = await readConfigSnapshot(configPath);

  let status: InitSettingsStatus;
  if (!snapshot.exists) {
    await writeConfigIfChanged(
      configPath,
      buildDefaultSettingsTemplate(),
      snapshot,
    );
    status = "created";
  } else if (!input.force) {
    status = "exists";
  } else {
    const written = await writeConfigIfChanged(
      configPath,
      buildDefaultSettingsTemplate(),
      snapshot,
    );
    status = written ? "reset" : "unchanged";
  }

  return { configPath, displayPath, status };
}
