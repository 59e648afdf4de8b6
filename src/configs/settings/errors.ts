import { HintedError } from "../../utils/errors.js";

export class SettingsError extends HintedError {
  public readonly filePath: string;

  constructor(filePath: string, detail: string) {
    super(`Invalid settings file at ${filePath}: ${detail}`, {
      hintLines: [`Fix or remove \`${filePath}\` and rerun.`],
    });
    this.name = "SettingsError";
    this.filePath = filePath;
  }
}

export class SettingsNotFoundError extends HintedError {
  constructor(filePath: string) {
    super(`Settings file not found: ${filePath}`, {
      hintLines: [
        "Check the --config path, or run `reflow init` to create one.",
      ],
    });
    this.name = "SettingsNotFoundError";
  }
}

export class SettingsEnvironmentError extends HintedError {
  constructor(variable: string, value: string, allowed: readonly string[]) {
    super(`Invalid ${variable} value "${value}".`, {
      detailLines: [`Expected one of: ${allowed.join(", ")}.`],
    });
    this.name = "SettingsEnvironmentError";
  }
}
