export interface InitCommandInput {
  root: string;
  /** Overwrite an existing settings file with the defaults. */
  force?: boolean;
}

export type InitSettingsStatus = "created" | "exists" | "reset" | "unchanged";

export interface InitCommandResult {
  configPath: string;
  displayPath: string;
  status: InitSettingsStatus;
}
