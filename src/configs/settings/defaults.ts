import type { ReflowSettings } from "./types.js";

export const SETTINGS_FILENAME = ".reflow.yaml" as const;

export const DEFAULT_SETTINGS: Readonly<ReflowSettings> = {
  allowCutUrls: false,
  color: "auto",
  logLevel: "notice",
};

export function buildDefaultSettingsTemplate(): string {
  return [
    "# Columns per line; 0 disables wrapping. Omit to follow the terminal width.",
    "# width: 80",
    "",
    "# Let long URLs break across lines like ordinary words.",
    "allowCutUrls: false",
    "",
    "# auto | always | never",
    "color: auto",
    "",
    "# debug | info | notice | warning | error",
    "logLevel: notice",
    "",
  ].join("\n");
}
