import {
  formatCliOutput,
  formatErrorMessage,
  formatWarningMessage,
} from "../utils/output.js";

export type AlertSeverity = "info" | "warn" | "error";

export interface Alert {
  readonly severity: AlertSeverity;
  readonly message: string;
}

export interface CommandOutputPayload {
  readonly body?: string | readonly string[];
  readonly alerts?: readonly Alert[];
  readonly stderr?: string | readonly string[];
  readonly exitCode?: number;
}

export function writeCommandOutput(payload: CommandOutputPayload): void {
  const alerts = payload.alerts ?? [];
  if (alerts.length > 0) {
    process.stdout.write("\n");
  }

  for (const alert of alerts) {
    const formattedAlert = formatAlert(alert);
    if (alert.severity === "info") {
      process.stdout.write(formattedAlert);
    } else {
      process.stderr.write(formattedAlert);
    }
  }

  for (const entry of normalizeToArray(payload.stderr)) {
    process.stderr.write(entry);
  }

  const body = payload.body;
  if (body !== undefined) {
    const normalizedBody = typeof body === "string" ? body : body.join("\n");
    if (normalizedBody.trim().length > 0) {
      process.stdout.write(formatCliOutput(normalizedBody));
    }
  }

  if (typeof payload.exitCode === "number") {
    process.exitCode = payload.exitCode;
  }
}

/**
 * Writes reflowed text exactly as produced, followed by one newline. Unlike
 * {@link writeCommandOutput} it adds no surrounding blank lines, so the
 * output can be piped.
 */
export function writeTextOutput(text: string): void {
  process.stdout.write(`${text}\n`);
}

function formatAlert(alert: Alert): string {
  let formatted: string;

  switch (alert.severity) {
    case "error":
      formatted = formatErrorMessage(alert.message);
      break;
    case "warn":
      formatted = formatWarningMessage(alert.message);
      break;
    case "info":
      formatted = alert.message;
      break;
  }

  return `${formatted}\n`;
}

function normalizeToArray(
  value: string | readonly string[] | undefined,
): readonly string[] {
  if (value === undefined) {
    return [];
  }
  if (typeof value === "string") {
    return [value];
  }
  return value;
}
