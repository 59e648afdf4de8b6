import { renderMarkup } from "../render/markup/formatter.js";

export function formatCliOutput(value: string): string {
  const trimmedEnd = value.trimEnd();
  return `\n${trimmedEnd}\n\n`;
}

/** Paints `label:` in the markup style `style`; the message is left as is. */
export function formatAlertMessage(
  label: string,
  style: string,
  message: string,
): string {
  const prefix = renderMarkup(`<${style}>${label}:</${style}>`);
  return `${prefix} ${message}`;
}

export function formatErrorMessage(message: string): string {
  return formatAlertMessage("Error", "error", message);
}

export function formatWarningMessage(message: string): string {
  return formatAlertMessage("Warning", "comment", message);
}
