import { renderMarkup } from "../../render/markup/formatter.js";
import {
  visibleLineWidths,
  wrapWithConfiguration,
} from "../../render/wrap/wrapper.js";
import type { WrapCommandInput, WrapCommandResult } from "./types.js";

export function executeWrapCommand(input: WrapCommandInput): WrapCommandResult {
  const { text, width, allowCutUrls, raw, decorated, logger } = input;

  const urlNote = allowCutUrls ? "; URLs may be cut" : "";
  logger.record(
    "debug",
    `Wrapping ${text.length} characters at ${describeWidth(width)}${urlNote}.`,
  );

  const wrapped = wrapWithConfiguration(text, { width, allowCutUrls });
  const overflowingLines = countOverflowingLines(wrapped, width);
  if (overflowingLines > 0) {
    const subject =
      overflowingLines === 1
        ? "1 line exceeds"
        : `${overflowingLines} lines exceed`;
    logger.record(
      "warning",
      `${subject} ${width} columns to keep a URL intact.`,
    );
  }

  return {
    output: raw ? wrapped : renderMarkup(wrapped, { decorated }),
    overflowingLines,
  };
}

function countOverflowingLines(text: string, width: number): number {
  if (width === 0) {
    return 0;
  }
  return visibleLineWidths(text).filter((columns) => columns > width).length;
}

function describeWidth(width: number): string {
  return width === 0 ? "unlimited width" : `width ${width}`;
}
