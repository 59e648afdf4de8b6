import { findClosedTag, scanSpans } from "../wrap/scanner.js";
import type { MeasuredLine } from "../wrap/types.js";
import { measureLines, wrap } from "../wrap/wrapper.js";
import { applyStyle, type MarkupStyle, resolveStyle } from "./styles.js";

export interface RenderMarkupOptions {
  /** Paint styled runs with ANSI escapes. Tags are removed either way. */
  decorated?: boolean;
}

interface OpenStyle {
  readonly body: string;
  readonly style: MarkupStyle | undefined;
}

export function renderMarkup(
  text: string,
  options: RenderMarkupOptions = {},
): string {
  const decorated = options.decorated ?? true;
  const stack: OpenStyle[] = [];
  let output = "";

  for (const span of scanSpans(text, { detectUrls: false })) {
    if (span.kind === "tag") {
      updateStyleStack(stack, span.raw.slice(1, -1));
      continue;
    }

    const style = decorated ? currentStyle(stack) : undefined;
    output += style ? applyStyle(style, span.raw) : span.raw;
  }

  return output;
}

export function stripMarkup(text: string): string {
  return renderMarkup(text, { decorated: false });
}

function updateStyleStack(stack: OpenStyle[], body: string): void {
  if (!body.startsWith("/")) {
    stack.push({ body, style: resolveStyle(body) });
    return;
  }

  const depth = findClosedTag(
    stack.map((entry) => entry.body),
    body.slice(1),
  );
  if (depth >= 0) {
    stack.length = depth;
  }
}

function currentStyle(stack: readonly OpenStyle[]): MarkupStyle | undefined {
  for (let index = stack.length - 1; index >= 0; index -= 1) {
    const style = stack[index]?.style;
    if (style) {
      return style;
    }
  }
  return undefined;
}

export interface FormatBlockOptions {
  /** Total block width including padding; 0 sizes the block to its content. */
  width?: number;
  padding?: number;
}

const BLANK_ROW: MeasuredLine = {
  raw: "",
  width: 0,
  openAtStart: [],
  openAtEnd: [],
};

/**
 * Lays out `messages` as a padded block in the `style` tag, with one blank
 * padded row above and below. Tags still open at the end of a row are closed
 * there and reopened on the next. Returns markup; pass it through
 * {@link renderMarkup} to paint it.
 */
export function formatBlock(
  messages: readonly string[],
  style: string,
  options: FormatBlockOptions = {},
): string {
  const padding = options.padding ?? 2;
  const innerWidth = Math.max(0, (options.width ?? 0) - padding * 2);

  const lines = messages.flatMap((message) =>
    measureLines(wrap(message, innerWidth)),
  );
  const contentWidth = lines.reduce(
    (widest, line) => Math.max(widest, line.width),
    0,
  );
  const gutter = " ".repeat(padding);

  const rows = [BLANK_ROW, ...lines, BLANK_ROW].map((line) => {
    const reopen = line.openAtStart.map((body) => `<${body}>`).join("");
    const close = "</>".repeat(line.openAtEnd.length);
    const fill = " ".repeat(contentWidth - line.width);
    return `<${style}>${gutter}${reopen}${line.raw}${close}${fill}${gutter}</${style}>`;
  });
  return rows.join("\n");
}
