import { InvalidWidthError } from "./errors.js";
import { acceptTag, scanSpans } from "./scanner.js";
import type { MeasuredLine, Span, WrapConfiguration } from "./types.js";

type LayoutItem =
  | {
      readonly kind: "word";
      readonly value: string;
      readonly cuttable: boolean;
    }
  | { readonly kind: "space"; readonly value: string }
  | { readonly kind: "tag"; readonly value: string };

type Chunk = readonly Exclude<LayoutItem, { kind: "space" }>[];

interface PlacementGroup {
  readonly space: string;
  readonly chunk: Chunk;
}

const TEXT_SEPARATOR = /(\r?\n|[^\S\r\n]+|\r)/u;
const LINE_BREAK = /^(?:\r?\n|\r)$/u;
const HARD_BREAK = /\r\n|\n|\r/u;
const BLANK = /^\s+$/u;

/**
 * Reflows `text` so that no line shows more than `width` columns.
 *
 * Markup tags take no columns and are never split. URLs are kept whole
 * unless `allowCutUrls` is set, in which case they break like any other
 * word. Existing line breaks (`\n`, `\r\n` or a lone `\r`) always end a
 * line. A width of 0 returns the input untouched.
 */
export function wrap(text: string, width = 0, allowCutUrls = false): string {
  assertValidWidth(width);
  if (width === 0 || text.length === 0) {
    return text;
  }

  const spans = scanSpans(text, { detectUrls: !allowCutUrls });
  const lines = splitHardLines(spans).flatMap((items) =>
    layoutLine(items, width),
  );
  return lines.join(detectLineEnding(text));
}

export function wrapWithConfiguration(
  text: string,
  configuration: WrapConfiguration,
): string {
  return wrap(text, configuration.width, configuration.allowCutUrls);
}

export function assertValidWidth(width: number): void {
  if (!Number.isInteger(width) || width < 0) {
    throw new InvalidWidthError(width);
  }
}

/**
 * Columns taken by `text` once markup tags are removed. The text is measured
 * on its own, so a closer whose opener is outside it counts as text; use
 * {@link measureLines} for one line of a larger block.
 */
export function visibleWidth(text: string): number {
  return scanSpans(text, { detectUrls: false })
    .filter((span) => span.kind !== "tag")
    .reduce((total, span) => total + columns(span.raw), 0);
}

/**
 * Splits `text` at its line breaks in a single scan, so tags opened on one
 * line still match their closers on later ones.
 */
export function measureLines(text: string): MeasuredLine[] {
  const lines: MeasuredLine[] = [];
  const openTags: string[] = [];
  let openAtStart: string[] = [];
  let raw = "";
  let width = 0;

  const finishLine = (): void => {
    lines.push({ raw, width, openAtStart, openAtEnd: [...openTags] });
    openAtStart = [...openTags];
    raw = "";
    width = 0;
  };

  for (const span of scanSpans(text, { detectUrls: false })) {
    if (span.kind === "tag") {
      acceptTag(span.raw, openTags);
      raw += span.raw;
      continue;
    }

    span.raw.split(HARD_BREAK).forEach((part, index) => {
      if (index > 0) {
        finishLine();
      }
      raw += part;
      width += columns(part);
    });
  }

  finishLine();
  return lines;
}

export function visibleLineWidths(text: string): number[] {
  return measureLines(text).map((line) => line.width);
}

function detectLineEnding(text: string): "\n" | "\r\n" {
  const index = text.indexOf("\n");
  return index > 0 && text.charAt(index - 1) === "\r" ? "\r\n" : "\n";
}

function splitHardLines(spans: readonly Span[]): LayoutItem[][] {
  let current: LayoutItem[] = [];
  const lines: LayoutItem[][] = [current];

  for (const span of spans) {
    if (span.kind === "tag") {
      current.push({ kind: "tag", value: span.raw });
      continue;
    }
    if (span.kind === "url") {
      current.push({ kind: "word", value: span.raw, cuttable: false });
      continue;
    }

    for (const part of span.raw.split(TEXT_SEPARATOR)) {
      if (part.length === 0) {
        continue;
      }
      if (LINE_BREAK.test(part)) {
        current = [];
        lines.push(current);
      } else if (BLANK.test(part)) {
        current.push({ kind: "space", value: part });
      } else {
        current.push({ kind: "word", value: part, cuttable: true });
      }
    }
  }

  return lines;
}

function layoutLine(items: readonly LayoutItem[], width: number): string[] {
  const line = new LineBuilder();
  let rest = items;

  const first = items[0];
  if (first?.kind === "space") {
    if (columns(first.value) < width) {
      line.appendSpace(first.value);
    }
    rest = items.slice(1);
  }

  for (const { space, chunk } of groupChunks(rest)) {
    const chunkWidth = measureChunk(chunk);

    if (line.column + columns(space) + chunkWidth <= width) {
      line.appendSpace(space);
      line.appendChunk(chunk);
      continue;
    }

    // Tags never force a break; the space before them falls on one anyway.
    if (chunkWidth === 0) {
      line.appendChunk(chunk);
      continue;
    }

    if (line.hasVisible) {
      line.close();
    }

    if (line.column + chunkWidth <= width) {
      line.appendChunk(chunk);
      continue;
    }

    placeOverflowingChunk(line, chunk, width);
  }

  line.close();
  return line.lines;
}

/**
 * Pairs each run of non-blank items with the whitespace before it. Whitespace
 * after the last chunk is dropped.
 */
function groupChunks(items: readonly LayoutItem[]): PlacementGroup[] {
  const groups: PlacementGroup[] = [];
  let space = "";
  let chunk: Exclude<LayoutItem, { kind: "space" }>[] = [];

  for (const item of items) {
    if (item.kind !== "space") {
      chunk.push(item);
      continue;
    }
    if (chunk.length > 0) {
      groups.push({ space, chunk });
      chunk = [];
      space = "";
    }
    space += item.value;
  }

  if (chunk.length > 0) {
    groups.push({ space, chunk });
  }
  return groups;
}

function placeOverflowingChunk(
  line: LineBuilder,
  chunk: Chunk,
  width: number,
): void {
  for (const item of chunk) {
    if (item.kind === "tag") {
      line.appendTag(item.value);
      continue;
    }

    if (!item.cuttable) {
      if (line.hasVisible && line.column + columns(item.value) > width) {
        line.close();
      }
      line.appendText(item.value);
      continue;
    }

    const characters = Array.from(item.value);
    let offset = 0;
    while (offset < characters.length) {
      if (line.column >= width) {
        line.close();
      }
      const end = offset + width - line.column;
      line.appendText(characters.slice(offset, end).join(""));
      offset = end;
    }
  }
}

function measureChunk(chunk: Chunk): number {
  return chunk.reduce(
    (total, item) =>
      item.kind === "tag" ? total : total + columns(item.value),
    0,
  );
}

function columns(value: string): number {
  return Array.from(value).length;
}

interface Piece {
  readonly kind: "text" | "space" | "tag";
  readonly value: string;
}

class LineBuilder {
  public readonly lines: string[] = [];
  private pieces: Piece[] = [];
  private used = 0;
  private visible = false;

  get column(): number {
    return this.used;
  }

  get hasVisible(): boolean {
    return this.visible;
  }

  appendSpace(value: string): void {
    if (value.length === 0) {
      return;
    }
    this.pieces.push({ kind: "space", value });
    this.used += columns(value);
  }

  appendTag(value: string): void {
    this.pieces.push({ kind: "tag", value });
  }

  appendText(value: string): void {
    this.pieces.push({ kind: "text", value });
    this.used += columns(value);
    this.visible = true;
  }

  appendChunk(chunk: Chunk): void {
    for (const item of chunk) {
      if (item.kind === "tag") {
        this.appendTag(item.value);
      } else {
        this.appendText(item.value);
      }
    }
  }

  close(): void {
    let lastText = -1;
    this.pieces.forEach((piece, index) => {
      if (piece.kind === "text") {
        lastText = index;
      }
    });

    this.lines.push(
      this.pieces
        .filter((piece, index) => piece.kind !== "space" || index < lastText)
        .map((piece) => piece.value)
        .join(""),
    );
    this.pieces = [];
    this.used = 0;
    this.visible = false;
  }
}
