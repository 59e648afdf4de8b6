import type { ScanOptions, Span, SpanKind } from "./types.js";

type ScanState = "plain" | "tag" | "url";

const END_OF_INPUT = "";
const SCHEME_SEPARATOR = "://";
const TAG_NAME = /^[A-Za-z]+/u;

/**
 * Splits `text` into plain-text, markup-tag and URL spans.
 *
 * A tag is `<` followed by a letter (or `/` for a closing tag) and runs to the
 * next `>` on the same line. An opener that hits another `<`, a line break or
 * the end of input before its `>` is plain text, and scanning resumes right
 * after the `<`. Closing tags must match an open tag; `</>` closes the most
 * recent one. A stray closer stays plain text.
 */
export function scanSpans(text: string, options: ScanOptions = {}): Span[] {
  const urlStarts = options.detectUrls === false ? null : findUrlStarts(text);
  const spans: Span[] = [];
  const openTags: string[] = [];

  let state: ScanState = "plain";
  let textStart = 0;
  let markStart = 0;
  let index = 0;

  const emit = (
    kind: SpanKind,
    start: number,
    endExclusive: number,
  ): void => {
    if (endExclusive <= start) {
      return;
    }
    spans.push({
      kind,
      start,
      end: endExclusive - 1,
      raw: text.slice(start, endExclusive),
    });
  };

  while (index <= text.length) {
    const char = index < text.length ? text.charAt(index) : END_OF_INPUT;

    switch (state) {
      case "plain": {
        if (char === END_OF_INPUT) {
          index += 1;
          break;
        }
        if (char === "<" && opensTag(text, index)) {
          state = "tag";
          markStart = index;
        } else if (urlStarts?.has(index)) {
          state = "url";
          markStart = index;
        }
        index += 1;
        break;
      }

      case "tag": {
        if (char === ">") {
          const raw = text.slice(markStart, index + 1);
          if (acceptTag(raw, openTags)) {
            emit("text", textStart, markStart);
            emit("tag", markStart, index + 1);
            textStart = index + 1;
          }
          state = "plain";
          index += 1;
          break;
        }
        if (char === END_OF_INPUT || char === "<" || isLineBreak(char)) {
          state = "plain";
          index = markStart + 1;
          break;
        }
        index += 1;
        break;
      }

      case "url": {
        if (char === END_OF_INPUT || char === "<" || /\s/u.test(char)) {
          emit("text", textStart, markStart);
          emit("url", markStart, index);
          textStart = index;
          state = "plain";
          if (char === END_OF_INPUT) {
            index += 1;
          }
          break;
        }
        index += 1;
        break;
      }
    }
  }

  emit("text", textStart, text.length);
  return spans;
}

function opensTag(text: string, index: number): boolean {
  const next = text.charAt(index + 1);
  if (isLetter(next)) {
    return true;
  }
  if (next !== "/") {
    return false;
  }
  const afterSlash = text.charAt(index + 2);
  return afterSlash === ">" || isLetter(afterSlash);
}

/**
 * Offsets where a `scheme://` URL may begin: a letter that is not preceded by
 * a letter or digit, followed by scheme characters up to a `://` that has at
 * least one more character before whitespace or `<`. Scheme runs end at `:`,
 * so each character is visited a bounded number of times.
 */
function findUrlStarts(text: string): Set<number> {
  const starts = new Set<number>();
  let separator = text.indexOf(SCHEME_SEPARATOR);

  while (separator >= 0) {
    const next = text.charAt(separator + SCHEME_SEPARATOR.length);
    if (next !== "" && next !== "<" && !/\s/u.test(next)) {
      let runStart = separator;
      while (runStart > 0 && isSchemeChar(text.charAt(runStart - 1))) {
        runStart -= 1;
      }
      for (let index = runStart; index < separator; index += 1) {
        if (
          isLetter(text.charAt(index)) &&
          !isAlphanumeric(text.charAt(index - 1))
        ) {
          starts.add(index);
        }
      }
    }
    separator = text.indexOf(SCHEME_SEPARATOR, separator + 1);
  }

  return starts;
}

/**
 * Updates `openTags` for a scanned tag. Returns false for a closing tag that
 * matches nothing open, leaving the stack as it was.
 */
export function acceptTag(raw: string, openTags: string[]): boolean {
  const body = raw.slice(1, -1);
  if (!body.startsWith("/")) {
    openTags.push(body);
    return true;
  }

  const depth = findClosedTag(openTags, body.slice(1));
  if (depth < 0) {
    return false;
  }
  openTags.length = depth;
  return true;
}

/**
 * Index of the open tag that `closing` (a closing tag body without its `/`)
 * ends, or -1. An empty body closes the most recent tag; otherwise the
 * nearest opener whose body or leading name equals `closing` matches.
 */
export function findClosedTag(
  openTags: readonly string[],
  closing: string,
): number {
  if (closing.length === 0) {
    return openTags.length - 1;
  }

  for (let depth = openTags.length - 1; depth >= 0; depth -= 1) {
    const opener = openTags[depth] ?? "";
    if (opener === closing || tagName(opener) === closing) {
      return depth;
    }
  }
  return -1;
}

/** Leading letters of a tag body: `fg` for `fg=red;options=bold`. */
export function tagName(body: string): string {
  return TAG_NAME.exec(body)?.[0] ?? "";
}

function isLetter(char: string): boolean {
  return /^[A-Za-z]$/u.test(char);
}

function isAlphanumeric(char: string): boolean {
  return /^[A-Za-z0-9]$/u.test(char);
}

function isSchemeChar(char: string): boolean {
  return /^[A-Za-z0-9+.-]$/u.test(char);
}

function isLineBreak(char: string): boolean {
  return char === "\n" || char === "\r";
}
