export type SpanKind = "text" | "tag" | "url";

/**
 * Contiguous run of the input. `start` and `end` are inclusive offsets into
 * the scanned string; the spans of one scan cover it without gaps.
 */
export interface Span {
  readonly kind: SpanKind;
  readonly start: number;
  readonly end: number;
  readonly raw: string;
}

export interface WrapConfiguration {
  /** Maximum visible columns per line; 0 disables wrapping. */
  readonly width: number;
  readonly allowCutUrls: boolean;
}

export interface ScanOptions {
  /** When false, URLs are reported as plain text. */
  readonly detectUrls?: boolean;
}

/** One line of a block of markup, measured with the block's open tags. */
export interface MeasuredLine {
  /** The line as written, tags included. */
  readonly raw: string;
  /** Visible columns. */
  readonly width: number;
  /** Bodies of the tags still open where the line starts. */
  readonly openAtStart: readonly string[];
  /** Bodies of the tags still open where the line ends. */
  readonly openAtEnd: readonly string[];
}
