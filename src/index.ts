export {
  measureLines,
  visibleLineWidths,
  visibleWidth,
  wrap,
  wrapWithConfiguration,
} from "./render/wrap/wrapper.js";
export { scanSpans } from "./render/wrap/scanner.js";
export type {
  MeasuredLine,
  Span,
  SpanKind,
  WrapConfiguration,
} from "./render/wrap/types.js";
export { InvalidWidthError } from "./render/wrap/errors.js";
export {
  formatBlock,
  renderMarkup,
  stripMarkup,
} from "./render/markup/formatter.js";
export type { MarkupStyle } from "./render/markup/styles.js";
export { ConsoleLogger } from "./logs/console.js";
export { type LogEntry, MemoryLogger } from "./logs/memory.js";
export {
  LOG_LEVELS,
  type Logger,
  type LogLevel,
  silentLogger,
} from "./logs/logger.js";
