import type { Logger } from "../../logs/logger.js";

export interface WrapCommandInput {
  text: string;
  width: number;
  allowCutUrls: boolean;
  /** Keep markup tags in the output instead of rendering them. */
  raw: boolean;
  decorated: boolean;
  logger: Logger;
}

export interface WrapCommandResult {
  output: string;
  /** Lines wider than `width`; only unbreakable URLs produce these. */
  overflowingLines: number;
}
