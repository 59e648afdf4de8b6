import { z } from "zod";

import { LOG_LEVELS, type LogLevel } from "../../logs/logger.js";

export const colorModeSchema = z.enum(["auto", "always", "never"]);

export type ColorMode = z.infer<typeof colorModeSchema>;

export const logLevelSchema = z.enum(LOG_LEVELS);

export interface ReflowSettings {
  /** Wrap width; undefined means "use the terminal width". */
  width?: number;
  allowCutUrls: boolean;
  color: ColorMode;
  logLevel: LogLevel;
}

export const reflowSettingsSchema = z
  .object({
    width: z
      .number({ invalid_type_error: "must be a number" })
      .int("must be an integer")
      .nonnegative("must be 0 or greater")
      .optional(),
    allowCutUrls: z
      .boolean({ invalid_type_error: "must be true or false" })
      .optional(),
    color: colorModeSchema.optional(),
    logLevel: logLevelSchema.optional(),
  })
  .strict();

export type ReflowSettingsDocument = z.infer<typeof reflowSettingsSchema>;
