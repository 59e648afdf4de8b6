import { describe, expect, it } from "@jest/globals";

import { ConsoleLogger } from "../../src/logs/console.js";
import { isLevelEnabled } from "../../src/logs/logger.js";
import { createCapturedStream } from "../support/streams.js";

function createLogger(options: ConstructorParameters<typeof ConsoleLogger>[0]) {
  const output = createCapturedStream();
  const errorOutput = createCapturedStream();
  const logger = new ConsoleLogger({ ...options, output, errorOutput });
  return { logger, output, errorOutput };
}

describe("ConsoleLogger", () => {
  it("drops records below the threshold", () => {
    const { logger, output, errorOutput } = createLogger({});

    logger.record("debug", "hidden");
    logger.record("info", "hidden too");

    expect(output.chunks).toEqual([]);
    expect(errorOutput.chunks).toEqual([]);
  });

  it("prefixes notices and strips markup when undecorated", () => {
    const { logger, output } = createLogger({});

    logger.record("notice", "Loaded <info>3</info> files");

    expect(output.text()).toBe("Notice: Loaded 3 files\n");
  });

  it("sends warnings and errors to the error stream", () => {
    const { logger, output, errorOutput } = createLogger({});

    logger.record("warning", "Careful");
    logger.record("error", "Broke");

    expect(output.chunks).toEqual([]);
    expect(errorOutput.chunks).toEqual([
      "Warning: Careful\n",
      "Error: Broke\n",
    ]);
  });

  it("paints level labels when decorated", () => {
    const { logger, errorOutput } = createLogger({ decorated: true });

    logger.record("error", "Broke");

    expect(errorOutput.text()).toBe(
      "\u001B[41m\u001B[37mError:\u001B[39m\u001B[49m Broke\n",
    );
  });

  it("wraps records to the configured width", () => {
    const { logger, output } = createLogger({ threshold: "debug", width: 12 });

    logger.record("debug", "alpha beta gamma");

    expect(output.text()).toBe("[debug]\nalpha beta\ngamma\n");
  });
});

describe("isLevelEnabled", () => {
  it("compares levels by severity", () => {
    expect(isLevelEnabled("warning", "notice")).toBe(true);
    expect(isLevelEnabled("notice", "notice")).toBe(true);
    expect(isLevelEnabled("info", "notice")).toBe(false);
  });
});
