import { readFileSync } from "node:fs";
import { resolve } from "node:path";

import { describe, expect, it } from "@jest/globals";

import { runReflow } from "../support/command-tester.js";

const ERROR_LABEL = "\u001B[41m\u001B[37mError:\u001B[39m\u001B[49m";

describe("CLI entrypoint", () => {
  it("prints help when run without arguments", async () => {
    const { stdout, exitCode } = await runReflow([]);

    expect(stdout).toContain("Usage: reflow [options] [command]");
    expect(stdout).toContain("wrap [options] [text...]");
    expect(exitCode).toBeUndefined();
  });

  it("prints the CLI version for -v/--version", async () => {
    const packageJson: unknown = JSON.parse(
      readFileSync(resolve(__dirname, "../../package.json"), "utf8"),
    );
    const version =
      typeof packageJson === "object" &&
      packageJson !== null &&
      "version" in packageJson
        ? String(packageJson.version)
        : "";

    const { stdout, exitCode } = await runReflow(["--version"]);

    expect(stdout).toBe(`${version}\n`);
    expect(exitCode).toBe(0);
  });

  it("wraps argument text to stdout", async () => {
    const { stdout, stderr } = await runReflow([
      "wrap",
      "--width",
      "10",
      "--no-color",
      "alpha beta gamma",
    ]);

    expect(stdout).toBe("alpha beta\ngamma\n");
    expect(stderr).toBe("");
  });

  it("logs an overflow warning to stderr", async () => {
    const { stdout, stderr } = await runReflow([
      "wrap",
      "-w",
      "40",
      "--no-color",
      "see https://example.com/a/rather/long/path/to/follow",
    ]);

    expect(stdout).toBe(
      "see\nhttps://example.com/a/rather/long/path/to/follow\n",
    );
    expect(stderr).toBe(
      "Warning: 1 line exceeds 40 columns to\nkeep a URL intact.\n",
    );
  });

  it("logs debug details with --verbose", async () => {
    const { stdout, stderr } = await runReflow([
      "wrap",
      "-w",
      "0",
      "--verbose",
      "--no-color",
      "hello",
    ]);

    expect(stdout).toBe("hello\n");
    expect(stderr).toBe(
      "[debug] Wrapping 5 characters at unlimited width.\n",
    );
  });

  it("renders invalid option values as errors", async () => {
    const { stdout, exitCode } = await runReflow([
      "wrap",
      "--width",
      "wide",
      "text",
    ]);

    expect(stdout).toBe(
      `\n${ERROR_LABEL} Expected a non-negative integer after --width\n\n`,
    );
    expect(exitCode).toBe(1);
  });

  it("renders hints for a missing --config", async () => {
    const { stdout, exitCode } = await runReflow([
      "wrap",
      "--config",
      "does-not-exist.yaml",
      "text",
    ]);

    const configPath = resolve(process.cwd(), "does-not-exist.yaml");
    expect(stdout).toBe(
      [
        "",
        `${ERROR_LABEL} Settings file not found: ${configPath}`,
        "",
        "Check the --config path, or run `reflow init` to create one.",
        "",
        "",
      ].join("\n"),
    );
    expect(exitCode).toBe(1);
  });

  it("does not duplicate Commander usage errors", async () => {
    const { stdout, stderr, exitCode } = await runReflow(["nope"]);

    expect(stdout).toBe("");
    const occurrences = stderr.match(/error: unknown command 'nope'/gu) ?? [];
    expect(occurrences).toHaveLength(1);
    expect(exitCode).toBe(1);
  });
});
