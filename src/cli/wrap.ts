import { readFile } from "node:fs/promises";
import { resolve } from "node:path";

import { Command } from "commander";

import { executeWrapCommand } from "../commands/wrap/command.js";
import { resolveWrapOptions } from "../commands/wrap/options.js";
import type { WrapCommandResult } from "../commands/wrap/types.js";
import { loadReflowSettings } from "../configs/settings/loader.js";
import { ConsoleLogger } from "../logs/console.js";
import type { Logger } from "../logs/logger.js";
import { isMissing } from "../utils/fs.js";
import { parseNonNegativeInteger } from "../utils/validators.js";
import { InputFileNotFoundError, MissingInputError } from "./errors.js";
import { writeTextOutput } from "./output.js";

export interface WrapCommandOptions {
  width?: number;
  cutUrls?: boolean;
  raw?: boolean;
  color?: boolean;
  file?: string;
  config?: string;
  verbose?: boolean;
}

type InputStream = NodeJS.ReadableStream & { isTTY?: boolean };

export interface WrapCommandContext {
  root?: string;
  env?: NodeJS.ProcessEnv;
  stdin?: InputStream;
  stdout?: Pick<NodeJS.WriteStream, "isTTY" | "columns"> | null;
  logger?: Logger;
}

export async function runWrapCommand(
  words: readonly string[],
  options: WrapCommandOptions = {},
  context: WrapCommandContext = {},
): Promise<WrapCommandResult> {
  const root = context.root ?? process.cwd();
  const env = context.env ?? process.env;

  const settings = loadReflowSettings({
    root,
    filePath: options.config,
    env,
  });
  const resolved = resolveWrapOptions({
    settings,
    width: options.width,
    cutUrls: options.cutUrls,
    color: options.color,
    verbose: options.verbose,
    output: context.stdout,
    env,
  });

  const logger =
    context.logger ??
    new ConsoleLogger({
      threshold: resolved.logLevel,
      width: resolved.width,
      decorated: resolved.decorated,
      output: process.stderr,
    });

  const text = await readInputText(words, options, root, context.stdin);

  return executeWrapCommand({
    text,
    width: resolved.width,
    allowCutUrls: resolved.allowCutUrls,
    raw: Boolean(options.raw),
    decorated: resolved.decorated,
    logger,
  });
}

async function readInputText(
  words: readonly string[],
  options: WrapCommandOptions,
  root: string,
  stdin: InputStream = process.stdin,
): Promise<string> {
  if (words.length > 0) {
    return words.join(" ");
  }

  if (options.file) {
    try {
      return dropFinalLineBreak(
        await readFile(resolve(root, options.file), "utf8"),
      );
    } catch (error) {
      if (isMissing(error)) {
        throw new InputFileNotFoundError(options.file);
      }
      throw error;
    }
  }

  if (stdin.isTTY) {
    throw new MissingInputError();
  }
  return dropFinalLineBreak(await readStream(stdin));
}

async function readStream(stream: NodeJS.ReadableStream): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString("utf8");
}

function dropFinalLineBreak(text: string): string {
  return text.replace(/\r?\n$/u, "");
}

function parseWidthOption(value: string): number {
  return parseNonNegativeInteger(
    value,
    "Expected a non-negative integer after --width",
  );
}

export function createWrapCommand(): Command {
  return new Command("wrap")
    .description(
      "Reflow text to a maximum width without splitting markup tags or URLs",
    )
    .argument("[text...]", "Text to wrap; read from --file or stdin if omitted")
    .option(
      "-w, --width <columns>",
      "Maximum columns per line; 0 disables wrapping",
      parseWidthOption,
    )
    .option("--cut-urls", "Let long URLs break across lines")
    .option("--raw", "Keep markup tags instead of rendering them")
    .option("--color", "Force ANSI colors")
    .option("--no-color", "Disable ANSI colors")
    .option("-f, --file <path>", "Read the text from a file")
    .option("-c, --config <path>", "Settings file (default: .reflow.yaml)")
    .option("--verbose", "Log debug details to stderr")
    .action(async (words: string[], options: WrapCommandOptions) => {
      const result = await runWrapCommand(words, options);
      writeTextOutput(result.output);
    });
}
