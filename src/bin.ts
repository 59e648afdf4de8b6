#!/usr/bin/env node

import process from "node:process";

import { Command, CommanderError } from "commander";

import { commanderAlreadyRendered } from "./cli/commander-utils.js";
import { CliError, toCliError } from "./cli/errors.js";
import { createInitCommand } from "./cli/init.js";
import { writeCommandOutput } from "./cli/output.js";
import { createWrapCommand } from "./cli/wrap.js";
import { renderCliError } from "./render/utils/errors.js";
import { toErrorMessage } from "./utils/errors.js";
import { getReflowVersion } from "./utils/version.js";

export async function runCli(
  argv: readonly string[] = process.argv,
): Promise<void> {
  const program = new Command();

  program
    .name("reflow")
    .description("Wrap console text without breaking markup tags or URLs")
    .version(getReflowVersion(), "-v, --version", "print the reflow version")
    .exitOverride()
    .showHelpAfterError()
    .helpCommand(false);

  // addCommand() does not pass exitOverride down to subcommands.
  for (const command of [createWrapCommand(), createInitCommand()]) {
    program.addCommand(command.exitOverride());
  }

  if (argv.length <= 2) {
    writeCommandOutput({ body: program.helpInformation() });
    return;
  }

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      if (commanderAlreadyRendered(error)) {
        process.exitCode = error.exitCode;
        return;
      }

      writeCommandOutput({
        body: renderCliError(new CliError(toErrorMessage(error))),
        exitCode: error.exitCode,
      });
      return;
    }

    writeCommandOutput({
      body: renderCliError(toCliError(error)),
      exitCode: 1,
    });
  }
}

function shouldAutorun(): boolean {
  if (process.env.REFLOW_CLI_SKIP_AUTORUN === "1") {
    return false;
  }
  return require.main === module;
}

if (shouldAutorun()) {
  void runCli();
}
