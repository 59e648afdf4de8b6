import { Command } from "commander";

import { executeInitCommand } from "../commands/init/command.js";
import type { InitCommandResult } from "../commands/init/types.js";
import { renderInitTranscript } from "../render/transcripts/init.js";
import { writeCommandOutput } from "./output.js";

export interface InitCommandOptions {
  force?: boolean;
}

export interface RunInitCommandResult extends InitCommandResult {
  body: string;
}

export async function runInitCommand(
  options: InitCommandOptions = {},
  root: string = process.cwd(),
): Promise<RunInitCommandResult> {
  const result = await executeInitCommand({ root, force: options.force });
  return { ...result, body: renderInitTranscript(result) };
}

export function createInitCommand(): Command {
  return new Command("init")
    .description("Write a default .reflow.yaml into the current directory")
    .option("--force", "Overwrite an existing settings file with the defaults")
    .allowExcessArguments(false)
    .action(async (options: InitCommandOptions) => {
      const result = await runInitCommand(options);
      writeCommandOutput({ body: result.body });
    });
}
