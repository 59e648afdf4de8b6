import type { InitCommandResult } from "../../commands/init/types.js";
import { renderMarkup } from "../markup/formatter.js";
import { renderTranscript } from "../utils/transcript.js";

export function renderInitTranscript(result: InitCommandResult): string {
  const path = `\`${result.displayPath}\``;

  switch (result.status) {
    case "created":
      return renderTranscript({
        sections: [[renderMarkup(`<info>Settings written to ${path}.</info>`)]],
        hint: `To modify, edit ${path}.`,
      });
    case "exists":
      return renderTranscript({
        sections: [[`Settings already exist at ${path}.`]],
        hint: "Re-run with --force to restore the defaults.",
      });
    case "reset":
      return renderTranscript({
        sections: [[renderMarkup(`<info>Settings at ${path} reset.</info>`)]],
      });
    case "unchanged":
      return renderTranscript({
        sections: [[`Settings at ${path} already match the defaults.`]],
      });
  }
}
