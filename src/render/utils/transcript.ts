export interface TranscriptOptions {
  sections?: readonly (readonly string[])[];
  hint?: string;
}

export function renderTranscript({
  sections = [],
  hint,
}: TranscriptOptions): string {
  const lines: string[] = [];

  sections
    .filter((block) => block.length > 0)
    .forEach((block, index, blocks) => {
      lines.push(...block);
      if (index < blocks.length - 1) {
        lines.push("");
      }
    });

  if (hint) {
    if (lines.length > 0) {
      lines.push("");
    }
    lines.push(hint);
  }

  return trimTrailingBlankLines(lines).join("\n");
}

function trimTrailingBlankLines(lines: string[]): string[] {
  let end = lines.length;
  while (end > 0 && lines[end - 1]?.trim() === "") {
    end -= 1;
  }

  return lines.slice(0, end);
}
