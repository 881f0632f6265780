import { log } from "@clack/prompts";

import { normalizeOutputFormat } from "../core/errors.js";
import { countEditKinds, createTerminalDiffPresenter, parsePreview } from "../core/preview.js";
import type { ParseCommandOptions, PreviewBlock } from "../core/types.js";

import {
  readTranscriptFile,
  resolveColorize,
  resolveTranscriptPath,
  writeStdout,
  type WriteChunk
} from "./shared/inputs.js";

/** Exit code when the transcript holds no preview block. */
export const EXIT_CODE_NO_PREVIEW = 1;

export function describeDeclaredCountDrift(block: PreviewBlock): string | null {
  const parsed = countEditKinds(block);
  if (parsed.additions === block.declaredAdditions && parsed.deletions === block.declaredDeletions) {
    return null;
  }
  return `Header declares +${block.declaredAdditions} -${block.declaredDeletions} but the visible lines hold +${parsed.additions} -${parsed.deletions}.`;
}

export function runParse(
  transcriptArg: string | undefined,
  options: ParseCommandOptions,
  write: WriteChunk = writeStdout
): PreviewBlock | null {
  const format = normalizeOutputFormat(options.format);
  const transcriptPath = resolveTranscriptPath(transcriptArg);
  const block = parsePreview(readTranscriptFile(transcriptPath));

  if (format === "json") {
    write(`${JSON.stringify({ preview: block }, null, 2)}\n`);
    if (!block) process.exitCode = EXIT_CODE_NO_PREVIEW;
    return block;
  }

  if (!block) {
    log.warn(`No edit preview found in ${transcriptPath}.`);
    process.exitCode = EXIT_CODE_NO_PREVIEW;
    return null;
  }

  const parsed = countEditKinds(block);
  log.success(`Found preview for ${block.filePath} (${block.edits.length} lines, +${parsed.additions} -${parsed.deletions}).`);
  const drift = describeDeclaredCountDrift(block);
  if (drift) log.warn(drift);

  const presenter = createTerminalDiffPresenter({ write, colorize: resolveColorize(options.color) });
  presenter.showSnippetDiff(`${block.filePath} (preview)`, block.originalText, block.suggestedText);
  return block;
}
