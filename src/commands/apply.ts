import { log } from "@clack/prompts";

import { UserInputError, normalizeOutputFormat } from "../core/errors.js";
import {
  applyPreviewEdits,
  createFileReader,
  createTerminalDiffPresenter,
  parsePreview,
  parsePreviewBlockJson,
  resolvePreviewPath
} from "../core/preview.js";
import type { ApplyCommandOptions, ApplyResult, PreviewBlock } from "../core/types.js";

import { EXIT_CODE_NO_PREVIEW } from "./parse.js";
import {
  readInputFile,
  readTranscriptFile,
  resolveColorize,
  resolveProjectRoot,
  resolveTranscriptPath,
  writeStdout,
  type WriteChunk
} from "./shared/inputs.js";

export type ApplyMode = "full" | "snippet";

export interface ApplyOutcome {
  block: PreviewBlock;
  absolutePath: string;
  mode: ApplyMode;
  /** Null when the file is missing or the edits could not be placed. */
  suggestedFullText: string | null;
  result: ApplyResult | null;
}

function loadBlock(inputPath: string, fromJson: boolean): PreviewBlock | null {
  if (!fromJson) return parsePreview(readTranscriptFile(inputPath));

  const block = parsePreviewBlockJson(readInputFile(inputPath));
  if (!block) {
    throw new UserInputError(`File is not a preview block written by "parse --format json": ${inputPath}`);
  }
  return block;
}

function fallbackReason(currentText: string | null, result: ApplyResult | null): string {
  if (currentText === null || !result) return "file not found";
  if (!result.ok) return result.reason;
  return "edits produce no change";
}

export async function runApply(
  inputArg: string | undefined,
  options: ApplyCommandOptions,
  write: WriteChunk = writeStdout
): Promise<ApplyOutcome | null> {
  const format = normalizeOutputFormat(options.format);
  const projectRoot = resolveProjectRoot(options.root);
  const inputPath = resolveTranscriptPath(inputArg);
  const block = loadBlock(inputPath, options.block ?? false);

  if (!block) {
    process.exitCode = EXIT_CODE_NO_PREVIEW;
    if (format === "json") {
      write(`${JSON.stringify({ preview: null }, null, 2)}\n`);
    } else {
      log.warn(`No edit preview found in ${inputPath}.`);
    }
    return null;
  }

  const absolutePath = resolvePreviewPath(projectRoot, block.filePath);
  const currentText = await createFileReader()(absolutePath);
  const result = currentText === null ? null : applyPreviewEdits(currentText, block);
  const suggestedFullText = result?.ok ? result.text : null;
  const mode: ApplyMode = suggestedFullText !== null && suggestedFullText !== currentText ? "full" : "snippet";
  const outcome: ApplyOutcome = { block, absolutePath, mode, suggestedFullText, result };

  if (format === "json") {
    write(
      `${JSON.stringify(
        {
          filePath: block.filePath,
          absolutePath,
          mode,
          ...(mode === "snippet" ? { fallbackReason: fallbackReason(currentText, result) } : {}),
          mismatches: result?.mismatches ?? [],
          originalText: block.originalText,
          suggestedText: block.suggestedText,
          suggestedFullText
        },
        null,
        2
      )}\n`
    );
    return outcome;
  }

  for (const mismatch of result?.mismatches ?? []) {
    log.warn(
      `Context line ${mismatch.lineNumber} differs: preview has "${mismatch.expected}", file has "${mismatch.actual}".`
    );
  }

  const presenter = createTerminalDiffPresenter({ write, colorize: resolveColorize(options.color) });
  if (mode === "full" && currentText !== null && suggestedFullText !== null) {
    log.success(`Reconstructed full suggestion for ${block.filePath}.`);
    presenter.showSuggestionDiff(absolutePath, currentText, suggestedFullText);
    return outcome;
  }

  log.info(`Showing snippet preview for ${block.filePath} (${fallbackReason(currentText, result)}).`);
  presenter.showSnippetDiff(`${block.filePath} (preview)`, block.originalText, block.suggestedText);
  return outcome;
}
