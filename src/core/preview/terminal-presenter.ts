import { basename } from "node:path";

import { structuredPatch } from "diff";

import type { DiffPresenter } from "./contracts.js";

interface CreateTerminalDiffPresenterOptions {
  write?: ((chunk: string) => void) | undefined;
  colorize?: boolean | undefined;
  contextLines?: number | undefined;
}

const ANSI = {
  reset: "\u001B[0m",
  green: "\u001B[32m",
  red: "\u001B[31m",
  cyan: "\u001B[36m",
  bold: "\u001B[1m",
  gray: "\u001B[90m"
} as const;

const DEFAULT_CONTEXT_LINES = 3;

function defaultColorize(): boolean {
  return Boolean(process.stdout.isTTY) && process.env.NO_COLOR === undefined && process.env.TERM !== "dumb";
}

function paint(line: string, color: string, colorize: boolean): string {
  if (!colorize || line.length === 0) return line;
  return `${color}${line}${ANSI.reset}`;
}

export function renderUnifiedDiffLines(
  title: string,
  originalText: string,
  suggestedText: string,
  options: { colorize: boolean; contextLines?: number | undefined }
): string[] {
  const { colorize } = options;
  const patch = structuredPatch("original", "suggested", originalText, suggestedText, undefined, undefined, {
    context: options.contextLines ?? DEFAULT_CONTEXT_LINES
  });

  const rendered = [paint(`╭─ ${title}`, ANSI.bold, colorize)];
  let added = 0;
  let removed = 0;

  for (const hunk of patch.hunks) {
    rendered.push(
      paint(`@@ -${hunk.oldStart},${hunk.oldLines} +${hunk.newStart},${hunk.newLines} @@`, ANSI.cyan, colorize)
    );
    for (const line of hunk.lines) {
      // "\ No newline at end of file" markers carry nothing a reviewer needs here.
      if (line.startsWith("\\")) continue;
      if (line.startsWith("+")) {
        added += 1;
        rendered.push(paint(line, ANSI.green, colorize));
      } else if (line.startsWith("-")) {
        removed += 1;
        rendered.push(paint(line, ANSI.red, colorize));
      } else {
        rendered.push(line);
      }
    }
  }

  const summary = patch.hunks.length ? `${added} added, ${removed} removed` : "no differences";
  rendered.push(paint(`╰─ ${summary}`, ANSI.gray, colorize));
  return rendered;
}

export function createTerminalDiffPresenter(options: CreateTerminalDiffPresenterOptions = {}): DiffPresenter {
  const write = options.write ?? ((chunk: string) => process.stdout.write(chunk));
  const colorize = options.colorize ?? defaultColorize();
  const contextLines = options.contextLines;

  const emit = (title: string, originalText: string, suggestedText: string): void => {
    const lines = renderUnifiedDiffLines(title, originalText, suggestedText, { colorize, contextLines });
    write(`${lines.join("\n")}\n`);
  };

  return {
    showSnippetDiff(title, originalText, suggestedText) {
      emit(title, originalText, suggestedText);
    },
    showSuggestionDiff(path, originalSnapshot, suggestedFullText) {
      emit(`${basename(path) || path} ↔ Suggested`, originalSnapshot, suggestedFullText);
    }
  };
}
