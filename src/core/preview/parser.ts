import type { LineEdit, LineKind, PreviewBlock } from "../types.js";

/**
 * Parses the inline edit preview a coding assistant prints before asking for
 * confirmation:
 *
 *   Would you like to make the following edits?
 *
 *     src/main.ts (+1 -1)
 *
 *       18      fn main() {
 *       19 -        println("Hello")
 *       19 +        println("World")
 *       20      }
 *
 *   1. Yes, proceed
 *
 * The format has no grammar of its own; everything here is tied to that one
 * observed rendering.
 */

export const PREVIEW_MARKER = "Would you like to make the following edits?";

const HEADER_PATTERN = /^\s*(.+?)\s+\(\+(\d+)\s+-(\d+)\)\s*$/;
const ELIDED_CONTEXT = "⋮";
const LEADING_DIGITS_PATTERN = /^\d+/;
const LINE_BREAK_PATTERN = /\r\n|\r|\n/;

export interface PreviewHeader {
  filePath: string;
  declaredAdditions: number;
  declaredDeletions: number;
}

function parseHeaderLine(line: string): PreviewHeader | null {
  const match = line.match(HEADER_PATTERN);
  if (!match?.[1] || !match[2] || !match[3]) return null;
  return {
    filePath: match[1].trim(),
    declaredAdditions: Number.parseInt(match[2], 10),
    declaredDeletions: Number.parseInt(match[3], 10)
  };
}

function isConfirmationMenuLine(trimmed: string): boolean {
  return trimmed.startsWith("1. Yes") || trimmed.includes("Yes, proceed");
}

function isSkippableLine(trimmed: string): boolean {
  return trimmed.length === 0 || trimmed === ELIDED_CONTEXT;
}

function kindForMarker(char: string): LineKind {
  if (char === "+") return "add";
  if (char === "-") return "delete";
  return "context";
}

export function parseEditLine(raw: string): LineEdit | null {
  const noIndent = raw.trimStart();
  const digits = noIndent.match(LEADING_DIGITS_PATTERN)?.[0];
  if (!digits) return null;

  const lineNumber = Number.parseInt(digits, 10);
  if (!Number.isSafeInteger(lineNumber)) return null;

  const rest = noIndent.slice(digits.length);
  if (!rest) return null;

  const markerIndex = rest.search(/\S/);
  if (markerIndex === -1) return null;

  const kind = kindForMarker(rest.charAt(markerIndex));
  const text = kind === "context" ? rest : rest.slice(0, markerIndex) + rest.slice(markerIndex + 1);
  return { lineNumber, kind, text };
}

function joinLines(edits: readonly LineEdit[], keep: LineKind): string {
  return edits
    .filter((edit) => edit.kind === "context" || edit.kind === keep)
    .map((edit) => edit.text)
    .join("\n");
}

/** Builds a frozen block, deriving both snippet texts from `edits`. */
export function createPreviewBlock(header: PreviewHeader, edits: readonly LineEdit[]): PreviewBlock {
  const frozenEdits = Object.freeze(edits.map((edit) => Object.freeze({ ...edit })));
  return Object.freeze({
    filePath: header.filePath,
    originalText: joinLines(frozenEdits, "delete"),
    suggestedText: joinLines(frozenEdits, "add"),
    edits: frozenEdits,
    declaredAdditions: header.declaredAdditions,
    declaredDeletions: header.declaredDeletions
  });
}

export function parsePreview(fullText: string): PreviewBlock | null {
  const markerIndex = fullText.lastIndexOf(PREVIEW_MARKER);
  if (markerIndex === -1) return null;

  const lines = fullText.slice(markerIndex).split(LINE_BREAK_PATTERN);

  let header: PreviewHeader | null = null;
  let index = 0;
  while (index < lines.length && !header) {
    header = parseHeaderLine(lines[index] ?? "");
    index += 1;
  }
  if (!header) return null;

  const edits: LineEdit[] = [];
  for (; index < lines.length; index += 1) {
    const raw = lines[index] ?? "";
    const trimmed = raw.trim();
    if (isConfirmationMenuLine(trimmed)) break;
    if (isSkippableLine(trimmed)) continue;

    const edit = parseEditLine(raw);
    if (edit) edits.push(edit);
  }

  if (!edits.length) return null;
  return createPreviewBlock(header, edits);
}

export function countEditKinds(block: PreviewBlock): { additions: number; deletions: number } {
  let additions = 0;
  let deletions = 0;
  for (const edit of block.edits) {
    if (edit.kind === "add") additions += 1;
    if (edit.kind === "delete") deletions += 1;
  }
  return { additions, deletions };
}
