import type { ApplyResult, ContextMismatch, LineEdit, LineKind, PreviewBlock } from "../types.js";

// At one line number, deletions and context checks must land before insertions
// shift the index they look at.
const KIND_ORDER: Record<LineKind, number> = {
  delete: 0,
  context: 1,
  add: 2
};

function sortEdits(edits: readonly LineEdit[]): LineEdit[] {
  return [...edits].sort(
    (left, right) => left.lineNumber - right.lineNumber || KIND_ORDER[left.kind] - KIND_ORDER[right.kind]
  );
}

/**
 * Rebuilds the full suggested file by applying the preview's numbered edits to
 * `currentFullText` in a single ordered pass.
 *
 * Line numbers refer to the file as the assistant saw it, so a running offset
 * tracks how earlier insertions and deletions moved later targets. Context lines
 * are compared with surrounding whitespace ignored and only reported on mismatch.
 * Any out-of-range target fails the whole apply.
 */
export function applyPreviewEdits(currentFullText: string, block: PreviewBlock): ApplyResult {
  const mismatches: ContextMismatch[] = [];
  if (!block.edits.length) {
    return { ok: false, reason: "preview has no edits", mismatches };
  }

  const lines = currentFullText.split("\n");
  let offset = 0;
  let currentLineNumber = 0;
  let deletedAtCurrentLine = 0;

  for (const edit of sortEdits(block.edits)) {
    if (edit.lineNumber !== currentLineNumber) {
      currentLineNumber = edit.lineNumber;
      deletedAtCurrentLine = 0;
    }

    // Every edit numbered N addresses the slot where original line N started;
    // lines already deleted under the same number do not move that slot.
    const targetIndex = edit.lineNumber - 1 + offset + deletedAtCurrentLine;
    if (targetIndex < 0 || targetIndex > lines.length) {
      return {
        ok: false,
        reason: `line ${edit.lineNumber} maps to index ${targetIndex} outside 0..${lines.length}`,
        mismatches
      };
    }

    if (edit.kind === "add") {
      lines.splice(targetIndex, 0, edit.text);
      offset += 1;
      continue;
    }

    const current = lines[targetIndex];
    if (current === undefined) {
      return {
        ok: false,
        reason: `${edit.kind} line ${edit.lineNumber} is past the end of the file (${lines.length} lines)`,
        mismatches
      };
    }

    if (edit.kind === "delete") {
      lines.splice(targetIndex, 1);
      offset -= 1;
      deletedAtCurrentLine += 1;
      continue;
    }

    const expected = edit.text.trim();
    if (expected && current.trim() !== expected) {
      mismatches.push({ lineNumber: edit.lineNumber, expected, actual: current.trim() });
    }
  }

  return { ok: true, text: lines.join("\n"), mismatches };
}

export function applyEdits(currentFullText: string, block: PreviewBlock): string | null {
  const result = applyPreviewEdits(currentFullText, block);
  return result.ok ? result.text : null;
}
