export type LineKind = "context" | "add" | "delete";

/**
 * One numbered line of an edit preview.
 *
 * `lineNumber` is 1-based and refers to the file as it looked when the assistant
 * rendered the preview, not to the file after earlier edits were applied.
 */
export interface LineEdit {
  lineNumber: number;
  kind: LineKind;
  /** Content with only the `+`/`-` marker removed; indentation is kept as captured. */
  text: string;
}

export interface PreviewBlock {
  /** Path exactly as printed, possibly with `a/`, `b/` or `./` prefixes. */
  filePath: string;
  /** Context and delete lines joined with "\n", in encounter order. */
  originalText: string;
  /** Context and add lines joined with "\n", in encounter order. */
  suggestedText: string;
  edits: readonly LineEdit[];
  /** `(+A -B)` header counts. Display only. */
  declaredAdditions: number;
  declaredDeletions: number;
}

export interface ContextMismatch {
  lineNumber: number;
  expected: string;
  actual: string;
}

export type ApplyResult =
  | { ok: true; text: string; mismatches: ContextMismatch[] }
  | { ok: false; reason: string; mismatches: ContextMismatch[] };
