import { z } from "zod";

import type { PreviewBlock } from "../types.js";

import { createPreviewBlock } from "./parser.js";

const lineEditSchema = z.object({
  lineNumber: z.number().int().positive(),
  kind: z.enum(["context", "add", "delete"]),
  text: z.string()
});

// originalText/suggestedText are accepted but rebuilt from the edits.
const previewBlockSchema = z.object({
  filePath: z.string().min(1),
  edits: z.array(lineEditSchema).min(1),
  declaredAdditions: z.number().int().nonnegative().default(0),
  declaredDeletions: z.number().int().nonnegative().default(0)
});

/**
 * Reads a block previously written by `parse --format json`. The JSON may be the
 * bare block or wrapped as `{ "preview": { ... } }`.
 */
export function parsePreviewBlockJson(raw: string): PreviewBlock | null {
  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch {
    return null;
  }

  if (payload && typeof payload === "object" && "preview" in payload) {
    payload = payload.preview;
  }

  const validated = previewBlockSchema.safeParse(payload);
  if (!validated.success) return null;
  const { filePath, edits, declaredAdditions, declaredDeletions } = validated.data;
  return createPreviewBlock({ filePath, declaredAdditions, declaredDeletions }, edits);
}
