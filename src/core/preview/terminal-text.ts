import { createHash } from "node:crypto";

import stripAnsi from "strip-ansi";

import { PREVIEW_MARKER } from "./parser.js";

export function sanitizeTerminalText(raw: string): string {
  return stripAnsi(raw).replace(/\r\n?/g, "\n");
}

/**
 * Hash of everything from the last preview marker on. Null when the text holds
 * no marker at all.
 */
export function fingerprintPreviewTail(text: string): string | null {
  const markerIndex = text.lastIndexOf(PREVIEW_MARKER);
  if (markerIndex === -1) return null;
  return createHash("sha256").update(text.slice(markerIndex)).digest("hex");
}
