import { readFile } from "node:fs/promises";

import type { FileReader, TerminalBufferSource } from "./contracts.js";

const MISSING_FILE_CODES = new Set(["ENOENT", "ENOTDIR", "EISDIR"]);

function isMissingFileError(error: unknown): boolean {
  if (!error || typeof error !== "object" || !("code" in error)) return false;
  return typeof error.code === "string" && MISSING_FILE_CODES.has(error.code);
}

async function readTextOrNull(path: string): Promise<string | null> {
  try {
    return await readFile(path, "utf8");
  } catch (error) {
    if (isMissingFileError(error)) return null;
    throw error;
  }
}

/**
 * Reads a terminal transcript that another process keeps appending to, such as
 * the typescript file written by `script -f`.
 */
export function createTranscriptBufferSource(transcriptPath: string): TerminalBufferSource {
  return () => readTextOrNull(transcriptPath);
}

export function createFileReader(): FileReader {
  return (path) => readTextOrNull(path);
}
