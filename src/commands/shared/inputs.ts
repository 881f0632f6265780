import { existsSync, readFileSync, statSync } from "node:fs";
import { resolve } from "node:path";

import { UserInputError } from "../../core/errors.js";
import { sanitizeTerminalText } from "../../core/preview.js";

export type WriteChunk = (chunk: string) => void;

export const writeStdout: WriteChunk = (chunk) => {
  process.stdout.write(chunk);
};

export function resolveTranscriptPath(transcriptArg: string | undefined): string {
  if (!transcriptArg?.trim()) {
    throw new UserInputError("A transcript path is required.");
  }
  return resolve(process.cwd(), transcriptArg);
}

export function readInputFile(inputPath: string): string {
  if (!existsSync(inputPath) || !statSync(inputPath).isFile()) {
    throw new UserInputError(`Transcript file not found: ${inputPath}`);
  }
  return readFileSync(inputPath, "utf8");
}

/** Captured terminal output with colour codes removed and line endings normalized. */
export function readTranscriptFile(transcriptPath: string): string {
  return sanitizeTerminalText(readInputFile(transcriptPath));
}

export function resolveProjectRoot(rootArg: string | undefined): string {
  const projectRoot = resolve(process.cwd(), rootArg ?? ".");
  if (!existsSync(projectRoot) || !statSync(projectRoot).isDirectory()) {
    throw new UserInputError(`Project root is not a directory: ${projectRoot}`);
  }
  return projectRoot;
}

/** `--no-color` forces plain output; otherwise the presenter decides from the terminal. */
export function resolveColorize(color: boolean | undefined): boolean | undefined {
  return color === false ? false : undefined;
}
