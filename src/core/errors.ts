import type { OutputFormat } from "./types.js";

export type ErrorCode = "USER_INPUT" | "CONFIG" | "EXECUTION";

// 2 means the invocation itself was wrong; 1 means it was fine but failed at run time.
const EXIT_CODES: Record<ErrorCode, number> = {
  USER_INPUT: 2,
  CONFIG: 2,
  EXECUTION: 1
};

export interface ErrorDetails {
  /** Set when commander rejected the command line; commander has already printed usage. */
  commanderCode?: string;
  /** Node system error code (EACCES, EMFILE, ...) for file access failures. */
  systemCode?: string;
  path?: string;
}

interface EditPreviewErrorOptions {
  cause?: unknown;
  details?: ErrorDetails;
}

export class EditPreviewError extends Error {
  readonly code: ErrorCode;
  readonly exitCode: number;
  readonly details?: ErrorDetails;

  constructor(message: string, code: ErrorCode, options: EditPreviewErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.exitCode = EXIT_CODES[code];
    if (options.details) this.details = options.details;
  }
}

export class UserInputError extends EditPreviewError {
  constructor(message: string, options?: EditPreviewErrorOptions) {
    super(message, "USER_INPUT", options);
  }
}

export class ConfigError extends EditPreviewError {
  constructor(message: string, options?: EditPreviewErrorOptions) {
    super(message, "CONFIG", options);
  }
}

export class ExecutionError extends EditPreviewError {
  constructor(message: string, options?: EditPreviewErrorOptions) {
    super(message, "EXECUTION", options);
  }
}

function readStringField(value: unknown, field: string): string | undefined {
  if (!value || typeof value !== "object" || !(field in value)) return undefined;
  const fieldValue: unknown = Reflect.get(value, field);
  return typeof fieldValue === "string" ? fieldValue : undefined;
}

/**
 * Folds anything thrown below the CLI into the error model. Commander parse
 * failures become user input errors; file access failures keep their system
 * code and path so the JSON payload can report them.
 */
export function normalizeError(error: unknown): EditPreviewError {
  if (error instanceof EditPreviewError) return error;

  const code = readStringField(error, "code");
  const message = error instanceof Error ? error.message : readStringField(error, "message") ?? String(error);

  if (code?.startsWith("commander.")) {
    return new UserInputError(message, { cause: error, details: { commanderCode: code } });
  }

  const path = readStringField(error, "path");
  if (code && path) {
    return new ExecutionError(message, { cause: error, details: { systemCode: code, path } });
  }

  return new ExecutionError(message, error instanceof Error ? { cause: error } : {});
}

function parseFormat(value: string | undefined): OutputFormat | null {
  const normalized = value?.trim().toLowerCase() ?? "text";
  return normalized === "text" || normalized === "json" ? normalized : null;
}

export function normalizeOutputFormat(value: string | undefined): OutputFormat {
  const format = parseFormat(value);
  if (!format) {
    throw new UserInputError(`Invalid --format value "${String(value)}". Expected "text" or "json".`);
  }
  return format;
}

/** Best-effort format lookup for errors raised before commander has parsed the options. */
export function resolveOutputFormatFromArgv(argv: readonly string[]): OutputFormat {
  for (const [index, token] of argv.entries()) {
    if (token === "--format") return parseFormat(argv[index + 1] ?? "") ?? "text";
    if (token.startsWith("--format=")) return parseFormat(token.slice("--format=".length)) ?? "text";
  }
  return "text";
}

export interface JsonErrorPayload {
  error: {
    code: ErrorCode;
    type: string;
    message: string;
    exitCode: number;
    details?: ErrorDetails;
  };
}

export function toJsonErrorPayload(error: EditPreviewError): JsonErrorPayload {
  return {
    error: {
      code: error.code,
      type: error.name,
      message: error.message,
      exitCode: error.exitCode,
      ...(error.details ? { details: error.details } : {})
    }
  };
}
