import { ConfigError, UserInputError } from "../../core/errors.js";
import { DEFAULT_POLL_INTERVAL_MS } from "../../core/preview.js";
import type { WatchCommandOptions } from "../../core/types.js";

import { resolveProjectRoot, resolveTranscriptPath } from "../shared/inputs.js";

const MIN_INTERVAL_MS = 250;
const MAX_INTERVAL_MS = 60_000;
export const INTERVAL_ENV_VAR = "EDIT_PREVIEW_INTERVAL_MS";

export interface PreparedWatchWorkflow {
  transcriptPath: string;
  projectRoot: string;
  intervalMs: number;
  once: boolean;
}

function parseInteger(value: number | string): number {
  if (typeof value === "number") return Number.isFinite(value) ? Math.floor(value) : Number.NaN;
  return /^\s*\d+\s*$/.test(value) ? Number.parseInt(value, 10) : Number.NaN;
}

function clampInterval(value: number): number {
  return Math.min(MAX_INTERVAL_MS, Math.max(MIN_INTERVAL_MS, value));
}

function normalizeIntervalMs(value: number | string | undefined, env: NodeJS.ProcessEnv): number {
  if (value !== undefined) {
    const parsed = parseInteger(value);
    if (!Number.isFinite(parsed)) {
      throw new UserInputError(
        `Invalid --interval-ms value "${String(value)}". Expected an integer between ${MIN_INTERVAL_MS} and ${MAX_INTERVAL_MS}.`
      );
    }
    return clampInterval(parsed);
  }

  const fromEnv = env[INTERVAL_ENV_VAR];
  if (fromEnv === undefined || !fromEnv.trim()) return DEFAULT_POLL_INTERVAL_MS;
  const parsed = parseInteger(fromEnv);
  if (!Number.isFinite(parsed)) {
    throw new ConfigError(`Invalid ${INTERVAL_ENV_VAR} value "${fromEnv}". Expected an integer number of milliseconds.`);
  }
  return clampInterval(parsed);
}

export function prepareWatchWorkflow(
  transcriptArg: string | undefined,
  options: WatchCommandOptions,
  env: NodeJS.ProcessEnv = process.env
): PreparedWatchWorkflow {
  return {
    transcriptPath: resolveTranscriptPath(transcriptArg),
    projectRoot: resolveProjectRoot(options.root),
    intervalMs: normalizeIntervalMs(options.intervalMs, env),
    once: options.once ?? false
  };
}
