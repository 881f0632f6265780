import { relative } from "node:path";

import { applyPreviewEdits } from "./apply.js";
import type { DiffPresenter, FileReader, PreviewLogger, TerminalBufferSource } from "./contracts.js";
import { parsePreview } from "./parser.js";
import { resolvePreviewPath } from "./paths.js";
import type { PreviewShownTracker } from "./shown-tracker.js";
import { fingerprintPreviewTail, sanitizeTerminalText } from "./terminal-text.js";

export const DEFAULT_POLL_INTERVAL_MS = 1500;

export type PreviewCycleStatus = "idle" | "unchanged" | "no-block" | "full-diff" | "snippet-diff" | "error";

export interface PreviewCycleResult {
  status: PreviewCycleStatus;
  filePath?: string;
}

export interface PreviewMonitorContext {
  readBuffer: TerminalBufferSource;
  readFile: FileReader;
  presenter: DiffPresenter;
  tracker: PreviewShownTracker;
  projectRoot: string;
  logger?: PreviewLogger | undefined;
}

export type FileChangeStatus = "change-diff" | "change-skipped";

export interface FileChangeResult {
  status: FileChangeStatus;
  path: string;
}

export interface PreviewMonitorState {
  /** Fingerprint of the last tail that reached the parser. */
  lastFingerprint: string | null;
  /** File content (null when absent) at the moment its preview was shown, keyed by absolute path. */
  snapshots: Map<string, string | null>;
}

export function createPreviewMonitorState(): PreviewMonitorState {
  return { lastFingerprint: null, snapshots: new Map() };
}

export interface StartPreviewMonitorOptions extends PreviewMonitorContext {
  intervalMs?: number | undefined;
  onCycle?: ((result: PreviewCycleResult) => void) | undefined;
}

async function presentPreview(
  context: PreviewMonitorContext,
  state: PreviewMonitorState,
  fullText: string
): Promise<PreviewCycleResult> {
  const block = parsePreview(fullText);
  if (!block) return { status: "no-block" };

  const { presenter, tracker, logger } = context;
  const absolutePath = resolvePreviewPath(context.projectRoot, block.filePath);
  const currentText = await context.readFile(absolutePath);
  state.snapshots.set(absolutePath, currentText);

  if (currentText !== null) {
    const result = applyPreviewEdits(currentText, block);
    for (const mismatch of result.mismatches) {
      logger?.info(
        `Context mismatch at line ${mismatch.lineNumber} of ${block.filePath}: expected "${mismatch.expected}", found "${mismatch.actual}".`
      );
    }

    if (result.ok && result.text !== currentText) {
      logger?.info(`Showing full-file preview for ${block.filePath}.`);
      tracker.markShown(absolutePath);
      presenter.showSuggestionDiff(absolutePath, currentText, result.text);
      return { status: "full-diff", filePath: block.filePath };
    }

    const reason = result.ok ? "produced no changes" : `failed (${result.reason})`;
    logger?.info(`Full-file patch ${reason} for ${block.filePath}; showing snippet preview.`);
    tracker.markShown(absolutePath);
  } else {
    logger?.info(`${block.filePath} not found under ${context.projectRoot}; showing snippet preview.`);
  }

  presenter.showSnippetDiff(`${block.filePath} (preview)`, block.originalText, block.suggestedText);
  return { status: "snippet-diff", filePath: block.filePath };
}

export async function runPreviewCycle(
  context: PreviewMonitorContext,
  state: PreviewMonitorState
): Promise<PreviewCycleResult> {
  try {
    const raw = await context.readBuffer();
    if (raw === null || !raw.trim()) return { status: "idle" };

    const text = sanitizeTerminalText(raw);
    const fingerprint = fingerprintPreviewTail(text);
    if (fingerprint === null) return { status: "idle" };
    if (fingerprint === state.lastFingerprint) return { status: "unchanged" };
    state.lastFingerprint = fingerprint;

    return await presentPreview(context, state, text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    context.logger?.warn(`Preview monitor cycle failed: ${message}`);
    return { status: "error" };
  }
}

/**
 * Compares every previewed file with its snapshot. A file that changed is
 * dropped from the watch list; its change diff is skipped when a preview diff
 * was already shown for it, otherwise the snapshot-to-disk diff is shown.
 */
export async function checkPreviewedFiles(
  context: PreviewMonitorContext,
  state: PreviewMonitorState
): Promise<FileChangeResult[]> {
  const { presenter, tracker, logger } = context;
  const results: FileChangeResult[] = [];

  for (const [path, snapshot] of state.snapshots) {
    let currentText: string | null;
    try {
      currentText = await context.readFile(path);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger?.warn(`Could not re-read ${path}: ${message}`);
      continue;
    }
    if (currentText === snapshot) continue;

    state.snapshots.delete(path);
    const displayPath = relative(context.projectRoot, path);
    if (tracker.consumeShown(path)) {
      logger?.info(`${displayPath} changed on disk; its preview was already shown.`);
      results.push({ status: "change-skipped", path });
      continue;
    }

    logger?.info(`${displayPath} changed on disk; showing the change.`);
    presenter.showSnippetDiff(`${displayPath} (changed on disk)`, snapshot ?? "", currentText ?? "");
    results.push({ status: "change-diff", path });
  }

  return results;
}

/**
 * Polls the buffer every `intervalMs` until the returned stop function is
 * called, then checks previewed files for changes on disk. Cycles never overlap: the next one is scheduled after the previous
 * one settles.
 */
export function startPreviewMonitor(options: StartPreviewMonitorOptions): () => void {
  const intervalMs = options.intervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  const state = createPreviewMonitorState();
  let stopped = false;
  let timer: ReturnType<typeof setTimeout> | undefined;

  const tick = async (): Promise<void> => {
    const result = await runPreviewCycle(options, state);
    options.onCycle?.(result);
    await checkPreviewedFiles(options, state);
  };

  const schedule = (): void => {
    if (stopped) return;
    timer = setTimeout(() => {
      void tick()
        .catch((error: unknown) => {
          const message = error instanceof Error ? error.message : String(error);
          options.logger?.warn(`Preview monitor tick failed: ${message}`);
        })
        .finally(schedule);
    }, intervalMs);
  };

  schedule();

  return () => {
    stopped = true;
    if (timer !== undefined) clearTimeout(timer);
  };
}
