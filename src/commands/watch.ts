import { log } from "@clack/prompts";

import {
  PreviewShownTracker,
  createFileReader,
  createPreviewMonitorState,
  createTerminalDiffPresenter,
  createTranscriptBufferSource,
  runPreviewCycle,
  startPreviewMonitor,
  type PreviewCycleResult,
  type PreviewMonitorContext
} from "../core/preview.js";
import type { WatchCommandOptions } from "../core/types.js";

import { resolveColorize, writeStdout, type WriteChunk } from "./shared/inputs.js";
import { prepareWatchWorkflow } from "./watch/workflow-setup.js";

function reportCycle(result: PreviewCycleResult): void {
  if (result.status === "full-diff" || result.status === "snippet-diff") {
    log.success(`Preview for ${result.filePath ?? "unknown file"} shown.`);
  }
}

export interface WatchSession {
  /** Resolves once the monitor has stopped. */
  done: Promise<void>;
  stop: () => void;
}

export async function runWatch(
  transcriptArg: string | undefined,
  options: WatchCommandOptions,
  write: WriteChunk = writeStdout
): Promise<WatchSession> {
  const workflow = prepareWatchWorkflow(transcriptArg, options);
  const tracker = new PreviewShownTracker();
  const context: PreviewMonitorContext = {
    readBuffer: createTranscriptBufferSource(workflow.transcriptPath),
    readFile: createFileReader(),
    presenter: createTerminalDiffPresenter({ write, colorize: resolveColorize(options.color) }),
    tracker,
    projectRoot: workflow.projectRoot,
    logger: log
  };

  if (workflow.once) {
    const result = await runPreviewCycle(context, createPreviewMonitorState());
    reportCycle(result);
    if (result.status === "idle" || result.status === "no-block") {
      log.warn(`No edit preview found in ${workflow.transcriptPath}.`);
    }
    return { done: Promise.resolve(), stop: () => {} };
  }

  log.info(`Watching ${workflow.transcriptPath} every ${workflow.intervalMs}ms (Ctrl+C to stop).`);

  let resolveDone: () => void = () => {};
  const done = new Promise<void>((resolve) => {
    resolveDone = resolve;
  });
  const stopMonitor = startPreviewMonitor({ ...context, intervalMs: workflow.intervalMs, onCycle: reportCycle });

  const stop = (): void => {
    process.off("SIGINT", stop);
    process.off("SIGTERM", stop);
    stopMonitor();
    tracker.clear();
    resolveDone();
  };
  process.once("SIGINT", stop);
  process.once("SIGTERM", stop);

  return { done, stop };
}
