export type { DiffPresenter, FileReader, PreviewLogger, TerminalBufferSource } from "./preview/contracts.js";
export type {
  FileChangeResult,
  FileChangeStatus,
  PreviewCycleResult,
  PreviewCycleStatus,
  PreviewMonitorContext,
  PreviewMonitorState,
  StartPreviewMonitorOptions
} from "./preview/monitor.js";
export { applyEdits, applyPreviewEdits } from "./preview/apply.js";
export {
  checkPreviewedFiles,
  createPreviewMonitorState,
  DEFAULT_POLL_INTERVAL_MS,
  runPreviewCycle,
  startPreviewMonitor
} from "./preview/monitor.js";
export { countEditKinds, parsePreview, PREVIEW_MARKER } from "./preview/parser.js";
export { normalizePreviewPath, resolvePreviewPath } from "./preview/paths.js";
export { parsePreviewBlockJson } from "./preview/schema.js";
export { PreviewShownTracker } from "./preview/shown-tracker.js";
export { createFileReader, createTranscriptBufferSource } from "./preview/sources.js";
export { createTerminalDiffPresenter, renderUnifiedDiffLines } from "./preview/terminal-presenter.js";
export { fingerprintPreviewTail, sanitizeTerminalText } from "./preview/terminal-text.js";
