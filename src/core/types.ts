export type { OutputFormat } from "./types/common.js";
export type { ApplyResult, ContextMismatch, LineEdit, LineKind, PreviewBlock } from "./types/preview.js";
export type { ParseCommandOptions } from "./types/parse.js";
export type { ApplyCommandOptions } from "./types/apply.js";
export type { WatchCommandOptions } from "./types/watch.js";
