/** Current accumulated text of a terminal session, or null when it cannot be read. */
export type TerminalBufferSource = () => Promise<string | null>;

/** Current on-disk content, or null when the file does not exist. */
export type FileReader = (path: string) => Promise<string | null>;

export interface DiffPresenter {
  showSnippetDiff(title: string, originalText: string, suggestedText: string): void;
  /** `originalSnapshot` is the file as it was read; later writes to the file must not change it. */
  showSuggestionDiff(path: string, originalSnapshot: string, suggestedFullText: string): void;
}

export interface PreviewLogger {
  info(message: string): void;
  warn(message: string): void;
}
