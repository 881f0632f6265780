/**
 * Remembers which files already had a preview diff shown, so a later generic
 * "file changed" diff for the same path can be skipped once.
 */
export class PreviewShownTracker {
  private readonly shownPaths = new Set<string>();

  markShown(path: string): void {
    this.shownPaths.add(path);
  }

  /** True when a preview was shown for `path`; the mark is cleared either way. */
  consumeShown(path: string): boolean {
    return this.shownPaths.delete(path);
  }

  clear(): void {
    this.shownPaths.clear();
  }

  get size(): number {
    return this.shownPaths.size;
  }
}
