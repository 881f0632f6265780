import { resolve } from "node:path";

import { describe, expect, it, vi } from "vitest";

import {
  PreviewShownTracker,
  checkPreviewedFiles,
  createPreviewMonitorState,
  runPreviewCycle,
  startPreviewMonitor,
  type DiffPresenter,
  type PreviewCycleResult,
  type PreviewMonitorContext,
  type PreviewMonitorState
} from "../src/core/preview.js";

const ROOT = resolve("/work/project");
const TARGET = resolve(ROOT, "src/app.ts");

const PREVIEW = [
  "$ codex",
  "Would you like to make the following edits?",
  "",
  "  a/src/app.ts (+1 -1)",
  "",
  "    2 -  const port = 3000;",
  "    2 +  const port = 8080;",
  "",
  "1. Yes, proceed"
].join("\n");

interface PresenterCall {
  kind: "snippet" | "full";
  title: string;
  original: string;
  suggested: string;
}

function createHarness(buffer: { text: string | null }, files: Record<string, string>) {
  const calls: PresenterCall[] = [];
  const presenter: DiffPresenter = {
    showSnippetDiff(title, original, suggested) {
      calls.push({ kind: "snippet", title, original, suggested });
    },
    showSuggestionDiff(path, original, suggested) {
      calls.push({ kind: "full", title: path, original, suggested });
    }
  };
  const logger = { info: vi.fn(), warn: vi.fn() };
  const tracker = new PreviewShownTracker();
  const context: PreviewMonitorContext = {
    readBuffer: async () => buffer.text,
    readFile: async (path) => files[path] ?? null,
    presenter,
    tracker,
    projectRoot: ROOT,
    logger
  };
  const state: PreviewMonitorState = createPreviewMonitorState();
  return { calls, logger, tracker, context, state };
}

describe("runPreviewCycle", () => {
  it("shows a full-file diff and marks the file as previewed", async () => {
    const harness = createHarness({ text: PREVIEW }, { [TARGET]: "// app\nconst port = 3000;\nlisten(port);\n" });

    const result = await runPreviewCycle(harness.context, harness.state);

    expect(result).toEqual({ status: "full-diff", filePath: "a/src/app.ts" });
    expect(harness.calls).toEqual([
      {
        kind: "full",
        title: TARGET,
        original: "// app\nconst port = 3000;\nlisten(port);\n",
        suggested: "// app\n   const port = 8080;\nlisten(port);\n"
      }
    ]);
    expect(harness.tracker.consumeShown(TARGET)).toBe(true);
  });

  it("skips an unchanged tail and reprocesses a changed one", async () => {
    const buffer = { text: PREVIEW };
    const harness = createHarness(buffer, { [TARGET]: "// app\nconst port = 3000;\n" });

    expect((await runPreviewCycle(harness.context, harness.state)).status).toBe("full-diff");
    expect((await runPreviewCycle(harness.context, harness.state)).status).toBe("unchanged");

    buffer.text = `${PREVIEW}\n\nWould you like to make the following edits?\n  src/app.ts (+1 -0)\n    3 +  // done`;
    expect((await runPreviewCycle(harness.context, harness.state)).status).toBe("full-diff");
    expect(harness.calls).toHaveLength(2);
    expect(harness.calls[1]?.suggested).toBe("// app\nconst port = 3000;\n   // done\n");
  });

  it("falls back to the snippet diff when the file is missing", async () => {
    const harness = createHarness({ text: PREVIEW }, {});

    const result = await runPreviewCycle(harness.context, harness.state);

    expect(result).toEqual({ status: "snippet-diff", filePath: "a/src/app.ts" });
    expect(harness.calls).toEqual([
      {
        kind: "snippet",
        title: "a/src/app.ts (preview)",
        original: "   const port = 3000;",
        suggested: "   const port = 8080;"
      }
    ]);
    expect(harness.tracker.size).toBe(0);
  });

  it("falls back to the snippet diff when the edits cannot be placed", async () => {
    const harness = createHarness({ text: PREVIEW }, { [TARGET]: "only one line" });

    const result = await runPreviewCycle(harness.context, harness.state);

    expect(result.status).toBe("snippet-diff");
    expect(harness.calls[0]?.kind).toBe("snippet");
    expect(harness.tracker.consumeShown(TARGET)).toBe(true);
    expect(harness.logger.info).toHaveBeenCalledWith(
      "Full-file patch failed (delete line 2 is past the end of the file (1 lines)) for a/src/app.ts; showing snippet preview."
    );
  });

  it("logs context mismatches without aborting", async () => {
    const transcript = [
      "Would you like to make the following edits?",
      "  notes.txt (+1 -0)",
      "    1    first line",
      "    2 +  inserted"
    ].join("\n");
    const notes = resolve(ROOT, "notes.txt");
    const harness = createHarness({ text: transcript }, { [notes]: "different line\nlast" });

    const result = await runPreviewCycle(harness.context, harness.state);

    expect(result.status).toBe("full-diff");
    expect(harness.calls[0]?.suggested).toBe("different line\n   inserted\nlast");
    expect(harness.logger.info).toHaveBeenCalledWith(
      'Context mismatch at line 1 of notes.txt: expected "first line", found "different line".'
    );
  });

  it("reports idle, no-block and error cycles", async () => {
    const buffer: { text: string | null } = { text: null };
    const harness = createHarness(buffer, {});

    expect((await runPreviewCycle(harness.context, harness.state)).status).toBe("idle");
    buffer.text = "ls -la\ntotal 0";
    expect((await runPreviewCycle(harness.context, harness.state)).status).toBe("idle");
    buffer.text = "Would you like to make the following edits?\n(still rendering)";
    expect((await runPreviewCycle(harness.context, harness.state)).status).toBe("no-block");
    expect((await runPreviewCycle(harness.context, harness.state)).status).toBe("unchanged");

    harness.context.readBuffer = async () => {
      throw new Error("terminal closed");
    };
    expect((await runPreviewCycle(harness.context, harness.state)).status).toBe("error");
    expect(harness.logger.warn).toHaveBeenCalledWith("Preview monitor cycle failed: terminal closed");
    expect(harness.calls).toHaveLength(0);
  });
});

describe("checkPreviewedFiles", () => {
  it("skips the change diff for a file whose preview was already shown", async () => {
    const files: Record<string, string> = { [TARGET]: "// app\nconst port = 3000;\n" };
    const harness = createHarness({ text: PREVIEW }, files);
    await runPreviewCycle(harness.context, harness.state);

    expect(await checkPreviewedFiles(harness.context, harness.state)).toEqual([]);

    files[TARGET] = "// app\n   const port = 8080;\n";
    expect(await checkPreviewedFiles(harness.context, harness.state)).toEqual([
      { status: "change-skipped", path: TARGET }
    ]);
    expect(harness.logger.info).toHaveBeenCalledWith("src/app.ts changed on disk; its preview was already shown.");
    expect(harness.calls).toHaveLength(1);
    expect(harness.tracker.size).toBe(0);
    expect(harness.state.snapshots.size).toBe(0);
  });

  it("shows the change for a file that had no full preview", async () => {
    const files: Record<string, string> = {};
    const harness = createHarness({ text: PREVIEW }, files);
    await runPreviewCycle(harness.context, harness.state);

    files[TARGET] = "const port = 8080;\n";
    expect(await checkPreviewedFiles(harness.context, harness.state)).toEqual([{ status: "change-diff", path: TARGET }]);
    expect(harness.calls[1]).toEqual({
      kind: "snippet",
      title: "src/app.ts (changed on disk)",
      original: "",
      suggested: "const port = 8080;\n"
    });
    expect(await checkPreviewedFiles(harness.context, harness.state)).toEqual([]);
  });

  it("keeps watching a file it could not re-read", async () => {
    const harness = createHarness({ text: PREVIEW }, { [TARGET]: "// app\nconst port = 3000;\n" });
    await runPreviewCycle(harness.context, harness.state);

    harness.context.readFile = async () => {
      throw new Error("disk gone");
    };
    expect(await checkPreviewedFiles(harness.context, harness.state)).toEqual([]);
    expect(harness.logger.warn).toHaveBeenCalledWith(`Could not re-read ${TARGET}: disk gone`);
    expect(harness.state.snapshots.size).toBe(1);
  });
});

describe("startPreviewMonitor", () => {
  it("checks previewed files after each cycle", async () => {
    const files: Record<string, string> = { [TARGET]: "// app\nconst port = 3000;\n" };
    const harness = createHarness({ text: PREVIEW }, files);

    const stop = startPreviewMonitor({
      ...harness.context,
      intervalMs: 5,
      onCycle(result) {
        if (result.status === "full-diff") files[TARGET] = "// app\n   const port = 8080;\n";
      }
    });

    await vi.waitFor(() =>
      expect(harness.logger.info).toHaveBeenCalledWith("src/app.ts changed on disk; its preview was already shown.")
    );
    stop();
    expect(harness.calls).toHaveLength(1);
  });

  it("polls until stopped", async () => {
    const harness = createHarness({ text: PREVIEW }, { [TARGET]: "// app\nconst port = 3000;\n" });
    const results: PreviewCycleResult[] = [];

    const stop = startPreviewMonitor({
      ...harness.context,
      intervalMs: 5,
      onCycle(result) {
        results.push(result);
        if (results.length === 2) stop();
      }
    });

    await vi.waitFor(() => expect(results).toHaveLength(2));
    await new Promise((resolveWait) => setTimeout(resolveWait, 40));

    expect(results.map((result) => result.status)).toEqual(["full-diff", "unchanged"]);
    expect(harness.calls).toHaveLength(1);
  });
});
