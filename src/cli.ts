#!/usr/bin/env node
import { readFileSync } from "node:fs";

import { log } from "@clack/prompts";
import { Command, CommanderError } from "commander";
import { z } from "zod";

import { runApply } from "./commands/apply.js";
import { runParse } from "./commands/parse.js";
import { runWatch } from "./commands/watch.js";
import { normalizeError, resolveOutputFormatFromArgv, toJsonErrorPayload } from "./core/errors.js";
import type { ApplyCommandOptions, ParseCommandOptions, WatchCommandOptions } from "./core/types.js";

const packageJsonSchema = z.object({ version: z.string() });

function readCliVersion(): string {
  // src/cli.ts and dist/cli.js both sit one level below package.json.
  const raw = readFileSync(new URL("../package.json", import.meta.url), "utf8");
  const parsed = packageJsonSchema.safeParse(JSON.parse(raw));
  return parsed.success ? parsed.data.version : "0.0.0";
}

const program = new Command();

program
  .name("edit-preview")
  .description("Show a coding assistant's inline \"Would you like to make the following edits?\" preview as a full-file diff.")
  .version(readCliVersion())
  .exitOverride();

program
  .command("parse")
  .description("Parse the most recent edit preview in a terminal transcript.")
  .argument("<transcript>", "Captured terminal output (for example a `script -f` typescript file)")
  .option("--format <format>", "text | json", "text")
  .option("--no-color", "Disable ANSI colours")
  .action((transcriptArg: string, rawOptions: ParseCommandOptions) => {
    runParse(transcriptArg, rawOptions);
  });

program
  .command("apply")
  .description("Rebuild the full suggested file from the latest preview without touching the file on disk.")
  .argument("<input>", "Terminal transcript, or a JSON block from `parse --format json` with --block")
  .option("--root <dir>", "Project root the preview path is relative to (defaults to current working directory)")
  .option("--block", "Treat <input> as a JSON preview block instead of a transcript", false)
  .option("--format <format>", "text | json", "text")
  .option("--no-color", "Disable ANSI colours")
  .action(async (inputArg: string, rawOptions: ApplyCommandOptions) => {
    await runApply(inputArg, rawOptions);
  });

program
  .command("watch")
  .description("Poll a growing terminal transcript and show every new edit preview.")
  .argument("<transcript>", "Terminal transcript another process keeps appending to")
  .option("--root <dir>", "Project root the preview path is relative to (defaults to current working directory)")
  .option("--interval-ms <ms>", "Polling interval in milliseconds (250-60000, default 1500)")
  .option("--once", "Run a single polling cycle and exit", false)
  .option("--no-color", "Disable ANSI colours")
  .action(async (transcriptArg: string, rawOptions: WatchCommandOptions) => {
    const session = await runWatch(transcriptArg, rawOptions);
    await session.done;
  });

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (rawError) {
    // --help and --version surface as commander errors with exit code 0.
    if (rawError instanceof CommanderError && rawError.exitCode === 0) return;
    const error = normalizeError(rawError);
    if (resolveOutputFormatFromArgv(process.argv) === "json") {
      process.stdout.write(`${JSON.stringify(toJsonErrorPayload(error), null, 2)}\n`);
    } else if (!error.details?.commanderCode) {
      // commander already printed its own usage error.
      log.error(error.message);
    }
    process.exitCode = error.exitCode;
  }
}

void main();
