#!/usr/bin/env node
import { parseSearchConfig } from "./config.js";
import { SessionSearchError } from "./errors.js";
import { createProgram, toConfigInput } from "./cli/program.js";
import type { CliOptions } from "./cli/program.js";
import { runSearch } from "./cli/run.js";
import { createTerminal } from "./cli/terminal.js";
import { err, useColor } from "./utils/log.js";

async function main(queryArg: string | undefined, opts: CliOptions) {
  const terminal = createTerminal();
  const controller = new AbortController();
  const onInterrupt = () => controller.abort();
  process.once("SIGINT", onInterrupt);

  try {
    const query = queryArg ?? (await terminal.readLine("Search for: "));
    const config = parseSearchConfig(toConfigInput(query, opts));
    await runSearch(config, {
      terminal,
      color: useColor(process.stdout),
      signal: controller.signal,
    });
  } finally {
    process.off("SIGINT", onInterrupt);
    terminal.close();
  }
}

createProgram(main)
  .parseAsync()
  .catch((error: unknown) => {
    if (error instanceof SessionSearchError) {
      err(error.message);
      process.exitCode = error.exitCode;
      return;
    }
    if (error instanceof Error && error.name === "AbortError") {
      err("Interrupted");
      process.exitCode = 130;
      return;
    }
    console.error("Fatal error:", error);
    process.exitCode = 1;
  });
