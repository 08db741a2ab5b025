import { Command } from "commander";
import type { SearchConfigInput } from "../config.js";
import { expandHome } from "../utils/paths.js";

export const VERSION = "0.1.0";

export interface CliOptions {
  tool: string[];
  contextChars?: string;
  maxResults?: string;
  outputDir?: string;
  datePriority?: string;
  codexHome?: string;
  geminiHome?: string;
  opencodeStorage?: string;
  cursorDb?: string;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, ...value.split(",")];
}

function rootPath(p: string | undefined): string | undefined {
  return p ? expandHome(p) : undefined;
}

/** Commander's raw option strings, shaped for SearchConfigSchema. */
export function toConfigInput(query: string, opts: CliOptions): SearchConfigInput {
  return {
    query,
    tools: opts.tool.length > 0 ? opts.tool : undefined,
    contextChars: opts.contextChars,
    maxResults: opts.maxResults,
    datePriority: opts.datePriority,
    outputDir: rootPath(opts.outputDir),
    roots: {
      codex: rootPath(opts.codexHome),
      "gemini-cli": rootPath(opts.geminiHome),
      opencode: rootPath(opts.opencodeStorage),
      cursor: rootPath(opts.cursorDb),
    },
  };
}

export function createProgram(
  action: (query: string | undefined, opts: CliOptions) => Promise<void>,
): Command {
  return new Command()
    .name("sessiongrep")
    .description("Find a past coding-agent session by literal text and export it as JSON.")
    .version(VERSION)
    .argument("[query]", "Literal, case-sensitive text to search for (prompted when omitted)")
    .option(
      "-t, --tool <name>",
      "Tool to search: codex, gemini-cli (or gemini), opencode, cursor. Repeatable",
      collect,
      [],
    )
    .option("-C, --context-chars <n>", "Characters of context on each side of a match")
    .option("-n, --max-results <n>", "Stop after this many matching sessions")
    .option("-o, --output-dir <dir>", "Directory for the exported file (default: current directory)")
    .option("--date-priority <fields>", "Comma-separated sort date fields: lastUpdated,startTime,fallback")
    .option("--codex-home <dir>", "Codex home directory (default: $CODEX_HOME or ~/.codex)")
    .option("--gemini-home <dir>", "Gemini CLI data directory (default: ~/.gemini)")
    .option("--opencode-storage <dir>", "OpenCode storage directory")
    .option("--cursor-db <file>", "Cursor global state.vscdb")
    .action(action);
}
