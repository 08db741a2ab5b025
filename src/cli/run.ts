import type { SearchConfig } from "../config.js";
import type { AgentParser } from "../parsers/types.js";
import { createParsers } from "../parsers/registry.js";
import { SearchEngine } from "../search/engine.js";
import { selectCandidate } from "../search/selector.js";
import { exportSession } from "../export/writer.js";
import { NoMatchesError } from "../errors.js";
import { info, ok } from "../utils/log.js";
import { renderCandidates } from "./present.js";
import type { Terminal } from "./terminal.js";

export interface RunContext {
  terminal: Terminal;
  /** Highlight matches with ANSI bold. */
  color: boolean;
  /** Defaults to parsers built from the config's tools and roots. */
  parsers?: AgentParser[];
  signal?: AbortSignal;
}

/**
 * One search-select-export run. Returns the written file's path; every
 * way the run can end early is a thrown SessionSearchError.
 */
export async function runSearch(config: SearchConfig, ctx: RunContext): Promise<string> {
  const parsers = ctx.parsers ?? createParsers(config.tools, config.roots);
  const engine = new SearchEngine(parsers);

  const { candidates, stats } = await engine.search({
    query: config.query,
    contextChars: config.contextChars,
    maxResults: config.maxResults,
    datePriority: config.datePriority,
    signal: ctx.signal,
  });

  if (candidates.length === 0) throw new NoMatchesError(config.query);

  if (stats.truncated) {
    info(`Stopped after ${candidates.length} matching sessions (--max-results)`);
  }

  for (const line of renderCandidates(candidates, {
    query: config.query,
    color: ctx.color,
    datePriority: config.datePriority,
  })) {
    ctx.terminal.print(line);
  }

  const answer = await ctx.terminal.readLine(`Select a session [1-${candidates.length}]: `);
  const chosen = selectCandidate(answer, candidates);

  const parser = parsers.find((p) => p.name === chosen.session.tool);
  if (!parser) {
    throw new Error(`No parser for ${chosen.session.tool}`);
  }

  let written: string;
  try {
    written = await exportSession(parser, chosen.session, config.outputDir ?? process.cwd());
  } finally {
    await parser.close?.();
  }
  ok(`Exported ${chosen.session.tool} session ${chosen.session.sessionId} to ${written}`);
  return written;
}
