import type { DateField, MatchRecord, SessionCandidate } from "../search/types.js";
import { DEFAULT_DATE_PRIORITY } from "../search/types.js";
import { sortTimestamp } from "../search/ranker.js";
import { compactOneLine, truncate } from "../utils/display.js";
import { tildeify } from "../utils/paths.js";
import { formatDisplayTime } from "../utils/time.js";

export const SNIPPET_WIDTH = 220;
const TITLE_WIDTH = 60;

const BOLD = "\x1b[1m";
const NC = "\x1b[0m";

export interface RenderOptions {
  query: string;
  /** ANSI bold for the query; otherwise it is bracketed as ⟦query⟧. */
  color: boolean;
  datePriority?: readonly DateField[];
}

export function highlight(text: string, query: string, color: boolean): string {
  if (!query) return text;
  const marked = color ? `${BOLD}${query}${NC}` : `⟦${query}⟧`;
  return text.split(query).join(marked);
}

/** `[role]` for visible content; hidden reasoning and tool traffic also carry their kind. */
function matchTag({ role, kind }: Pick<MatchRecord, "role" | "kind">): string {
  if (!role) return kind;
  return kind === "content" || kind === role ? role : `${role}/${kind}`;
}

function matchLabel(count: number): string {
  return count === 1 ? "1 match" : `${count} matches`;
}

/**
 * Header line for the session, then one `<rank>.<n>` line per match. The
 * selection number is always the session's rank. Without a cwd the
 * session's title stands in as the project hint.
 */
export function renderCandidate(candidate: SessionCandidate, options: RenderOptions): string[] {
  const { session } = candidate;
  const date = formatDisplayTime(
    sortTimestamp(session, options.datePriority ?? DEFAULT_DATE_PRIORITY),
  );
  const fields = [`[${candidate.rank}]`, date, session.tool, session.sessionId];
  if (session.cwd) {
    fields.push(tildeify(session.cwd));
  } else if (session.displayName) {
    fields.push(JSON.stringify(truncate(compactOneLine(session.displayName), TITLE_WIDTH)));
  }
  fields.push(`(${matchLabel(candidate.matchCount)})`);

  const lines = [fields.join("  ")];
  candidate.matches.forEach((match, i) => {
    const snippet = truncate(compactOneLine(match.snippet), SNIPPET_WIDTH);
    lines.push(`    ${candidate.rank}.${i + 1} [${matchTag(match)}] ${highlight(snippet, options.query, options.color)}`);
  });
  return lines;
}

export function renderCandidates(
  candidates: readonly SessionCandidate[],
  options: RenderOptions,
): string[] {
  return candidates.flatMap((candidate) => renderCandidate(candidate, options));
}
