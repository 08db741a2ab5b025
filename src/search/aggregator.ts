import { sessionKey } from "../parsers/types.js";
import type { MatchRecord, SessionCandidate } from "./types.js";

/**
 * Group matches by session, keeping sessions in first-seen order and each
 * session's matches in the order they arrived (unit order, then text
 * order). Sessions without a match never get a candidate.
 */
export function aggregate(matches: Iterable<MatchRecord>): SessionCandidate[] {
  const bySession = new Map<string, SessionCandidate>();

  for (const match of matches) {
    const key = sessionKey(match.session);
    let candidate = bySession.get(key);
    if (!candidate) {
      candidate = { session: match.session, matchCount: 0, matches: [], rank: 0 };
      bySession.set(key, candidate);
    }
    candidate.matches.push(match);
    candidate.matchCount++;
  }

  return Array.from(bySession.values());
}
