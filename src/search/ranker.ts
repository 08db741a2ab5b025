import type { SessionRef } from "../parsers/types.js";
import { DEFAULT_DATE_PRIORITY } from "./types.js";
import type { DateField, SessionCandidate } from "./types.js";

function dateOf(session: SessionRef, field: DateField): Date | undefined {
  switch (field) {
    case "lastUpdated":
      return session.lastUpdated;
    case "startTime":
      return session.startTime;
    case "fallback":
      return session.fallbackTime;
  }
}

/** The first date available in `priority` order. */
export function sortTimestamp(
  session: SessionRef,
  priority: readonly DateField[] = DEFAULT_DATE_PRIORITY,
): Date | undefined {
  for (const field of priority) {
    const date = dateOf(session, field);
    if (date) return date;
  }
  return undefined;
}

/** Undated items count as oldest. Ties keep their input order (Array.prototype.sort is stable). */
function orderByTime<T>(
  items: readonly T[],
  sessionOf: (item: T) => SessionRef,
  priority: readonly DateField[],
  direction: 1 | -1,
): T[] {
  return items
    .map((item) => ({ item, time: sortTimestamp(sessionOf(item), priority)?.getTime() }))
    .sort((a, b) => {
      if (a.time === undefined || b.time === undefined) {
        return ((a.time === undefined ? 0 : 1) - (b.time === undefined ? 0 : 1)) * direction;
      }
      return (a.time - b.time) * direction;
    })
    .map(({ item }) => item);
}

/** Most recent first, undated last: the order sessions are scanned in. */
export function newestFirst<T extends { session: SessionRef }>(
  items: readonly T[],
  priority: readonly DateField[] = DEFAULT_DATE_PRIORITY,
): T[] {
  return orderByTime(items, (item) => item.session, priority, -1);
}

/**
 * Order candidates oldest first so the freshest end up nearest the
 * prompt, then number them 1..N. Undated candidates lead.
 */
export function rankCandidates(
  candidates: readonly SessionCandidate[],
  priority: readonly DateField[] = DEFAULT_DATE_PRIORITY,
): SessionCandidate[] {
  return orderByTime(candidates, (c) => c.session, priority, 1).map((candidate, i) => ({
    ...candidate,
    rank: i + 1,
  }));
}
