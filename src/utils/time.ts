/**
 * Normalize a timestamp from any tool's format into a Date.
 *
 * Handles:
 * - Unix milliseconds (OpenCode `time.created`, Cursor `createdAt`: e.g. 1768287342302)
 * - Unix seconds (e.g. 1768287561)
 * - ISO 8601 strings (Codex events, Gemini CLI sessions)
 */
export function normalizeTimestamp(input: unknown): Date | null {
  if (typeof input === "number") {
    if (!Number.isFinite(input)) return null;
    // Heuristic: timestamps after 2001-09-09 in milliseconds are > 1e12.
    // All Unix-seconds timestamps we'll encounter are < 1e11 (before year 5138).
    const d = new Date(input > 1e12 ? input : input * 1000);
    return isNaN(d.getTime()) ? null : d;
  }
  if (typeof input === "string") {
    if (!input.trim()) return null;
    const d = new Date(input);
    return isNaN(d.getTime()) ? null : d;
  }
  if (input instanceof Date) {
    return isNaN(input.getTime()) ? null : input;
  }
  return null;
}

/** Same as normalizeTimestamp, but `undefined` instead of `null` for optional fields. */
export function optionalTimestamp(input: unknown): Date | undefined {
  return normalizeTimestamp(input) ?? undefined;
}

export function toIso(date: Date | undefined): string | null {
  return date ? date.toISOString() : null;
}

/** Second-resolution display form: `2026-02-01T09:30:00Z`. */
export function formatDisplayTime(date: Date | undefined): string {
  if (!date) return "?";
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

/** Earliest and latest of a set of dates, ignoring gaps. */
export function timeBounds(dates: Iterable<Date>): { first?: Date; last?: Date } {
  let first: Date | undefined;
  let last: Date | undefined;
  for (const d of dates) {
    if (!first || d < first) first = d;
    if (!last || d > last) last = d;
  }
  return { first, last };
}
