import type { TextUnit } from "../parsers/types.js";
import type { MatchRecord } from "./types.js";

export const DEFAULT_CONTEXT_CHARS = 50;

/**
 * Start index of every literal, case-sensitive occurrence of `needle`.
 * The search resumes one character past each start, so overlapping
 * occurrences ("aa" in "aaa") are each reported.
 */
export function* findOccurrences(text: string, needle: string): Generator<number> {
  if (!needle) return;
  let from = 0;
  for (;;) {
    const idx = text.indexOf(needle, from);
    if (idx === -1) return;
    yield idx;
    from = idx + 1;
  }
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

/**
 * Up to `contextChars` before the match, the match, and up to
 * `contextChars` after it, clipped at the text edges. A window edge that
 * would split a surrogate pair is pulled inward by one code unit.
 */
export function makeSnippet(
  text: string,
  index: number,
  matchLength: number,
  contextChars = DEFAULT_CONTEXT_CHARS,
): string {
  let start = Math.max(0, index - contextChars);
  let end = Math.min(text.length, index + matchLength + contextChars);
  if (start > 0 && start < index && isLowSurrogate(text.charCodeAt(start))) start++;
  if (end < text.length && end > index + matchLength && isLowSurrogate(text.charCodeAt(end))) end--;
  return text.slice(start, end);
}

/** Every occurrence of `query` in one unit's text, in text order. */
export function scanUnit(
  unit: TextUnit,
  query: string,
  contextChars = DEFAULT_CONTEXT_CHARS,
): MatchRecord[] {
  const matches: MatchRecord[] = [];
  let bytesBefore = 0;
  let counted = 0;
  for (const offset of findOccurrences(unit.text, query)) {
    bytesBefore += Buffer.byteLength(unit.text.slice(counted, offset), "utf-8");
    counted = offset;
    matches.push({
      session: unit.session,
      unitId: unit.unitId,
      offset,
      byteOffset: bytesBefore,
      snippet: makeSnippet(unit.text, offset, query.length, contextChars),
      role: unit.role,
      kind: unit.kind,
    });
  }
  return matches;
}
