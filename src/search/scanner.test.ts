import { describe, it, expect } from "vitest";
import { findOccurrences, makeSnippet, scanUnit } from "./scanner.js";
import type { SessionRef, TextUnit } from "../parsers/types.js";

const session: SessionRef = { tool: "codex", sessionId: "s1", location: "/mock/s1.jsonl" };

function unit(text: string): TextUnit {
  return { session, unitId: "line-000001", text, role: "assistant", kind: "content" };
}

describe("findOccurrences", () => {
  it("reports overlapping occurrences", () => {
    expect([...findOccurrences("aaa", "aa")]).toEqual([0, 1]);
  });

  it("is case-sensitive", () => {
    expect([...findOccurrences("Cache cache CACHE", "cache")]).toEqual([6]);
  });

  it("yields nothing for an empty needle", () => {
    expect([...findOccurrences("anything", "")]).toEqual([]);
  });
});

describe("makeSnippet", () => {
  it("takes context on both sides of a match away from the edges", () => {
    const text = "x".repeat(100) + "needle" + "y".repeat(100);
    const snippet = makeSnippet(text, 100, 6, 50);
    expect(snippet).toBe("x".repeat(50) + "needle" + "y".repeat(50));
    expect(snippet).toHaveLength(106);
  });

  it("clips at the start of the text without padding", () => {
    expect(makeSnippet("needle then more text", 0, 6, 5)).toBe("needle then");
  });

  it("clips at the end of the text", () => {
    expect(makeSnippet("text ends with needle", 15, 6, 5)).toBe("with needle");
  });

  it("does not start inside a surrogate pair", () => {
    expect(makeSnippet("😀aaaQ", 5, 1, 4)).toBe("aaaQ");
  });

  it("does not end inside a surrogate pair", () => {
    expect(makeSnippet("Qab😀z", 0, 1, 3)).toBe("Qab");
  });
});

describe("scanUnit", () => {
  it("returns one record per occurrence with UTF-16 and UTF-8 offsets", () => {
    const matches = scanUnit(unit("héllo wörld wörld"), "wörld", 3);
    expect(matches.map((m) => [m.offset, m.byteOffset, m.snippet])).toEqual([
      [6, 7, "lo wörld wö"],
      [12, 14, "ld wörld"],
    ]);
  });

  it("carries the unit's identity, role and kind", () => {
    const [match] = scanUnit(unit("a needle"), "needle");
    expect(match).toMatchObject({
      session,
      unitId: "line-000001",
      role: "assistant",
      kind: "content",
      snippet: "a needle",
    });
  });

  it("returns an empty list when the query is absent", () => {
    expect(scanUnit(unit("nothing here"), "needle")).toEqual([]);
  });
});
