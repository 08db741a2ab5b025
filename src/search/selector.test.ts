import { describe, it, expect } from "vitest";
import { selectCandidate } from "./selector.js";
import { InvalidSelectionError } from "../errors.js";
import type { SessionCandidate } from "./types.js";

const candidates: SessionCandidate[] = [1, 2, 3, 4, 5].map((rank) => ({
  session: { tool: "codex", sessionId: `s${rank}`, location: `/mock/s${rank}` },
  matchCount: 1,
  matches: [],
  rank,
}));

describe("selectCandidate", () => {
  it("returns the candidate displayed at that rank", () => {
    expect(selectCandidate("3", candidates).session.sessionId).toBe("s3");
  });

  it("ignores surrounding whitespace and the newline", () => {
    expect(selectCandidate(" 5\n", candidates).session.sessionId).toBe("s5");
  });

  it.each(["0", "99"])("rejects out-of-range input %s", (input) => {
    expect(() => selectCandidate(input, candidates)).toThrow(InvalidSelectionError);
    expect(() => selectCandidate(input, candidates)).toThrow(
      `Selection out of range: ${input} (expected 1-5)`,
    );
  });

  it.each(["abc", "", "-1", "2.0", "1,2"])("rejects non-numeric input %j", (input) => {
    expect(() => selectCandidate(input, candidates)).toThrow(
      `Invalid selection (expected a number): ${JSON.stringify(input)}`,
    );
  });

  it("carries the invalid_selection code", () => {
    try {
      selectCandidate("7", candidates);
      expect.unreachable();
    } catch (error) {
      if (!(error instanceof InvalidSelectionError)) throw error;
      expect(error.code).toBe("invalid_selection");
      expect(error.exitCode).toBe(2);
    }
  });
});
