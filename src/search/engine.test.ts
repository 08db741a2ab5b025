import { describe, it, expect, vi, beforeEach, afterEach, beforeAll, afterAll } from "vitest";
import { mkdtempSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join, dirname } from "path";
import { fileURLToPath } from "url";
import { SearchEngine } from "./engine.js";
import type { AgentParser, FragmentHit, SessionRef, ToolName } from "../parsers/types.js";
import { sequenceId } from "../parsers/types.js";
import { CodexParser } from "../parsers/codex.js";
import { GeminiParser } from "../parsers/gemini.js";
import { OpenCodeParser } from "../parsers/opencode.js";
import { CursorParser } from "../parsers/cursor.js";
import { InvalidConfigError, StorageUnavailableError } from "../errors.js";
import { createCursorStorage } from "../test-fixtures/cursor-db.js";

// --- Mock parser factory ---

interface MockSession {
  id: string;
  lastUpdated?: Date;
  units: string[];
}

interface MockOptions {
  available?: boolean;
  /** When set, the parser locates fragments and the engine resolves them. */
  fragments?: FragmentHit[];
  /** (owner id, session id) pairs; sessions left out have no fragments. */
  owners?: [string, string][];
  onClose?: () => void;
}

function createMockParser(
  name: ToolName,
  sessions: MockSession[],
  options: MockOptions = {},
): AgentParser {
  const refs: SessionRef[] = sessions.map((s) => ({
    tool: name,
    sessionId: s.id,
    lastUpdated: s.lastUpdated,
    location: `/mock/${name}/${s.id}`,
  }));

  const parser: AgentParser = {
    name,
    displayName: `Mock ${name}`,
    basePath: `/mock/${name}`,
    async isAvailable() {
      return options.available ?? true;
    },
    async listSessions() {
      return refs;
    },
    async *getTextUnits(ref) {
      const texts = sessions.find((s) => s.id === ref.sessionId)?.units ?? [];
      for (let i = 0; i < texts.length; i++) {
        yield { session: ref, unitId: sequenceId("u", i), text: texts[i], role: "user", kind: "content" };
      }
    },
    async getSession() {
      return null;
    },
  };

  const { fragments, owners, onClose } = options;
  if (fragments) {
    parser.locateFragments = async function* () {
      yield* fragments;
    };
  }
  if (owners) {
    parser.listFragmentOwners = async function* () {
      yield* owners;
    };
  }
  if (onClose) {
    parser.close = async () => onClose();
  }
  return parser;
}

const d = (iso: string) => new Date(iso);

const __dirname = dirname(fileURLToPath(import.meta.url));
const fixtures = join(__dirname, "..", "test-fixtures");

describe("SearchEngine", () => {
  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("matching and grouping", () => {
    const engine = new SearchEngine([
      createMockParser("codex", [
        { id: "c-new", lastUpdated: d("2026-02-01T00:00:00Z"), units: ["fix the cache", "cache cache"] },
        { id: "c-none", lastUpdated: d("2026-01-01T00:00:00Z"), units: ["unrelated"] },
      ]),
      createMockParser("gemini-cli", [
        { id: "g-old", lastUpdated: d("2025-12-01T00:00:00Z"), units: ["a cache miss"] },
      ]),
    ]);

    it("returns one candidate per matching session with the true count", async () => {
      const { candidates } = await engine.search({ query: "cache" });
      expect(candidates.map((c) => [c.rank, c.session.sessionId, c.matchCount])).toEqual([
        [1, "g-old", 1],
        [2, "c-new", 3],
      ]);
    });

    it("orders a session's matches by unit then offset", async () => {
      const { candidates } = await engine.search({ query: "cache" });
      const codex = candidates.find((c) => c.session.sessionId === "c-new");
      expect(codex?.matches.map((m) => [m.unitId, m.offset])).toEqual([
        ["u-000000", 8],
        ["u-000001", 0],
        ["u-000001", 6],
      ]);
    });

    it("honours contextChars", async () => {
      const { candidates } = await engine.search({ query: "miss", contextChars: 2 });
      expect(candidates[0].matches[0].snippet).toBe("e miss");
    });

    it("reports scan statistics", async () => {
      const { stats } = await engine.search({ query: "cache" });
      expect(stats).toEqual({
        searchedTools: ["codex", "gemini-cli"],
        unavailableTools: [],
        sessionsScanned: 3,
        unitsScanned: 4,
        orphanReferences: 0,
        truncated: false,
      });
    });

    it("returns no candidates when nothing matches", async () => {
      const { candidates } = await engine.search({ query: "Cache" });
      expect(candidates).toEqual([]);
    });

    it("rejects an empty query", async () => {
      await expect(engine.search({ query: "" })).rejects.toThrow(InvalidConfigError);
    });
  });

  describe("storage availability", () => {
    it("skips an unavailable tool with a warning", async () => {
      const engine = new SearchEngine([
        createMockParser("codex", [], { available: false }),
        createMockParser("opencode", [{ id: "o1", units: ["needle"] }]),
      ]);
      const { candidates, stats } = await engine.search({ query: "needle" });
      expect(candidates).toHaveLength(1);
      expect(stats.unavailableTools).toEqual(["codex"]);
      expect(console.error).toHaveBeenCalledWith(
        expect.stringContaining("Mock codex storage not found at /mock/codex"),
      );
    });

    it("fails when every tool is unavailable", async () => {
      const engine = new SearchEngine([
        createMockParser("codex", [], { available: false }),
        createMockParser("cursor", [], { available: false }),
      ]);
      await expect(engine.search({ query: "needle" })).rejects.toThrow(
        new StorageUnavailableError(["codex", "cursor"]).message,
      );
    });
  });

  describe("early stop", () => {
    const engine = new SearchEngine([
      createMockParser("codex", [
        { id: "s1", units: ["needle"] },
        { id: "s2", units: ["needle", "needle"] },
        { id: "s3", units: ["needle"] },
      ]),
    ]);

    it("stops once maxResults sessions have matched", async () => {
      const { candidates, stats } = await engine.search({ query: "needle", maxResults: 2 });
      expect(candidates.map((c) => c.session.sessionId)).toEqual(["s1", "s2"]);
      expect(candidates[1].matchCount).toBe(2);
      expect(stats.sessionsScanned).toBe(2);
      expect(stats.truncated).toBe(true);
    });

    it("keeps the most recent sessions across tools", async () => {
      const mixed = new SearchEngine([
        createMockParser("codex", [
          { id: "old", lastUpdated: d("2024-05-01T00:00:00Z"), units: ["needle"] },
          { id: "older", lastUpdated: d("2024-01-01T00:00:00Z"), units: ["needle"] },
        ]),
        createMockParser("opencode", [
          { id: "new", lastUpdated: d("2026-03-01T00:00:00Z"), units: ["needle"] },
          { id: "undated", units: ["needle"] },
        ]),
      ]);
      const one = await mixed.search({ query: "needle", maxResults: 1 });
      expect(one.candidates.map((c) => c.session.sessionId)).toEqual(["new"]);
      expect(one.stats.sessionsScanned).toBe(1);

      const two = await mixed.search({ query: "needle", maxResults: 2 });
      expect(two.candidates.map((c) => [c.rank, c.session.sessionId])).toEqual([
        [1, "old"],
        [2, "new"],
      ]);
    });

    it("aborts between units", async () => {
      const controller = new AbortController();
      controller.abort();
      const error = await engine
        .search({ query: "needle", signal: controller.signal })
        .catch((e: unknown) => e);
      expect(error instanceof Error && error.name).toBe("AbortError");
    });
  });

  describe("fragment resolution", () => {
    it("scans only sessions owning a fragment hit and counts orphans", async () => {
      const engine = new SearchEngine([
        createMockParser(
          "cursor",
          [
            { id: "owned", units: ["needle"] },
            { id: "not-hit", units: ["needle"] },
          ],
          {
            fragments: [
              { key: "bubbleId:owned:b1", ownerId: "owned" },
              { key: "bubbleId:ghost:b1", ownerId: "ghost" },
            ],
          },
        ),
      ]);
      const { candidates, stats } = await engine.search({ query: "needle" });
      expect(candidates.map((c) => c.session.sessionId)).toEqual(["owned"]);
      expect(stats.sessionsScanned).toBe(1);
      expect(stats.orphanReferences).toBe(1);
    });
  });

  describe("partial fragment coverage", () => {
    it("scans sessions without fragments whole", async () => {
      const engine = new SearchEngine([
        createMockParser(
          "cursor",
          [
            { id: "kv-hit", units: ["needle"] },
            { id: "kv-miss", units: ["needle"] },
            { id: "ws:w1:chat:t1", units: ["a needle"] },
          ],
          {
            fragments: [{ key: "bubbleId:kv-hit:b1", ownerId: "kv-hit" }],
            owners: [
              ["kv-hit", "kv-hit"],
              ["kv-miss", "kv-miss"],
            ],
          },
        ),
      ]);
      const { candidates, stats } = await engine.search({ query: "needle" });
      expect(candidates.map((c) => c.session.sessionId)).toEqual(["kv-hit", "ws:w1:chat:t1"]);
      expect(stats.sessionsScanned).toBe(2);
    });

    it("closes every searched parser when the scan ends", async () => {
      const closed: string[] = [];
      const engine = new SearchEngine([
        createMockParser("codex", [{ id: "c1", units: ["needle"] }], { onClose: () => closed.push("codex") }),
        createMockParser("cursor", [], { available: false, onClose: () => closed.push("cursor") }),
      ]);
      await engine.search({ query: "needle" });
      expect(closed).toEqual(["codex"]);
    });
  });

  describe("against fixture stores", () => {
    let dir: string;
    let cursorDb: string;

    beforeAll(async () => {
      dir = mkdtempSync(join(tmpdir(), "sessiongrep-engine-"));
      cursorDb = (await createCursorStorage(dir)).globalDb;
    });

    afterAll(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    function fixtureEngine(): SearchEngine {
      return new SearchEngine([
        new CodexParser(join(fixtures, "codex")),
        new GeminiParser(join(fixtures, "gemini")),
        new OpenCodeParser(join(fixtures, "opencode")),
        new CursorParser(cursorDb),
      ]);
    }

    it("finds a single line-oriented hit", async () => {
      const { candidates } = await fixtureEngine().search({ query: "reduce latencies" });
      expect(candidates).toHaveLength(1);
      expect(candidates[0]).toMatchObject({ rank: 1, matchCount: 1 });
      expect(candidates[0].session.tool).toBe("codex");
      expect(candidates[0].matches[0].unitId).toBe("line-000003");
    });

    it("reports a reasoning-only message as a system unit", async () => {
      const { candidates } = await fixtureEngine().search({ query: "jitter window" });
      expect(candidates).toHaveLength(1);
      expect(candidates[0].session.sessionId).toBe("ses_alpha");
      expect(candidates[0].matches).toHaveLength(1);
      expect(candidates[0].matches[0]).toMatchObject({
        unitId: "msg_002:prt_002",
        role: "system",
        kind: "reasoning",
        snippet: "The jitter window should scale with the attempt count",
      });
    });

    it("drops orphaned key-value fragments and keeps their siblings", async () => {
      const { candidates, stats } = await fixtureEngine().search({ query: "feature flag" });
      expect(candidates.map((c) => [c.rank, c.session.sessionId, c.matchCount])).toEqual([
        [1, "conv-inline", 2],
        [2, "conv-split", 2],
      ]);
      expect(stats.orphanReferences).toBe(1);
    });

    it("scans Cursor workspace sessions that have no key-value fragments", async () => {
      const { candidates } = await fixtureEngine().search({ query: "retry budget" });
      expect(candidates.map((c) => [c.rank, c.session.sessionId, c.matchCount])).toEqual([
        [1, "ws:ws-alpha:prompt:0", 2],
        [2, "ws:ws-alpha:prompt:1", 1],
      ]);
    });
  });
});
