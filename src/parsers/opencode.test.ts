import { describe, it, expect } from "vitest";
import { join, dirname } from "path";
import { fileURLToPath } from "url";
import { OpenCodeParser } from "./opencode.js";
import type { SessionRef, TextUnit } from "./types.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
const fixturesDir = join(__dirname, "..", "test-fixtures", "opencode");

async function collect(gen: AsyncGenerator<TextUnit>): Promise<TextUnit[]> {
  const units: TextUnit[] = [];
  for await (const unit of gen) units.push(unit);
  return units;
}

describe("OpenCodeParser", () => {
  const parser = new OpenCodeParser(fixturesDir);

  async function sessionById(id: string): Promise<SessionRef> {
    const found = (await parser.listSessions()).find((s) => s.sessionId === id);
    if (!found) throw new Error(`fixture session ${id} missing`);
    return found;
  }

  describe("isAvailable", () => {
    it("returns true when session/ exists", async () => {
      expect(await parser.isAvailable()).toBe(true);
    });

    it("returns false for nonexistent path", async () => {
      expect(await new OpenCodeParser("/tmp/nonexistent-opencode-dir").isAvailable()).toBe(false);
    });
  });

  describe("listSessions", () => {
    it("enumerates sessions per project in filename order", async () => {
      const sessions = await parser.listSessions();
      expect(sessions.map((s) => s.sessionId)).toEqual(["ses_alpha", "ses_beta"]);
    });

    it("takes cwd from the project worktree when the session has no directory", async () => {
      const alpha = await sessionById("ses_alpha");
      expect(alpha.cwd).toBe("/home/dev/projects/web");
      expect(alpha.displayName).toBe("Tune retry backoff");
      expect(alpha.startTime?.toISOString()).toBe("2026-01-05T10:00:00.000Z");
      expect(alpha.lastUpdated?.toISOString()).toBe("2026-01-05T10:30:00.000Z");
      expect(alpha.fallbackTime).toBeInstanceOf(Date);
    });

    it("prefers the session directory and falls back to the slug for a name", async () => {
      const beta = await sessionById("ses_beta");
      expect(beta.cwd).toBe("/home/dev/scratch");
      expect(beta.displayName).toBe("quiet-otter");
      expect(beta.lastUpdated).toBeUndefined();
    });
  });

  describe("getTextUnits", () => {
    it("keeps a reasoning-only message as its own system unit", async () => {
      const units = await collect(parser.getTextUnits(await sessionById("ses_alpha")));
      expect(units.map((u) => [u.unitId, u.role, u.kind])).toEqual([
        ["msg_001", "user", "content"],
        ["msg_002:prt_002", "system", "reasoning"],
        ["msg_003", "assistant", "content"],
      ]);
    });

    it("joins text parts in part order", async () => {
      const units = await collect(parser.getTextUnits(await sessionById("ses_alpha")));
      expect(units[2].text).toBe("Backoff now doubles per attempt, capped at 30s.");
    });

    it("dates a reasoning unit by its part time", async () => {
      const units = await collect(parser.getTextUnits(await sessionById("ses_alpha")));
      expect(units[1].unitTime?.toISOString()).toBe("2026-01-05T10:01:10.000Z");
    });

    it("yields nothing for a session without messages", async () => {
      expect(await collect(parser.getTextUnits(await sessionById("ses_beta")))).toEqual([]);
    });
  });

  describe("getSession", () => {
    it("assembles messages with model, agent, thoughts and tools", async () => {
      const content = await parser.getSession(await sessionById("ses_alpha"));
      expect(content?.cwd).toBe("/home/dev/projects/web");
      expect(content?.messages).toHaveLength(3);

      const [user, thinking, reply] = content?.messages ?? [];
      expect(user?.content).toBe("Make the retry loop back off exponentially");
      expect(user?.timestamp?.toISOString()).toBe("2026-01-05T10:00:05.000Z");

      expect(thinking?.content).toBe("");
      expect(thinking?.extras.thoughts).toEqual([
        {
          subject: "Thinking",
          description: "The jitter window should scale with the attempt count",
          timestamp: "2026-01-05T10:01:10.000Z",
        },
      ]);

      expect(reply?.extras).toEqual({
        model: "anthropic/claude-sonnet",
        agent: "build",
        tokens: { input: 300, output: 80 },
        tools: [{ tool: "edit", call_id: "call_9", status: "completed" }],
      });
    });

    it("returns null for a session without messages", async () => {
      expect(await parser.getSession(await sessionById("ses_beta"))).toBeNull();
    });
  });
});
