import { readdir, stat, readFile } from "fs/promises";
import { join } from "path";
import type {
  AgentParser,
  ToolName,
  SessionRef,
  SessionContent,
  ConversationMessage,
  TextUnit,
  MessageRole,
} from "./types.js";
import { sequenceId } from "./types.js";
import { TOOL_PATHS } from "../utils/paths.js";
import { optionalTimestamp } from "../utils/time.js";
import { isDisplayableMessage } from "../utils/display.js";

interface GeminiSession {
  sessionId: string;
  projectHash?: string;
  startTime?: string;
  lastUpdated?: string;
  messages?: GeminiMessage[];
  summary?: string;
  directories?: string[];
}

interface GeminiThought {
  subject?: string;
  description?: string;
  timestamp?: string;
}

interface GeminiMessage {
  id?: string;
  timestamp?: string;
  type?: "user" | "gemini" | "info" | "error" | "warning";
  content?: string | unknown[];
  toolCalls?: unknown[];
  thoughts?: GeminiThought[];
  model?: string;
  tokens?: { input?: number; output?: number; total?: number };
}

function roleOf(type: GeminiMessage["type"]): MessageRole {
  if (type === "user") return "user";
  if (type === "gemini") return "assistant";
  return "system";
}

/** Message content is either a string or an array of `{ text }` parts. */
export function messageText(content: GeminiMessage["content"]): string {
  if (typeof content === "string") return content;
  if (!Array.isArray(content)) return "";
  return content
    .map((part) =>
      part && typeof part === "object" && "text" in part && typeof part.text === "string"
        ? part.text
        : "",
    )
    .filter(Boolean)
    .join("\n");
}

/** Message list of a parsed file; anything but an array of objects reads as empty. */
function messagesOf(session: GeminiSession): GeminiMessage[] {
  if (!Array.isArray(session.messages)) return [];
  return session.messages.filter((m): m is GeminiMessage => Boolean(m) && typeof m === "object");
}

function projectDir(session: GeminiSession): string | undefined {
  const [first] = Array.isArray(session.directories) ? session.directories : [];
  return typeof first === "string" && first ? first : undefined;
}

function thoughtsText(thoughts: GeminiThought[] | undefined): string {
  return (Array.isArray(thoughts) ? thoughts : [])
    .map((t) => [t.subject, t.description].filter(Boolean).join(": "))
    .filter(Boolean)
    .join("\n");
}

export class GeminiParser implements AgentParser {
  readonly name: ToolName = "gemini-cli";
  readonly displayName = "Gemini CLI";
  readonly basePath: string;

  private tmpPath: string;

  constructor(customBasePath?: string) {
    this.basePath = customBasePath ?? TOOL_PATHS["gemini-cli"];
    this.tmpPath = join(this.basePath, "tmp");
  }

  async isAvailable(): Promise<boolean> {
    try {
      await stat(this.tmpPath);
      return true;
    } catch {
      return false;
    }
  }

  async listSessions(): Promise<SessionRef[]> {
    const sessions: SessionRef[] = [];

    for await (const filePath of this.iterateSessionFiles()) {
      const loaded = await this.loadSessionFile(filePath);
      if (!loaded) continue;
      const { session, mtime } = loaded;

      const firstDisplayableUser = messagesOf(session).find(
        (m) => m.type === "user" && isDisplayableMessage(messageText(m.content)),
      );
      const display =
        (typeof session.summary === "string" && session.summary) ||
        (firstDisplayableUser ? messageText(firstDisplayableUser.content).slice(0, 200) : undefined);

      sessions.push({
        tool: "gemini-cli",
        sessionId: session.sessionId,
        startTime: optionalTimestamp(session.startTime),
        lastUpdated: optionalTimestamp(session.lastUpdated),
        fallbackTime: mtime,
        cwd: projectDir(session),
        displayName: display,
        location: filePath,
      });
    }

    return sessions;
  }

  async *getTextUnits(ref: SessionRef): AsyncGenerator<TextUnit> {
    const loaded = await this.loadSessionFile(ref.location);
    if (!loaded) return;

    const messages = messagesOf(loaded.session);
    for (let i = 0; i < messages.length; i++) {
      const m = messages[i];
      const unitId = sequenceId("msg", i);
      const unitTime = optionalTimestamp(m.timestamp);

      const text = messageText(m.content);
      if (text) {
        yield { session: ref, unitId, text, unitTime, role: roleOf(m.type), kind: "content" };
      }

      const thoughts = thoughtsText(m.thoughts);
      if (thoughts) {
        yield {
          session: ref,
          unitId: `${unitId}:thoughts`,
          text: thoughts,
          unitTime,
          role: "system",
          kind: "reasoning",
        };
      }
    }
  }

  async getSession(ref: SessionRef): Promise<SessionContent | null> {
    const loaded = await this.loadSessionFile(ref.location);
    if (!loaded) return null;
    const { session } = loaded;

    const messages: ConversationMessage[] = [];
    for (const m of messagesOf(session)) {
      const extras: Record<string, unknown> = {};
      if (m.id) extras.id = m.id;
      if (m.type) extras.type = m.type;
      if (m.model) extras.model = m.model;
      if (m.tokens) extras.tokens = m.tokens;
      if (m.toolCalls?.length) extras.toolCalls = m.toolCalls;
      if (m.thoughts?.length) extras.thoughts = m.thoughts;

      messages.push({
        role: roleOf(m.type),
        content: messageText(m.content),
        timestamp: optionalTimestamp(m.timestamp),
        extras,
      });
    }

    if (messages.length === 0) return null;

    return {
      tool: "gemini-cli",
      sessionId: session.sessionId,
      startTime: optionalTimestamp(session.startTime),
      lastUpdated: optionalTimestamp(session.lastUpdated),
      cwd: projectDir(session),
      messages,
    };
  }

  private async loadSessionFile(
    filePath: string,
  ): Promise<{ session: GeminiSession; mtime: Date } | null> {
    try {
      const [raw, st] = await Promise.all([readFile(filePath, "utf-8"), stat(filePath)]);
      const session = JSON.parse(raw) as GeminiSession;
      if (!session || typeof session.sessionId !== "string" || !session.sessionId) return null;
      return { session, mtime: st.mtime };
    } catch {
      // Missing, half-written or malformed files are skipped
      return null;
    }
  }

  private async *iterateSessionFiles(): AsyncGenerator<string> {
    let projectHashes: string[];
    try {
      projectHashes = (await readdir(this.tmpPath)).sort();
    } catch {
      return;
    }

    for (const hash of projectHashes) {
      const chatsDir = join(this.tmpPath, hash, "chats");
      let chatFiles: string[];
      try {
        chatFiles = (await readdir(chatsDir)).sort();
      } catch {
        continue;
      }

      for (const file of chatFiles) {
        if (!file.startsWith("session-") || !file.endsWith(".json")) continue;
        yield join(chatsDir, file);
      }
    }
  }
}
