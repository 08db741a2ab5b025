import { readdir, stat } from "fs/promises";
import { basename, join } from "path";
import type {
  AgentParser,
  ToolName,
  SessionRef,
  SessionContent,
  ConversationMessage,
  TextUnit,
  MessageRole,
  UnitKind,
} from "./types.js";
import { sequenceId } from "./types.js";
import { TOOL_PATHS } from "../utils/paths.js";
import { normalizeTimestamp, optionalTimestamp, timeBounds } from "../utils/time.js";
import { readJsonlLines } from "../utils/jsonl.js";
import { isDisplayableMessage } from "../utils/display.js";

interface SessionEvent {
  timestamp?: string;
  type?: string;
  payload?: {
    type?: string;
    id?: string;
    timestamp?: string;
    cwd?: string;
    git?: { commit_hash?: string; branch?: string; repository_url?: string };
    cli_version?: string;
    model_provider?: string;
    model?: string;
    role?: string;
    content?: ContentItem[];
    message?: string;
    text?: string;
    images?: unknown[];
    name?: string;
    arguments?: string;
    call_id?: string;
    output?: unknown;
  };
}

interface ContentItem {
  type: string;
  text?: string;
}

interface CodexMessage {
  role: MessageRole;
  kind: UnitKind;
  text: string;
  extras: Record<string, unknown>;
}

interface CodexLine {
  lineNo: number;
  timestamp?: Date;
  message: CodexMessage;
}

const ROLLOUT_RE = /^rollout-\d{4}-\d{2}-\d{2}T\d{2}-\d{2}-\d{2}-(.+)\.jsonl$/;

function contentText(items: ContentItem[] | undefined): string {
  return (items ?? [])
    .filter((c) => c.type === "output_text" || c.type === "input_text" || c.type === "text")
    .map((c) => c.text ?? "")
    .join("\n");
}

function outputText(output: unknown): string {
  if (typeof output === "string") return output;
  if (output && typeof output === "object" && "content" in output) {
    const content = (output as { content?: unknown }).content;
    if (typeof content === "string") return content;
  }
  return output === undefined ? "" : JSON.stringify(output);
}

/**
 * Map one rollout event to the conversational text it carries, if any.
 * Session metadata, token counts and turn bookkeeping carry none.
 */
function eventToMessage(event: SessionEvent): CodexMessage | null {
  const payload = event.payload;
  if (!payload) return null;

  if (event.type === "event_msg") {
    switch (payload.type) {
      case "user_message": {
        if (!payload.message) return null;
        const extras: Record<string, unknown> = {};
        if (payload.images?.length) extras.images = payload.images.length;
        return { role: "user", kind: "content", text: payload.message, extras };
      }
      case "agent_message":
        if (!payload.message) return null;
        return {
          role: "assistant",
          kind: "content",
          text: payload.message,
          extras: payload.model ? { model: payload.model } : {},
        };
      case "agent_reasoning":
        if (!payload.text) return null;
        return { role: "system", kind: "reasoning", text: payload.text, extras: { kind: "reasoning" } };
      default:
        return null;
    }
  }

  if (event.type === "response_item") {
    switch (payload.type) {
      case "message": {
        const text = contentText(payload.content);
        if (!text) return null;
        const role: MessageRole =
          payload.role === "user" ? "user" : payload.role === "assistant" ? "assistant" : "system";
        return { role, kind: "content", text, extras: {} };
      }
      case "function_call":
        return {
          role: "tool",
          kind: "tool",
          text: payload.arguments ?? "",
          extras: { kind: "tool_call", name: payload.name, call_id: payload.call_id },
        };
      case "function_call_output":
        return {
          role: "tool",
          kind: "tool",
          text: outputText(payload.output),
          extras: { kind: "tool_result", call_id: payload.call_id },
        };
      default:
        return null;
    }
  }

  return null;
}

export class CodexParser implements AgentParser {
  readonly name: ToolName = "codex";
  readonly displayName = "Codex";
  readonly basePath: string;

  private sessionRoots: string[];

  constructor(customBasePath?: string) {
    this.basePath = customBasePath ?? TOOL_PATHS.codex;
    this.sessionRoots = [
      join(this.basePath, "sessions"),
      join(this.basePath, "archived_sessions"),
    ];
  }

  async isAvailable(): Promise<boolean> {
    try {
      await stat(join(this.basePath, "sessions"));
      return true;
    } catch {
      return false;
    }
  }

  async listSessions(): Promise<SessionRef[]> {
    const sessions: SessionRef[] = [];
    for (const root of this.sessionRoots) {
      for await (const filePath of this.walkSessionTree(root)) {
        const ref = await this.readSessionRef(filePath);
        if (ref) sessions.push(ref);
      }
    }
    return sessions;
  }

  async *getTextUnits(session: SessionRef): AsyncGenerator<TextUnit> {
    for await (const line of this.iterateMessages(session.location)) {
      if (!line.message.text) continue;
      yield {
        session,
        unitId: sequenceId("line", line.lineNo),
        text: line.message.text,
        unitTime: line.timestamp,
        role: line.message.role,
        kind: line.message.kind,
      };
    }
  }

  async getSession(session: SessionRef): Promise<SessionContent | null> {
    const messages: ConversationMessage[] = [];
    for await (const line of this.iterateMessages(session.location)) {
      messages.push({
        role: line.message.role,
        content: line.message.text,
        timestamp: line.timestamp,
        extras: line.message.extras,
      });
    }
    if (messages.length === 0) return null;

    return {
      tool: "codex",
      sessionId: session.sessionId,
      startTime: session.startTime,
      lastUpdated: session.lastUpdated,
      cwd: session.cwd,
      messages,
    };
  }

  /**
   * Metadata pass over one rollout file. Priority: the session_meta event,
   * then the earliest/latest event timestamps, then the file mtime.
   */
  private async readSessionRef(filePath: string): Promise<SessionRef | null> {
    let mtime: Date;
    try {
      mtime = (await stat(filePath)).mtime;
    } catch {
      return null; // Removed since the directory listing
    }

    let meta: NonNullable<SessionEvent["payload"]> | undefined;
    let display: string | undefined;
    const eventTimes: Date[] = [];

    for await (const { value: event } of readJsonlLines<SessionEvent>(filePath)) {
      const ts = normalizeTimestamp(event.timestamp);
      if (ts) eventTimes.push(ts);

      if (!meta && event.type === "session_meta" && event.payload) {
        meta = event.payload;
        continue;
      }
      if (
        !display &&
        event.type === "event_msg" &&
        event.payload?.type === "user_message" &&
        event.payload.message &&
        isDisplayableMessage(event.payload.message)
      ) {
        display = event.payload.message.slice(0, 200);
      }
    }

    const file = basename(filePath);
    const sessionId = meta?.id || file.match(ROLLOUT_RE)?.[1] || file.replace(/\.jsonl$/, "");
    const { first, last } = timeBounds(eventTimes);

    return {
      tool: "codex",
      sessionId,
      startTime: optionalTimestamp(meta?.timestamp) ?? first,
      lastUpdated: last,
      fallbackTime: mtime,
      cwd: meta?.cwd,
      displayName: display,
      location: filePath,
    };
  }

  /**
   * Conversational lines of a rollout, in file order. Codex often logs the
   * same text twice (event_msg and response_item); a message identical to
   * the previous one with the same role is dropped.
   */
  private async *iterateMessages(filePath: string): AsyncGenerator<CodexLine> {
    let prev: CodexMessage | undefined;
    for await (const { lineNo, value: event } of readJsonlLines<SessionEvent>(filePath)) {
      const message = eventToMessage(event);
      if (!message) continue;
      if (
        prev &&
        message.kind === "content" &&
        prev.kind === "content" &&
        prev.role === message.role &&
        prev.text === message.text
      ) {
        continue;
      }
      prev = message;
      yield { lineNo, timestamp: optionalTimestamp(event.timestamp), message };
    }
  }

  private async *walkSessionTree(dirPath: string): AsyncGenerator<string> {
    let entries: string[];
    try {
      entries = (await readdir(dirPath)).sort();
    } catch {
      return;
    }

    for (const entry of entries) {
      const fullPath = join(dirPath, entry);
      if (entry.endsWith(".jsonl")) {
        yield fullPath;
        continue;
      }
      // Recurse into subdirectories (YYYY/MM/DD)
      try {
        const st = await stat(fullPath);
        if (st.isDirectory()) {
          yield* this.walkSessionTree(fullPath);
        }
      } catch {
        continue;
      }
    }
  }
}
