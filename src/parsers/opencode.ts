import { readdir, readFile, stat } from "fs/promises";
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
import { TOOL_PATHS } from "../utils/paths.js";
import { optionalTimestamp, toIso } from "../utils/time.js";

// --- Raw JSON shapes from OpenCode's flat-file storage ---

interface OcProject {
  id: string;
  worktree?: string;
  path?: string;
}

interface OcSession {
  id: string;
  slug?: string;
  projectID?: string;
  directory?: string;
  title?: string;
  time?: { created?: number; updated?: number };
}

interface OcMessage {
  id?: string;
  sessionID?: string;
  role?: string;
  time?: { created?: number; completed?: number };
  modelID?: string;
  providerID?: string;
  agent?: string;
  mode?: string;
  tokens?: Record<string, unknown>;
}

interface OcPart {
  id?: string;
  type?: string;
  text?: string;
  time?: { start?: number; end?: number; created?: number };
  metadata?: { subject?: string };
  tool?: string;
  callID?: string;
  state?: { status?: string };
}

interface AssembledMessage {
  id: string;
  meta: OcMessage;
  parts: OcPart[];
}

async function readJson<T>(path: string): Promise<T | undefined> {
  try {
    return JSON.parse(await readFile(path, "utf-8")) as T;
  } catch {
    // Missing (deleted mid-scan) or half-written fragments read as absent
    return undefined;
  }
}

/** `.json` entries of a directory, sorted; lexicographic order is chronological. */
async function listJsonFiles(dir: string): Promise<string[]> {
  try {
    return (await readdir(dir)).filter((f) => f.endsWith(".json")).sort();
  } catch {
    return [];
  }
}

async function listDirs(dir: string): Promise<string[]> {
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    return entries.filter((e) => e.isDirectory()).map((e) => e.name).sort();
  } catch {
    return [];
  }
}

async function mtimeOf(path: string): Promise<Date | undefined> {
  try {
    return (await stat(path)).mtime;
  } catch {
    return undefined;
  }
}

function roleOf(role: string | undefined): MessageRole {
  return role === "user" || role === "assistant" ? role : "system";
}

function partTime(part: OcPart): Date | undefined {
  return optionalTimestamp(part.time?.created ?? part.time?.start);
}

export class OpenCodeParser implements AgentParser {
  readonly name: ToolName = "opencode";
  readonly displayName = "OpenCode";
  readonly basePath: string;

  constructor(customBasePath?: string) {
    this.basePath = customBasePath ?? TOOL_PATHS.opencode;
  }

  async isAvailable(): Promise<boolean> {
    try {
      await stat(join(this.basePath, "session"));
      return true;
    } catch {
      return false;
    }
  }

  async listSessions(): Promise<SessionRef[]> {
    const projects = await this.buildProjectMap();
    const sessionRoot = join(this.basePath, "session");
    const sessions: SessionRef[] = [];

    for (const projectId of await listDirs(sessionRoot)) {
      const projectDir = join(sessionRoot, projectId);
      for (const file of await listJsonFiles(projectDir)) {
        const filePath = join(projectDir, file);
        const session = await readJson<OcSession>(filePath);
        if (!session) continue;

        const project = projects.get(session.projectID ?? projectId);
        sessions.push({
          tool: "opencode",
          sessionId: session.id || file.replace(/\.json$/, ""),
          startTime: optionalTimestamp(session.time?.created),
          lastUpdated: optionalTimestamp(session.time?.updated),
          fallbackTime: await mtimeOf(filePath),
          cwd: session.directory || project?.worktree || project?.path,
          displayName: session.title || session.slug,
          location: filePath,
        });
      }
    }

    return sessions;
  }

  /**
   * One content unit per message (its text parts joined) plus one
   * reasoning unit per reasoning part, so a hit inside hidden reasoning
   * is never reported as part of the visible reply.
   */
  async *getTextUnits(ref: SessionRef): AsyncGenerator<TextUnit> {
    for await (const message of this.iterateMessages(ref.sessionId)) {
      const unitTime = optionalTimestamp(message.meta.time?.created);
      const text = message.parts
        .filter((p) => p.type === "text" && typeof p.text === "string")
        .map((p) => p.text)
        .join("");

      if (text) {
        yield {
          session: ref,
          unitId: message.id,
          text,
          unitTime,
          role: roleOf(message.meta.role),
          kind: "content",
        };
      }

      for (const part of message.parts) {
        if (part.type !== "reasoning" || !part.text || !part.id) continue;
        yield {
          session: ref,
          unitId: `${message.id}:${part.id}`,
          text: part.text,
          unitTime: partTime(part) ?? unitTime,
          role: "system",
          kind: "reasoning",
        };
      }
    }
  }

  async getSession(ref: SessionRef): Promise<SessionContent | null> {
    const messages: ConversationMessage[] = [];

    for await (const message of this.iterateMessages(ref.sessionId)) {
      const { meta, parts } = message;
      const content = parts
        .filter((p) => p.type === "text" && typeof p.text === "string")
        .map((p) => p.text)
        .join("");

      const extras: Record<string, unknown> = {};
      if (meta.modelID) {
        extras.model = meta.providerID ? `${meta.providerID}/${meta.modelID}` : meta.modelID;
      }
      if (meta.agent ?? meta.mode) extras.agent = meta.agent ?? meta.mode;
      if (meta.tokens) extras.tokens = meta.tokens;

      const thoughts = parts
        .filter((p) => p.type === "reasoning" && p.text)
        .map((p) => ({
          subject: p.metadata?.subject ?? "Thinking",
          description: p.text,
          timestamp: toIso(partTime(p)),
        }));
      if (thoughts.length > 0) extras.thoughts = thoughts;

      const tools = parts
        .filter((p) => p.type === "tool" && p.tool)
        .map((p) => ({ tool: p.tool, call_id: p.callID ?? null, status: p.state?.status ?? null }));
      if (tools.length > 0) extras.tools = tools;

      messages.push({
        role: roleOf(meta.role),
        content,
        timestamp: optionalTimestamp(meta.time?.created),
        extras,
      });
    }

    if (messages.length === 0) return null;

    return {
      tool: "opencode",
      sessionId: ref.sessionId,
      startTime: ref.startTime,
      lastUpdated: ref.lastUpdated,
      cwd: ref.cwd,
      messages,
    };
  }

  /**
   * Walk message/<sessionID>/ in filename order, reading each message's
   * parts from part/<messageID>/ only when that message is reached.
   */
  private async *iterateMessages(sessionId: string): AsyncGenerator<AssembledMessage> {
    const messageDir = join(this.basePath, "message", sessionId);

    for (const file of await listJsonFiles(messageDir)) {
      const meta = await readJson<OcMessage>(join(messageDir, file));
      if (!meta) continue;
      const id = file.replace(/\.json$/, "");

      const partDir = join(this.basePath, "part", id);
      const parts: OcPart[] = [];
      for (const partFile of await listJsonFiles(partDir)) {
        const part = await readJson<OcPart>(join(partDir, partFile));
        if (part) parts.push({ ...part, id: part.id ?? partFile.replace(/\.json$/, "") });
      }

      yield { id, meta, parts };
    }
  }

  private async buildProjectMap(): Promise<Map<string, OcProject>> {
    const map = new Map<string, OcProject>();
    const projectDir = join(this.basePath, "project");
    for (const file of await listJsonFiles(projectDir)) {
      const project = await readJson<OcProject>(join(projectDir, file));
      if (project) map.set(project.id || file.replace(/\.json$/, ""), project);
    }
    return map;
  }
}
