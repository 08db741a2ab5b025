import { readdir, readFile, stat } from "fs/promises";
import { dirname, join } from "path";
import { fileURLToPath } from "url";
import type {
  AgentParser,
  ToolName,
  SessionRef,
  SessionContent,
  ConversationMessage,
  TextUnit,
  FragmentHit,
} from "./types.js";
import { sequenceId } from "./types.js";
import { TOOL_PATHS } from "../utils/paths.js";
import { optionalTimestamp } from "../utils/time.js";
import { SqliteSnapshot, sqlText } from "../utils/sqlite.js";
import { errorMessage } from "../errors.js";
import { warn } from "../utils/log.js";

/*
 * Cursor keeps conversations in two kinds of SQLite database.
 *
 * The global User/globalStorage/state.vscdb has a `cursorDiskKV` table
 * whose keys follow `{category}:{conversationId}[:{fragmentId}]`:
 *
 *   composerData:<composerId>             conversation root (metadata, maybe inline bubbles)
 *   bubbleId:<composerId>:<bubbleId>      one message of a conversation stored separately
 *
 * Each User/workspaceStorage/<workspaceId>/state.vscdb has an `ItemTable`
 * holding whole JSON documents under fixed keys: chat-panel tabs, the
 * workspace's composers with inline conversations, and the paired
 * prompt/generation lists. Those sessions are identified as
 * `ws:<workspaceId>:<chat|composer|prompt>:<item>`.
 */

const KV_TABLE = "cursorDiskKV";
const ITEM_TABLE = "ItemTable";
const ROOT_PREFIX = "composerData:";
const BUBBLE_PREFIX = "bubbleId:";

const CHAT_KEY = "workbench.panel.aichat.view.aichat.chatdata";
const COMPOSER_KEY = "composer.composerData";
const PROMPTS_KEY = "aiService.prompts";
const GENERATIONS_KEY = "aiService.generations";

const WORKSPACE_KINDS = ["chat", "composer", "prompt"] as const;
type WorkspaceKind = (typeof WORKSPACE_KINDS)[number];

interface Selection {
  uri?: { fsPath?: string };
  text?: string;
  rawText?: string;
  range?: unknown;
}

interface Bubble {
  bubbleId?: string;
  type?: number;
  text?: string;
  rawText?: string;
  createdAt?: number | string;
  timestamp?: number | string;
  context?: { selections?: Selection[] };
  codeBlocks?: unknown[];
  suggestedCodeBlocks?: unknown[];
  diffHistories?: unknown[];
  toolResults?: unknown[];
}

interface ComposerData {
  composerId?: string;
  name?: string;
  createdAt?: number;
  lastUpdatedAt?: number;
  status?: string;
  unifiedMode?: string;
  conversation?: unknown;
  fullConversationHeadersOnly?: { bubbleId?: string; type?: number }[];
}

interface KeyedBubble {
  key?: string;
  bubble: Bubble;
}

interface ChatBubble {
  type?: string;
  text?: string;
  rawText?: string;
  selections?: Selection[];
  suggestedDiffs?: unknown[];
}

interface ChatTab {
  tabId?: string;
  chatTitle?: string;
  bubbles?: unknown;
}

interface PromptEntry {
  text?: string;
  commandType?: number;
}

interface GenerationEntry {
  text?: string;
  message?: string;
}

interface WorkspaceItems {
  tabs: ChatTab[];
  composers: ComposerData[];
  prompts: unknown[];
  generations: unknown[];
}

function parseJson(text: string | undefined): unknown {
  if (text === undefined) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function parseObject<T extends object>(text: string | undefined): T | undefined {
  const parsed = parseJson(text);
  return parsed && typeof parsed === "object" && !Array.isArray(parsed) ? (parsed as T) : undefined;
}

/** The object elements of `value` when it is an array; anything else reads as empty. */
function objects<T extends object>(value: unknown): T[] {
  if (!Array.isArray(value)) return [];
  return value.filter((v): v is T => Boolean(v) && typeof v === "object" && !Array.isArray(v));
}

function objectAt<T extends object>(list: unknown[], index: number): T | undefined {
  const item = list[index];
  return item && typeof item === "object" && !Array.isArray(item) ? (item as T) : undefined;
}

/** Conversation id named by a root or bubble key, if the key follows the convention. */
export function ownerOfKey(key: string): string | undefined {
  if (key.startsWith(ROOT_PREFIX)) {
    return key.slice(ROOT_PREFIX.length) || undefined;
  }
  if (key.startsWith(BUBBLE_PREFIX)) {
    const [conversationId] = key.slice(BUBBLE_PREFIX.length).split(":");
    return conversationId || undefined;
  }
  return undefined;
}

export function workspaceSessionId(workspaceId: string, kind: WorkspaceKind, itemId: string): string {
  return `ws:${workspaceId}:${kind}:${itemId}`;
}

function isWorkspaceKind(value: string): value is WorkspaceKind {
  return WORKSPACE_KINDS.some((kind) => kind === value);
}

export function parseWorkspaceSessionId(
  sessionId: string,
): { workspaceId: string; kind: WorkspaceKind; itemId: string } | undefined {
  const match = /^ws:([^:]+):([a-z]+):(.+)$/.exec(sessionId);
  if (!match) return undefined;
  const [, workspaceId, kind, itemId] = match;
  return isWorkspaceKind(kind) ? { workspaceId, kind, itemId } : undefined;
}

function bubbleText(bubble: Bubble): string {
  return bubble.text || bubble.rawText || "";
}

function bubbleTime(bubble: Bubble): Date | undefined {
  return optionalTimestamp(bubble.createdAt ?? bubble.timestamp);
}

/**
 * Order separately stored bubbles: by the root's header list when it has
 * one, else by creation time when every bubble has one, else by key.
 */
export function orderBubbles(rows: KeyedBubble[], headers: ComposerData["fullConversationHeadersOnly"]): KeyedBubble[] {
  if (headers?.length) {
    const position = new Map<string, number>();
    headers.forEach((h, i) => {
      if (h.bubbleId && !position.has(h.bubbleId)) position.set(h.bubbleId, i);
    });
    const rank = (row: KeyedBubble) => {
      const id = row.bubble.bubbleId ?? row.key?.split(":").pop();
      return (id !== undefined ? position.get(id) : undefined) ?? Number.MAX_SAFE_INTEGER;
    };
    return [...rows].sort((a, b) => rank(a) - rank(b));
  }

  const times = rows.map((r) => bubbleTime(r.bubble));
  if (rows.length > 0 && times.every((t) => t !== undefined)) {
    return rows
      .map((row, i) => ({ row, t: times[i]?.getTime() ?? 0 }))
      .sort((a, b) => a.t - b.t)
      .map(({ row }) => row);
  }

  return rows;
}

function selectionsOf(selections: Selection[] | undefined): { file: string; code: string; range: unknown }[] {
  const result: { file: string; code: string; range: unknown }[] = [];
  for (const sel of objects<Selection>(selections)) {
    const file = sel.uri?.fsPath;
    if (!file) continue;
    result.push({ file, code: sel.text ?? sel.rawText ?? "", range: sel.range ?? null });
  }
  return result;
}

function bubbleMessage({ key, bubble }: KeyedBubble): ConversationMessage {
  const extras: Record<string, unknown> = {};
  const bubbleId = bubble.bubbleId ?? key?.split(":").pop();
  if (bubbleId) extras.bubble_id = bubbleId;

  if (bubble.type === 1) {
    const ctx = selectionsOf(bubble.context?.selections);
    if (ctx.length > 0) extras.code_context = ctx;
  } else {
    if (bubble.codeBlocks?.length) extras.code_blocks = bubble.codeBlocks;
    if (bubble.suggestedCodeBlocks?.length) extras.suggested_code_blocks = bubble.suggestedCodeBlocks;
    if (bubble.diffHistories?.length) extras.diff_histories = bubble.diffHistories;
    if (bubble.toolResults?.length) extras.tool_results = bubble.toolResults;
  }

  return {
    role: bubble.type === 1 ? "user" : "assistant",
    content: bubbleText(bubble),
    timestamp: bubbleTime(bubble),
    extras,
  };
}

/** Chat-panel bubbles name their author as a string (`user` or `ai`). */
function chatMessage(bubble: ChatBubble): ConversationMessage {
  const extras: Record<string, unknown> = {};
  const ctx = selectionsOf(bubble.selections);
  if (ctx.length > 0) extras.code_context = ctx;
  if (bubble.suggestedDiffs?.length) extras.suggested_diffs = bubble.suggestedDiffs;
  return {
    role: bubble.type === "user" ? "user" : "assistant",
    content: bubble.rawText ?? bubble.text ?? "",
    extras,
  };
}

function promptMessages(items: WorkspaceItems, index: number): ConversationMessage[] {
  const messages: ConversationMessage[] = [];
  const prompt = objectAt<PromptEntry>(items.prompts, index);
  if (prompt) {
    const extras: Record<string, unknown> = {};
    if (prompt.commandType !== undefined) extras.command_type = prompt.commandType;
    messages.push({ role: "user", content: prompt.text ?? "", extras });
  }
  const generation = objectAt<GenerationEntry>(items.generations, index);
  if (generation) {
    messages.push({ role: "assistant", content: generation.text ?? generation.message ?? "", extras: {} });
  }
  return messages;
}

function chatTabs(items: WorkspaceItems): (ChatTab & { tabId: string })[] {
  return items.tabs.filter((t): t is ChatTab & { tabId: string } => typeof t.tabId === "string" && t.tabId !== "");
}

function workspaceComposers(items: WorkspaceItems): (ComposerData & { composerId: string })[] {
  return items.composers.filter(
    (c): c is ComposerData & { composerId: string } => typeof c.composerId === "string" && c.composerId !== "",
  );
}

async function statOf(path: string) {
  try {
    return await stat(path);
  } catch {
    return undefined;
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

/** Project folder recorded in a workspace's workspace.json, when it is a local path. */
async function workspaceFolder(workspaceDir: string): Promise<string | undefined> {
  let raw: string;
  try {
    raw = await readFile(join(workspaceDir, "workspace.json"), "utf-8");
  } catch {
    return undefined;
  }
  const folder = parseObject<{ folder?: unknown }>(raw)?.folder;
  if (typeof folder !== "string" || !folder.startsWith("file:")) return undefined;
  try {
    return fileURLToPath(folder);
  } catch {
    return undefined;
  }
}

/** A database that cannot be opened is reported and reads as absent. */
async function openSnapshot(path: string): Promise<SqliteSnapshot | undefined> {
  try {
    return await SqliteSnapshot.open(path);
  } catch (error) {
    warn(`Cursor database ${path} could not be read: ${errorMessage(error)}`);
    return undefined;
  }
}

export class CursorParser implements AgentParser {
  readonly name: ToolName = "cursor";
  readonly displayName = "Cursor";
  readonly basePath: string;
  readonly workspaceRoot: string;

  /** Global key-value store, loaded once and kept until close(). */
  private store?: Promise<SqliteSnapshot | undefined>;

  /**
   * `customDbPath` is the global state.vscdb; workspace databases are
   * looked for in the workspaceStorage directory beside its parent
   * unless `customWorkspaceRoot` says otherwise.
   */
  constructor(customDbPath?: string, customWorkspaceRoot?: string) {
    this.basePath = customDbPath ?? TOOL_PATHS.cursor;
    this.workspaceRoot = customWorkspaceRoot ?? join(dirname(dirname(this.basePath)), "workspaceStorage");
  }

  async isAvailable(): Promise<boolean> {
    const [db, workspaces] = await Promise.all([statOf(this.basePath), statOf(this.workspaceRoot)]);
    return Boolean(db?.isFile() || workspaces?.isDirectory());
  }

  async listSessions(): Promise<SessionRef[]> {
    return [...(await this.listGlobalSessions()), ...(await this.listWorkspaceSessions())];
  }

  async *getTextUnits(ref: SessionRef): AsyncGenerator<TextUnit> {
    const messages = await this.loadMessages(ref);
    for (let i = 0; i < messages.length; i++) {
      const { content, timestamp, role } = messages[i];
      if (!content) continue;
      yield {
        session: ref,
        unitId: sequenceId("b", i),
        text: content,
        unitTime: timestamp,
        role,
        kind: "content",
      };
    }
  }

  async getSession(ref: SessionRef): Promise<SessionContent | null> {
    const messages = await this.loadMessages(ref);
    if (messages.length === 0) return null;

    return {
      tool: "cursor",
      sessionId: ref.sessionId,
      startTime: ref.startTime,
      lastUpdated: ref.lastUpdated,
      cwd: ref.cwd,
      messages,
    };
  }

  /**
   * Root and bubble keys of the global store whose value contains the
   * query, either as written or in its JSON-escaped form (values are
   * serialized JSON).
   */
  async *locateFragments(query: string): AsyncGenerator<FragmentHit> {
    if (!query) return;
    const db = await this.kvStore();
    if (!db) return;

    const escaped = JSON.stringify(query).slice(1, -1);
    const rows = db.all(
      `SELECT key FROM ${KV_TABLE}
       WHERE (substr(key, 1, ${ROOT_PREFIX.length}) = ? OR substr(key, 1, ${BUBBLE_PREFIX.length}) = ?)
         AND value IS NOT NULL
         AND (instr(value, ?) > 0 OR instr(value, ?) > 0)
       ORDER BY key`,
      [ROOT_PREFIX, BUBBLE_PREFIX, query, escaped],
    );

    for (const { key } of rows) {
      const ownerId = typeof key === "string" ? ownerOfKey(key) : undefined;
      if (typeof key === "string" && ownerId) yield { key, ownerId };
    }
  }

  /**
   * Each `composerData:` root owns the bubbles stored under its id, and its
   * session carries that id. Read from keys alone; workspace sessions have
   * no fragments and are never listed.
   */
  async *listFragmentOwners(): AsyncGenerator<[string, string]> {
    const db = await this.kvStore();
    if (!db) return;
    const rows = db.all(`SELECT key FROM ${KV_TABLE} WHERE substr(key, 1, ${ROOT_PREFIX.length}) = ? ORDER BY key`, [
      ROOT_PREFIX,
    ]);
    for (const { key } of rows) {
      const composerId = typeof key === "string" ? ownerOfKey(key) : undefined;
      if (composerId) yield [composerId, composerId];
    }
  }

  async close(): Promise<void> {
    const pending = this.store;
    this.store = undefined;
    (await pending)?.close();
  }

  private async listGlobalSessions(): Promise<SessionRef[]> {
    const db = await this.kvStore();
    if (!db) return [];
    const mtime = (await statOf(this.basePath))?.mtime;

    const sessions: SessionRef[] = [];
    for (const row of db.all(`SELECT key, value FROM ${KV_TABLE} WHERE substr(key, 1, ${ROOT_PREFIX.length}) = ? ORDER BY key`, [
      ROOT_PREFIX,
    ])) {
      const composerId = typeof row.key === "string" ? ownerOfKey(row.key) : undefined;
      const data = parseObject<ComposerData>(sqlText(row.value));
      if (!data || !composerId) continue;
      sessions.push({
        tool: "cursor",
        sessionId: composerId,
        startTime: optionalTimestamp(data.createdAt),
        lastUpdated: optionalTimestamp(data.lastUpdatedAt),
        fallbackTime: mtime,
        displayName: data.name,
        location: this.basePath,
      });
    }
    return sessions;
  }

  private async listWorkspaceSessions(): Promise<SessionRef[]> {
    const sessions: SessionRef[] = [];

    for (const workspaceId of await listDirs(this.workspaceRoot)) {
      if (workspaceId === "ext-dev") continue;
      const workspaceDir = join(this.workspaceRoot, workspaceId);
      const dbPath = join(workspaceDir, "state.vscdb");
      const mtime = (await statOf(dbPath))?.mtime;
      if (!mtime) continue;
      const items = await this.readWorkspace(dbPath);
      if (!items) continue;

      const base: Omit<SessionRef, "sessionId"> = {
        tool: "cursor",
        fallbackTime: mtime,
        cwd: await workspaceFolder(workspaceDir),
        location: dbPath,
      };

      for (const tab of chatTabs(items)) {
        sessions.push({
          ...base,
          sessionId: workspaceSessionId(workspaceId, "chat", tab.tabId),
          displayName: tab.chatTitle,
        });
      }
      for (const composer of workspaceComposers(items)) {
        sessions.push({
          ...base,
          sessionId: workspaceSessionId(workspaceId, "composer", composer.composerId),
          startTime: optionalTimestamp(composer.createdAt),
          lastUpdated: optionalTimestamp(composer.lastUpdatedAt),
          displayName: composer.name,
        });
      }
      const pairs = Math.max(items.prompts.length, items.generations.length);
      for (let i = 0; i < pairs; i++) {
        if (promptMessages(items, i).length === 0) continue;
        sessions.push({ ...base, sessionId: workspaceSessionId(workspaceId, "prompt", String(i)) });
      }
    }

    return sessions;
  }

  private async loadMessages(ref: SessionRef): Promise<ConversationMessage[]> {
    const workspace = parseWorkspaceSessionId(ref.sessionId);
    if (!workspace) {
      return (await this.loadBubbles(ref.sessionId)).map(bubbleMessage);
    }

    const items = await this.readWorkspace(ref.location);
    if (!items) return [];
    const { kind, itemId } = workspace;

    switch (kind) {
      case "chat": {
        const tab = chatTabs(items).find((t) => t.tabId === itemId);
        return objects<ChatBubble>(tab?.bubbles).map(chatMessage);
      }
      case "composer": {
        const composer = workspaceComposers(items).find((c) => c.composerId === itemId);
        return objects<Bubble>(composer?.conversation).map((bubble) => bubbleMessage({ bubble }));
      }
      case "prompt":
        return /^\d+$/.test(itemId) ? promptMessages(items, Number(itemId)) : [];
    }
  }

  private async loadBubbles(composerId: string): Promise<KeyedBubble[]> {
    const db = await this.kvStore();
    if (!db) return [];

    const rootRow = db.get(`SELECT value FROM ${KV_TABLE} WHERE key = ?`, [`${ROOT_PREFIX}${composerId}`]);
    const root = parseObject<ComposerData>(sqlText(rootRow?.value));
    if (!root) return [];

    const inline = objects<Bubble>(root.conversation);
    if (inline.length > 0) {
      return inline.map((bubble) => ({ bubble }));
    }

    const prefix = `${BUBBLE_PREFIX}${composerId}:`;
    const rows = db.all(
      `SELECT key, value FROM ${KV_TABLE}
       WHERE substr(key, 1, length(?)) = ? AND value IS NOT NULL
       ORDER BY key`,
      [prefix, prefix],
    );

    const parsed: KeyedBubble[] = [];
    for (const row of rows) {
      const bubble = parseObject<Bubble>(sqlText(row.value));
      if (bubble && typeof row.key === "string") parsed.push({ key: row.key, bubble });
    }
    return orderBubbles(parsed, root.fullConversationHeadersOnly);
  }

  private kvStore(): Promise<SqliteSnapshot | undefined> {
    if (!this.store) this.store = this.openKvStore();
    return this.store;
  }

  private async openKvStore(): Promise<SqliteSnapshot | undefined> {
    if (!(await statOf(this.basePath))?.isFile()) return undefined;
    const db = await openSnapshot(this.basePath);
    if (db && !db.hasTable(KV_TABLE)) {
      db.close();
      return undefined;
    }
    return db;
  }

  /** The four workspace documents, read from a snapshot that is closed straight away. */
  private async readWorkspace(dbPath: string): Promise<WorkspaceItems | undefined> {
    const db = await openSnapshot(dbPath);
    if (!db) return undefined;
    try {
      if (!db.hasTable(ITEM_TABLE)) return undefined;
      const item = (key: string): unknown =>
        parseJson(sqlText(db.get(`SELECT value FROM ${ITEM_TABLE} WHERE key = ?`, [key])?.value));

      const chat = item(CHAT_KEY);
      const composers = item(COMPOSER_KEY);
      const prompts = item(PROMPTS_KEY);
      const generations = item(GENERATIONS_KEY);
      return {
        tabs: objects<ChatTab>(chat && typeof chat === "object" && "tabs" in chat ? chat.tabs : undefined),
        composers: objects<ComposerData>(
          composers && typeof composers === "object" && "allComposers" in composers ? composers.allComposers : undefined,
        ),
        prompts: Array.isArray(prompts) ? prompts : [],
        generations: Array.isArray(generations) ? generations : [],
      };
    } finally {
      db.close();
    }
  }
}
