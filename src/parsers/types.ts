export const TOOL_NAMES = ["codex", "gemini-cli", "opencode", "cursor"] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export type MessageRole = "user" | "assistant" | "system" | "tool";

/** What a unit of text is: visible content, hidden reasoning, or tool traffic. */
export type UnitKind = "content" | "reasoning" | "tool";

export interface SessionRef {
  tool: ToolName;
  sessionId: string;
  startTime?: Date;
  lastUpdated?: Date;
  /** Adapter-reported fallback time (file or database modification time). */
  fallbackTime?: Date;
  cwd?: string;
  displayName?: string;
  /** Adapter-private handle: a file path, storage directory or database path. */
  location: string;
}

export interface TextUnit {
  session: SessionRef;
  unitId: string;
  text: string;
  unitTime?: Date;
  role?: MessageRole;
  kind: UnitKind;
}

export interface ConversationMessage {
  role: MessageRole;
  content: string;
  timestamp?: Date;
  extras: Record<string, unknown>;
}

export interface SessionContent {
  tool: ToolName;
  sessionId: string;
  startTime?: Date;
  lastUpdated?: Date;
  cwd?: string;
  messages: ConversationMessage[];
}

/**
 * A raw store entry that contains the query but carries no session
 * identity of its own. `ownerId` is whatever the entry's key says owns it.
 */
export interface FragmentHit {
  key: string;
  ownerId: string;
}

export interface AgentParser {
  readonly name: ToolName;
  readonly displayName: string;
  readonly basePath: string;

  isAvailable(): Promise<boolean>;

  listSessions(): Promise<SessionRef[]>;

  getTextUnits(session: SessionRef): AsyncGenerator<TextUnit>;

  getSession(session: SessionRef): Promise<SessionContent | null>;

  /** Find store entries containing `query` without assembling sessions. */
  locateFragments?(query: string): AsyncGenerator<FragmentHit>;

  /**
   * Pairs of (owner id, session id) taken from the store's own
   * enumeration. Sessions that appear in no pair have no fragments.
   */
  listFragmentOwners?(): AsyncGenerator<[string, string]>;

  /** Release whatever the parser holds open between calls. */
  close?(): Promise<void>;
}

export function sessionKey(ref: Pick<SessionRef, "tool" | "sessionId">): string {
  return `${ref.tool}:${ref.sessionId}`;
}

/** Zero-padded sequence so lexicographic unit order equals numeric order. */
export function sequenceId(prefix: string, n: number): string {
  return `${prefix}-${String(n).padStart(6, "0")}`;
}
