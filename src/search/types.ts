import type { SessionRef, MessageRole, UnitKind, ToolName } from "../parsers/types.js";

export const DATE_FIELDS = ["lastUpdated", "startTime", "fallback"] as const;

export type DateField = (typeof DATE_FIELDS)[number];

export const DEFAULT_DATE_PRIORITY: readonly DateField[] = ["lastUpdated", "startTime", "fallback"];

export interface MatchRecord {
  session: SessionRef;
  unitId: string;
  /** UTF-16 index of the match in the unit text. */
  offset: number;
  /** UTF-8 byte offset of the match in the unit text. */
  byteOffset: number;
  snippet: string;
  role?: MessageRole;
  kind: UnitKind;
}

export interface SessionCandidate {
  session: SessionRef;
  matchCount: number;
  matches: MatchRecord[];
  /** 1-based position in the presented list; 0 until ranked. */
  rank: number;
}

export interface SearchOptions {
  query: string;
  contextChars?: number;
  /** Stop scanning once this many sessions have at least one match. */
  maxResults?: number;
  datePriority?: readonly DateField[];
  signal?: AbortSignal;
}

export interface SearchStats {
  searchedTools: ToolName[];
  unavailableTools: ToolName[];
  sessionsScanned: number;
  unitsScanned: number;
  /** Fragment hits whose owner is not an enumerated session. */
  orphanReferences: number;
  /** True when maxResults ended the scan before every session was read. */
  truncated: boolean;
}

export interface SearchReport {
  candidates: SessionCandidate[];
  stats: SearchStats;
}
