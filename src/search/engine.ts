import type { AgentParser, SessionRef } from "../parsers/types.js";
import { sessionKey } from "../parsers/types.js";
import type { MatchRecord, SearchOptions, SearchReport, SearchStats } from "./types.js";
import { DEFAULT_DATE_PRIORITY } from "./types.js";
import { DEFAULT_CONTEXT_CHARS, scanUnit } from "./scanner.js";
import { SessionResolver } from "./resolver.js";
import { aggregate } from "./aggregator.js";
import { newestFirst, rankCandidates } from "./ranker.js";
import { InvalidConfigError, StorageUnavailableError, errorMessage } from "../errors.js";
import { warn } from "../utils/log.js";

interface ScanEntry {
  parser: AgentParser;
  session: SessionRef;
}

/**
 * Literal search across every selected tool's session store.
 *
 * Sessions of all available parsers are enumerated first, then scanned
 * most recent first, one at a time, with text units pulled lazily from
 * the parser; `maxResults` therefore keeps the freshest matching
 * sessions. Sessions a parser can address by raw fragment (Cursor's
 * key-value rows) are narrowed first: fragment hits go through a
 * SessionResolver and only the owning sessions are scanned.
 */
export class SearchEngine {
  private parsers: AgentParser[] = [];

  constructor(parsers: AgentParser[]) {
    this.parsers = parsers;
  }

  async search(options: SearchOptions): Promise<SearchReport> {
    const { query, signal } = options;
    if (!query) throw new InvalidConfigError("Query must not be empty");

    const contextChars = options.contextChars ?? DEFAULT_CONTEXT_CHARS;
    const stats: SearchStats = {
      searchedTools: [],
      unavailableTools: [],
      sessionsScanned: 0,
      unitsScanned: 0,
      orphanReferences: 0,
      truncated: false,
    };

    const available: AgentParser[] = [];
    for (const parser of this.parsers) {
      if (await parser.isAvailable()) {
        available.push(parser);
        stats.searchedTools.push(parser.name);
      } else {
        warn(`${parser.displayName} storage not found at ${parser.basePath}, skipping`);
        stats.unavailableTools.push(parser.name);
      }
    }
    if (available.length === 0 && this.parsers.length > 0) {
      throw new StorageUnavailableError(stats.unavailableTools);
    }

    const priority = options.datePriority ?? DEFAULT_DATE_PRIORITY;
    try {
      const queue: ScanEntry[] = [];
      for (const parser of available) {
        signal?.throwIfAborted();
        try {
          for (const session of await this.sessionsToScan(parser, query, stats)) {
            queue.push({ parser, session });
          }
        } catch (error) {
          if (signal?.aborted) throw error;
          warn(`Error listing ${parser.displayName} sessions: ${errorMessage(error)}`);
        }
      }

      const matches: MatchRecord[] = [];
      const matchedSessions = new Set<string>();

      for (const { parser, session } of newestFirst(queue, priority)) {
        if (options.maxResults !== undefined && matchedSessions.size >= options.maxResults) {
          stats.truncated = true;
          break;
        }
        signal?.throwIfAborted();
        stats.sessionsScanned++;

        try {
          for await (const unit of parser.getTextUnits(session)) {
            signal?.throwIfAborted();
            stats.unitsScanned++;
            const found = scanUnit(unit, query, contextChars);
            if (found.length === 0) continue;
            matches.push(...found);
            matchedSessions.add(sessionKey(session));
          }
        } catch (error) {
          if (signal?.aborted) throw error;
          warn(
            `Error reading ${parser.displayName} session ${session.sessionId}: ${errorMessage(error)}`,
          );
        }
      }

      return { candidates: rankCandidates(aggregate(matches), priority), stats };
    } finally {
      for (const parser of available) await parser.close?.();
    }
  }

  /**
   * Every enumerated session, minus the fragment-addressable ones that own
   * no hit, in enumeration order.
   */
  private async sessionsToScan(
    parser: AgentParser,
    query: string,
    stats: SearchStats,
  ): Promise<SessionRef[]> {
    const sessions = await parser.listSessions();
    if (!parser.locateFragments) return sessions;

    const resolver = await SessionResolver.build(parser, sessions);
    const owning = new Set<string>();
    for await (const hit of parser.locateFragments(query)) {
      const session = resolver.resolve(hit);
      if (session) owning.add(sessionKey(session));
    }
    stats.orphanReferences += resolver.orphanCount;

    return sessions.filter((s) => !resolver.covers(s) || owning.has(sessionKey(s)));
  }
}
