import type { AgentParser, FragmentHit, SessionRef } from "../parsers/types.js";

/**
 * Reverse index from a fragment's owner id to the session that owns it,
 * built from the parser's own enumeration and never from fragment content.
 * Built once per run, only for parsers that are actually searched.
 *
 * A parser that lists its fragment owners may also enumerate sessions with
 * no fragments at all; those are not covered and must be scanned whole.
 */
export class SessionResolver {
  private owners = new Map<string, SessionRef>();
  private covered = new Set<SessionRef>();
  private orphans = 0;

  private constructor(readonly tool: AgentParser["name"]) {}

  static async build(parser: AgentParser, sessions: SessionRef[]): Promise<SessionResolver> {
    const resolver = new SessionResolver(parser.name);
    const byId = new Map(sessions.map((s) => [s.sessionId, s]));

    if (parser.listFragmentOwners) {
      for await (const [ownerId, sessionId] of parser.listFragmentOwners()) {
        const session = byId.get(sessionId);
        if (session) resolver.owners.set(ownerId, session);
      }
    } else {
      for (const [id, session] of byId) resolver.owners.set(id, session);
    }
    for (const session of resolver.owners.values()) resolver.covered.add(session);

    return resolver;
  }

  get size(): number {
    return this.owners.size;
  }

  /** Whether fragment hits can vouch for `session`. */
  covers(session: SessionRef): boolean {
    return this.covered.has(session);
  }

  /** Fragments seen by resolve() that matched no enumerated session. */
  get orphanCount(): number {
    return this.orphans;
  }

  /**
   * The owning session, or undefined for an orphan. Orphans are expected
   * while the live tool is writing its store, so they are only counted.
   */
  resolve(hit: FragmentHit): SessionRef | undefined {
    const session = this.owners.get(hit.ownerId);
    if (!session) this.orphans++;
    return session;
  }
}
