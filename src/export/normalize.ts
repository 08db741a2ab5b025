import type { ConversationMessage, SessionContent } from "../parsers/types.js";
import { toIso } from "../utils/time.js";
import type { ExportDocument, NormalizedMessage } from "./schema.js";

export function normalizeMessage(message: ConversationMessage): NormalizedMessage {
  return {
    role: message.role,
    content: message.content,
    timestamp: toIso(message.timestamp),
    extras: message.extras,
  };
}

/** One tool's session content in the shared export shape. */
export function normalizeSession(content: SessionContent): ExportDocument {
  return {
    source: content.tool,
    session_id: content.sessionId,
    start_time: toIso(content.startTime),
    last_updated: toIso(content.lastUpdated),
    cwd: content.cwd ?? null,
    messages: content.messages.map(normalizeMessage),
  };
}
