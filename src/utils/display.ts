/**
 * Heuristic filter for choosing a display-worthy message.
 *
 * When parsers pick the first user message as a session's `displayName`,
 * some messages are injected context or turn bookkeeping rather than a
 * prompt. This helper identifies those so the caller can skip to a
 * better one.
 */

const NON_DISPLAYABLE_PREFIXES = [
  "<environment_context",
  "<user_instructions",
  "<turn_aborted",
  "/chat",
  "/resume",
];

/**
 * Returns `true` if `text` looks like a real user prompt suitable for
 * display: not an injected system message, and long enough to mean
 * something at a glance.
 */
export function isDisplayableMessage(text: string): boolean {
  const trimmed = text.trim();
  if (trimmed.length < 5) return false;

  const lower = trimmed.toLowerCase();
  for (const prefix of NON_DISPLAYABLE_PREFIXES) {
    if (lower.startsWith(prefix)) return false;
  }

  return true;
}

/** Collapse every whitespace run (newlines included) into one space. */
export function compactOneLine(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

export function truncate(text: string, maxLen: number): string {
  if (text.length <= maxLen) return text;
  return text.slice(0, maxLen - 1) + "…";
}
