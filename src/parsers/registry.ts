import type { AgentParser, ToolName } from "./types.js";
import { CodexParser } from "./codex.js";
import { GeminiParser } from "./gemini.js";
import { OpenCodeParser } from "./opencode.js";
import { CursorParser } from "./cursor.js";

/** Storage roots supplied by the caller; unset entries use TOOL_PATHS. */
export type ToolRoots = Partial<Record<ToolName, string>>;

export function createParser(tool: ToolName, root?: string): AgentParser {
  switch (tool) {
    case "codex":
      return new CodexParser(root);
    case "gemini-cli":
      return new GeminiParser(root);
    case "opencode":
      return new OpenCodeParser(root);
    case "cursor":
      return new CursorParser(root);
  }
}

export function createParsers(tools: readonly ToolName[], roots: ToolRoots = {}): AgentParser[] {
  return tools.map((tool) => createParser(tool, roots[tool]));
}
