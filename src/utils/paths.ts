import { homedir, platform } from "os";
import { join } from "path";
import type { ToolName } from "../parsers/types.js";

export function expandHome(p: string): string {
  return p.startsWith("~") ? join(homedir(), p.slice(1)) : p;
}

/** Replace the home directory prefix with `~` for display. */
export function tildeify(p: string): string {
  const home = homedir();
  if (!home || !p) return p;
  return p.split(home).join("~");
}

function cursorUserDir(home: string): string {
  switch (platform()) {
    case "darwin":
      return join(home, "Library", "Application Support", "Cursor", "User");
    case "win32":
      return join(process.env.APPDATA || join(home, "AppData", "Roaming"), "Cursor", "User");
    default:
      return join(process.env.XDG_CONFIG_HOME || join(home, ".config"), "Cursor", "User");
  }
}

/**
 * Resolve the storage root for each tool, respecting env var overrides.
 *
 * - CODEX_HOME           → replaces ~/.codex directly
 * - GEMINI_CLI_HOME      → sets parent dir; .gemini is created inside
 * - OPENCODE_STORAGE_DIR → replaces the opencode storage dir directly
 * - XDG_DATA_HOME        → parent of opencode/storage when the above is unset
 * - CURSOR_STATE_DB      → path of Cursor's global state.vscdb
 */
function resolveToolPaths(): Record<ToolName, string> {
  const home = homedir();

  const codex = process.env.CODEX_HOME || join(home, ".codex");

  const geminiParent = process.env.GEMINI_CLI_HOME || home;
  const gemini = join(geminiParent, ".gemini");

  const dataHome = process.env.XDG_DATA_HOME || join(home, ".local", "share");
  const opencode = process.env.OPENCODE_STORAGE_DIR || join(dataHome, "opencode", "storage");

  const cursor =
    process.env.CURSOR_STATE_DB || join(cursorUserDir(home), "globalStorage", "state.vscdb");

  return {
    codex,
    "gemini-cli": gemini,
    opencode,
    cursor,
  };
}

export const TOOL_PATHS = resolveToolPaths();
