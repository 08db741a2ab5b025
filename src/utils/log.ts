const GREEN = "\x1b[32m";
const YELLOW = "\x1b[33m";
const CYAN = "\x1b[36m";
const RED = "\x1b[31m";
const NC = "\x1b[0m";

/**
 * ANSI colour is used only on a real terminal that hasn't opted out via
 * NO_COLOR or TERM=dumb.
 */
export function useColor(stream: { isTTY?: boolean } = process.stderr): boolean {
  if (!stream.isTTY) return false;
  if (process.env.NO_COLOR !== undefined) return false;
  return (process.env.TERM ?? "").toLowerCase() !== "dumb";
}

function paint(code: string, text: string): string {
  return useColor() ? `${code}${text}${NC}` : text;
}

// Diagnostics go to stderr so stdout carries only the candidate list.
export function info(msg: string) { console.error(`${paint(CYAN, "i")} ${msg}`); }
export function ok(msg: string) { console.error(`${paint(GREEN, "✔")} ${msg}`); }
export function warn(msg: string) { console.error(`${paint(YELLOW, "⚠")} ${msg}`); }
export function err(msg: string) { console.error(`${paint(RED, "✘")} ${msg}`); }
