import { rename, rm, writeFile } from "fs/promises";
import { join } from "path";
import type { AgentParser, SessionRef } from "../parsers/types.js";
import { ExportWriteError, errorMessage } from "../errors.js";
import { warn } from "../utils/log.js";
import { normalizeSession } from "./normalize.js";
import { ExportDocument } from "./schema.js";

/**
 * `<source>_<session id>.json`, with anything outside `[A-Za-z0-9._-]`
 * in the id replaced by `_`. Re-exporting a session overwrites its file.
 */
export function exportFileName(doc: Pick<ExportDocument, "source" | "session_id">): string {
  return `${doc.source}_${doc.session_id.replace(/[^A-Za-z0-9._-]/g, "_")}.json`;
}

export function serializeExport(doc: ExportDocument): string {
  return JSON.stringify(doc, null, 2) + "\n";
}

/**
 * Validate, serialize and write `doc` into `dir`. The document is written
 * to a temporary sibling first and renamed over the target, so the target
 * either holds the complete document or is left untouched.
 */
export async function writeExport(doc: ExportDocument, dir: string): Promise<string> {
  const target = join(dir, exportFileName(doc));
  const tmp = join(dir, `.${exportFileName(doc)}.${process.pid}.tmp`);

  try {
    const body = serializeExport(ExportDocument.parse(doc));
    await writeFile(tmp, body, "utf-8");
    await rename(tmp, target);
  } catch (error) {
    await rm(tmp, { force: true }).catch((cleanupError: unknown) =>
      warn(`Could not remove ${tmp}: ${errorMessage(cleanupError)}`),
    );
    throw new ExportWriteError(target, error);
  }

  return target;
}

/** Load the chosen session from its own parser and write it out. */
export async function exportSession(
  parser: AgentParser,
  session: SessionRef,
  dir: string,
): Promise<string> {
  const content = await parser.getSession(session);
  if (!content) {
    const target = join(dir, exportFileName({ source: session.tool, session_id: session.sessionId }));
    throw new ExportWriteError(
      target,
      new Error(`${parser.displayName} session ${session.sessionId} could not be loaded`),
    );
  }
  return writeExport(normalizeSession(content), dir);
}
