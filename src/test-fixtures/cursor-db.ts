import sqlJs from "sql.js";
import { mkdirSync, readFileSync, writeFileSync } from "fs";
import { join, dirname } from "path";
import { fileURLToPath } from "url";

const __dirname = dirname(fileURLToPath(import.meta.url));

function readEntries(file: string): Record<string, unknown> {
  return JSON.parse(readFileSync(join(__dirname, "cursor", file), "utf-8")) as Record<string, unknown>;
}

/** Key-value rows of the Cursor fixture, as stored in `cursorDiskKV`. */
function cursorFixtureEntries(): Record<string, unknown> {
  return readEntries("entries.json");
}

/**
 * Write a state.vscdb-shaped database at `dbPath` with one key-value
 * table. Values are stored the way Cursor stores them: serialized JSON.
 */
async function writeKvDb(dbPath: string, table: string, entries: Record<string, unknown>): Promise<string> {
  const SQL = await sqlJs.default();
  const db = new SQL.Database();
  try {
    db.run(`CREATE TABLE ${table} (key TEXT UNIQUE ON CONFLICT REPLACE, value BLOB)`);
    for (const [key, value] of Object.entries(entries)) {
      db.run(`INSERT INTO ${table} (key, value) VALUES (?, ?)`, [key, JSON.stringify(value)]);
    }
    mkdirSync(dirname(dbPath), { recursive: true });
    writeFileSync(dbPath, db.export());
  } finally {
    db.close();
  }
  return dbPath;
}

export function createCursorDb(
  dbPath: string,
  entries: Record<string, unknown> = cursorFixtureEntries(),
): Promise<string> {
  return writeKvDb(dbPath, "cursorDiskKV", entries);
}

export interface CursorStorage {
  globalDb: string;
  workspaceRoot: string;
  workspaceDb: string;
}

/**
 * A Cursor `User` directory under `root`: the global store plus one
 * workspace (`ws-alpha`, folder /home/dev/app) with chat, composer and
 * prompt/generation documents in its ItemTable.
 */
export async function createCursorStorage(root: string): Promise<CursorStorage> {
  const user = join(root, "User");
  const workspaceRoot = join(user, "workspaceStorage");
  const workspaceDir = join(workspaceRoot, "ws-alpha");

  const globalDb = await createCursorDb(join(user, "globalStorage", "state.vscdb"));
  const workspaceDb = await writeKvDb(join(workspaceDir, "state.vscdb"), "ItemTable", readEntries("workspace-items.json"));
  writeFileSync(join(workspaceDir, "workspace.json"), JSON.stringify({ folder: "file:///home/dev/app" }));

  return { globalDb, workspaceRoot, workspaceDb };
}
