import { readFile } from "fs/promises";
import sqlJs from "sql.js";
import type { Database, SqlJsStatic, SqlValue } from "sql.js";

export type SqlRow = Record<string, SqlValue>;

let engine: Promise<SqlJsStatic> | undefined;

function loadEngine(): Promise<SqlJsStatic> {
  // CommonJS module; its init function is also exported as `default`
  if (!engine) engine = sqlJs.default();
  return engine;
}

/**
 * An in-memory copy of a SQLite file taken when it is opened. The tool
 * that owns the file can keep writing to it; nothing is written back.
 */
export class SqliteSnapshot {
  private constructor(
    readonly path: string,
    private db: Database,
  ) {}

  /** Throws when the file is missing or is not a SQLite database. */
  static async open(path: string): Promise<SqliteSnapshot> {
    const [SQL, bytes] = await Promise.all([loadEngine(), readFile(path)]);
    const snapshot = new SqliteSnapshot(path, new SQL.Database(bytes));
    try {
      snapshot.all("SELECT name FROM sqlite_master LIMIT 1");
    } catch (error) {
      snapshot.close();
      throw error;
    }
    return snapshot;
  }

  all(sql: string, params: SqlValue[] = []): SqlRow[] {
    const stmt = this.db.prepare(sql);
    try {
      stmt.bind(params);
      const rows: SqlRow[] = [];
      while (stmt.step()) rows.push(stmt.getAsObject());
      return rows;
    } finally {
      stmt.free();
    }
  }

  get(sql: string, params: SqlValue[] = []): SqlRow | undefined {
    return this.all(sql, params)[0];
  }

  hasTable(name: string): boolean {
    return this.get("SELECT 1 AS found FROM sqlite_master WHERE type = 'table' AND name = ?", [name]) !== undefined;
  }

  close(): void {
    this.db.close();
  }
}

/** Stored text of a SQLite value; BLOB columns hold UTF-8 JSON in the stores read here. */
export function sqlText(value: SqlValue | undefined): string | undefined {
  if (typeof value === "string") return value;
  if (value instanceof Uint8Array) return Buffer.from(value).toString("utf-8");
  return undefined;
}
