import Database from "better-sqlite3";

export const defaultBusyTimeoutMs = 5000;

export interface OpenDatabaseOptions {
  busyTimeoutMs?: number;
  /** Opens an existing file without write access; a missing file is an error. */
  readonly?: boolean;
}

/**
 * Opens the target database with foreign key enforcement on, which is the
 * state every migration must leave the connection in.
 */
export function openDatabase(dbFilePath: string, options: OpenDatabaseOptions = {}): Database.Database {
  const readonly = options.readonly ?? false;
  const database = new Database(dbFilePath, { readonly, fileMustExist: readonly });
  database.pragma(`busy_timeout = ${options.busyTimeoutMs ?? defaultBusyTimeoutMs}`);
  database.exec("PRAGMA foreign_keys = ON;");
  return database;
}

export function readForeignKeysEnabled(database: Database.Database): boolean {
  return database.pragma("foreign_keys", { simple: true }) === 1;
}

export function listTableColumns(database: Database.Database, tableName: string): string[] {
  const rows = database
    .prepare("SELECT name FROM pragma_table_info(?) ORDER BY cid")
    .all(tableName) as Array<{ name: string }>;

  return rows.map((row) => row.name);
}

export function listExplicitIndexes(database: Database.Database, tableName: string): string[] {
  const rows = database
    .prepare(
      "SELECT name FROM sqlite_master WHERE type = 'index' AND tbl_name = ? COLLATE NOCASE AND sql IS NOT NULL ORDER BY name"
    )
    .all(tableName) as Array<{ name: string }>;

  return rows.map((row) => row.name);
}

export function tableExists(database: Database.Database, tableName: string): boolean {
  const row = database
    .prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name = ? COLLATE NOCASE")
    .get(tableName) as { name: string } | undefined;

  return row !== undefined;
}
