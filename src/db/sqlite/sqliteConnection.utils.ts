import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";

export interface SqliteConnectionOptions {
  /** Path to the database file. Use ':memory:' for in-memory database. */
  path: string;
}

/**
 * Open or create a SQLite database connection.
 * The schema is created by recreateSchema at the start of each run.
 *
 * @param options - Connection options
 * @returns Database instance with foreign keys enforced
 */
export const openDatabase = (
  options: SqliteConnectionOptions,
): Database.Database => {
  const { path } = options;

  // Ensure parent directory exists (unless in-memory)
  if (path !== ":memory:") {
    const dir = dirname(path);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  const db = new Database(path);

  db.pragma("journal_mode = WAL");
  db.pragma("synchronous = NORMAL");
  db.pragma("foreign_keys = ON");

  return db;
};

/**
 * Close the database connection.
 *
 * @param db - Database instance to close
 */
export const closeDatabase = (db: Database.Database): void => {
  db.close();
};
