import type Database from "better-sqlite3";
import type { SourceFile } from "ts-morph";
import type { AnalyzerConfigInput } from "../config/Config.schemas.js";
import { defineConfig } from "../config/configLoader.utils.js";
import { createSqliteStore } from "../db/sqlite/createSqliteStore.js";
import {
  closeDatabase,
  openDatabase,
} from "../db/sqlite/sqliteConnection.utils.js";
import { silentLogger } from "../logging/SilentAnalyzerLogger.js";
import type { AnalysisSession, FileAnalysisContext } from "./AnalysisSession.js";
import { createSyntaxProject, parseSourceText } from "./parseSourceText.js";

export interface TestSession extends AnalysisSession {
  db: Database.Database;
  /** Record a file and parse its text, as the coordinator does */
  addFile(path: string, text: string): TestFile;
  close(): void;
}

export interface TestFile {
  ctx: FileAnalysisContext;
  sourceFile: SourceFile;
}

/**
 * Session over an in-memory database with a fresh schema, for pass-level tests.
 */
export const createTestSession = (
  config: AnalyzerConfigInput = {},
): TestSession => {
  const db = openDatabase({ path: ":memory:" });
  const store = createSqliteStore(db);
  store.recreateSchema();

  const session: AnalysisSession = {
    store,
    config: defineConfig(config),
    logger: silentLogger,
    project: createSyntaxProject(),
    skippedRecords: [],
  };

  return {
    ...session,
    db,
    addFile(path, text) {
      const sourceFile = parseSourceText(session.project, path, text);
      const fileId = store.insertSourceFile({
        path,
        sizeBytes: text.length,
        lastModified: "2024-01-01T00:00:00.000Z",
      });
      return {
        ctx: { ...session, fileId, filePath: path },
        sourceFile,
      };
    },
    close() {
      closeDatabase(db);
    },
  };
};
