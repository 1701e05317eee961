import type Database from "better-sqlite3";
import { RecordInsertError } from "../../errors/AnalysisError.js";
import type { AnalysisStore } from "../AnalysisStore.js";
import type {
  ImportStatistics,
  NewMethod,
  RecordCounts,
} from "../Types.js";
import { recreateSchema } from "./sqliteSchema.utils.js";

interface IdRow {
  id: number;
}

interface CountRow {
  count: number;
}

const toFlag = (value: boolean): number => (value ? 1 : 0);

const isUniqueViolation = (error: unknown): boolean =>
  error instanceof Error &&
  "code" in error &&
  error.code === "SQLITE_CONSTRAINT_UNIQUE";

/**
 * Create an AnalysisStore backed by SQLite.
 *
 * Statements are prepared lazily: the tables they reference only exist
 * after recreateSchema().
 *
 * @param db - better-sqlite3 database instance
 * @returns AnalysisStore implementation
 */
export const createSqliteStore = (db: Database.Database): AnalysisStore => {
  const statements = new Map<string, Database.Statement>();

  const prepare = (sql: string): Database.Statement => {
    let stmt = statements.get(sql);
    if (stmt === undefined) {
      stmt = db.prepare(sql);
      statements.set(sql, stmt);
    }
    return stmt;
  };

  const insert = (sql: string, ...params: unknown[]): number =>
    Number(prepare(sql).run(...params).lastInsertRowid);

  const selectId = (sql: string, ...params: unknown[]): number | undefined => {
    const row = prepare(sql).get(...params) as IdRow | undefined;
    return row?.id;
  };

  const count = (table: string): number =>
    (prepare(`SELECT COUNT(*) AS count FROM ${table}`).get() as CountRow).count;

  return {
    recreateSchema(): void {
      // Cached statements point at the dropped tables
      statements.clear();
      recreateSchema(db);
    },

    insertSourceFile(file) {
      return insert(
        `INSERT INTO source_files (path, size_bytes, last_modified)
         VALUES (?, ?, ?)`,
        file.path,
        file.sizeBytes,
        file.lastModified,
      );
    },

    upsertImport(path, isInternal) {
      prepare(
        "INSERT OR IGNORE INTO imports (path, is_internal) VALUES (?, ?)",
      ).run(path, toFlag(isInternal));
      const id = selectId("SELECT id FROM imports WHERE path = ?", path);
      if (id === undefined) {
        throw new RecordInsertError(`import ${path}`, "not found after insert");
      }
      return id;
    },

    linkFileImport(fileId, importId) {
      prepare(
        `INSERT OR IGNORE INTO file_import_relations (file_id, import_id)
         VALUES (?, ?)`,
      ).run(fileId, importId);
    },

    insertDeclaredType(type) {
      return insert(
        `INSERT INTO declared_types
           (file_id, name, kind, import_count, is_used, widget_kind, framework_kind)
         VALUES (?, ?, ?, 0, 0, ?, ?)`,
        type.fileId,
        type.name,
        type.kind,
        type.widgetKind ?? null,
        type.frameworkKind ?? null,
      );
    },

    insertMethod(method: NewMethod) {
      try {
        return insert(
          `INSERT INTO methods (
             type_id, name, return_type, is_async, is_static,
             parameter_count, cyclomatic, cognitive, has_annotation
           ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
          method.typeId,
          method.name,
          method.returnType,
          toFlag(method.isAsync),
          toFlag(method.isStatic),
          method.parameterCount,
          method.cyclomatic,
          method.cognitive,
          toFlag(method.hasAnnotation),
        );
      } catch (e) {
        if (isUniqueViolation(e)) {
          throw new RecordInsertError(
            `method ${method.name}`,
            `type ${method.typeId} already declares a method with this name`,
            { cause: e },
          );
        }
        throw e;
      }
    },

    insertTypeRelation(relation) {
      prepare(
        `INSERT OR IGNORE INTO type_relations (source_type_id, target_type_name, kind)
         VALUES (?, ?, ?)`,
      ).run(relation.sourceTypeId, relation.targetTypeName, relation.kind);
    },

    insertTypeUsage(reference) {
      return insert(
        `INSERT INTO type_usage_references (
           referenced_type_id, source_file_id, source_type_id, source_method_id, kind
         ) VALUES (?, ?, ?, ?, ?)`,
        reference.referencedTypeId,
        reference.sourceFileId,
        reference.sourceTypeId ?? null,
        reference.sourceMethodId ?? null,
        reference.kind,
      );
    },

    insertMethodUsage(reference) {
      return insert(
        `INSERT INTO method_usage_references (
           referenced_method_id, source_file_id, source_type_id, source_method_id, is_direct_call
         ) VALUES (?, ?, ?, ?, ?)`,
        reference.referencedMethodId,
        reference.sourceFileId,
        reference.sourceTypeId ?? null,
        reference.sourceMethodId ?? null,
        toFlag(reference.isDirectCall),
      );
    },

    findTypeIdByName(name) {
      return selectId(
        "SELECT id FROM declared_types WHERE name = ? ORDER BY id LIMIT 1",
        name,
      );
    },

    findMethodIdByName(name) {
      return selectId(
        "SELECT id FROM methods WHERE name = ? ORDER BY id LIMIT 1",
        name,
      );
    },

    findMethodIdInType(typeId, name) {
      return selectId(
        "SELECT id FROM methods WHERE type_id = ? AND name = ?",
        typeId,
        name,
      );
    },

    listExternalImports() {
      return prepare(
        "SELECT id, path FROM imports WHERE is_internal = 0 ORDER BY id",
      ).all() as Array<{ id: number; path: string }>;
    },

    markPackageImports(importIds) {
      const stmt = prepare("UPDATE imports SET is_package = 1 WHERE id = ?");
      for (const id of importIds) {
        stmt.run(id);
      }
    },

    updateImportCounts() {
      prepare(`
        UPDATE declared_types
        SET import_count = (
          SELECT COUNT(DISTINCT r.import_id)
          FROM file_import_relations r
          WHERE r.file_id = declared_types.file_id
        )
      `).run();
    },

    updateUsageFlags() {
      prepare(`
        UPDATE declared_types
        SET is_used = CASE
          WHEN EXISTS (
            SELECT 1 FROM type_usage_references u
            WHERE u.referenced_type_id = declared_types.id
          ) OR EXISTS (
            SELECT 1 FROM type_relations tr
            WHERE tr.target_type_name = declared_types.name
              AND tr.source_type_id <> declared_types.id
          ) THEN 1
          ELSE 0
        END
      `).run();
    },

    countRecords(): RecordCounts {
      return {
        files: count("source_files"),
        imports: count("imports"),
        fileImports: count("file_import_relations"),
        types: count("declared_types"),
        methods: count("methods"),
        typeRelations: count("type_relations"),
        typeUsages: count("type_usage_references"),
        methodUsages: count("method_usage_references"),
      };
    },

    importStatistics(): ImportStatistics {
      const row = prepare(`
        SELECT
          COALESCE(SUM(is_internal), 0) AS internal,
          COALESCE(SUM(is_package), 0) AS package,
          COUNT(*) AS total
        FROM imports
      `).get() as ImportStatistics;
      return row;
    },

    transaction<T>(fn: () => T): T {
      return db.transaction(fn)();
    },
  };
};
