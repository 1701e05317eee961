import type Database from "better-sqlite3";
import { SchemaInitError } from "../../errors/AnalysisError.js";
import { setDbSchemaVersion } from "../versions.js";

/**
 * SQLite schema for the analysis store.
 *
 * Tables:
 * - source_files, imports, file_import_relations: file layer
 * - declared_types, methods, type_relations: structure layer
 * - type_usage_references, method_usage_references: usage layer
 *
 * The store is rebuilt on every run, so there are no migrations.
 */

const TABLES = [
  `CREATE TABLE source_files (
    id INTEGER PRIMARY KEY,
    path TEXT NOT NULL,
    size_bytes INTEGER NOT NULL,
    last_modified TEXT NOT NULL
  )`,
  `CREATE TABLE imports (
    id INTEGER PRIMARY KEY,
    path TEXT NOT NULL UNIQUE,
    is_internal INTEGER NOT NULL DEFAULT 0,
    is_package INTEGER NOT NULL DEFAULT 0
  )`,
  `CREATE TABLE file_import_relations (
    id INTEGER PRIMARY KEY,
    file_id INTEGER NOT NULL REFERENCES source_files(id),
    import_id INTEGER NOT NULL REFERENCES imports(id),
    UNIQUE(file_id, import_id)
  )`,
  `CREATE TABLE declared_types (
    id INTEGER PRIMARY KEY,
    file_id INTEGER NOT NULL REFERENCES source_files(id),
    name TEXT NOT NULL,
    kind TEXT NOT NULL DEFAULT 'class'
      CHECK(kind IN ('class', 'abstract', 'mixin', 'interface', 'enum')),
    import_count INTEGER NOT NULL DEFAULT 0,
    is_used INTEGER NOT NULL DEFAULT 0,
    widget_kind TEXT DEFAULT NULL,
    framework_kind TEXT DEFAULT NULL
  )`,
  `CREATE TABLE methods (
    id INTEGER PRIMARY KEY,
    type_id INTEGER NOT NULL REFERENCES declared_types(id),
    name TEXT NOT NULL,
    return_type TEXT NOT NULL,
    is_async INTEGER NOT NULL DEFAULT 0,
    is_static INTEGER NOT NULL DEFAULT 0,
    parameter_count INTEGER NOT NULL DEFAULT 0,
    cyclomatic INTEGER NOT NULL DEFAULT 1,
    cognitive INTEGER NOT NULL DEFAULT 0,
    has_annotation INTEGER NOT NULL DEFAULT 0,
    UNIQUE(type_id, name)
  )`,
  `CREATE TABLE type_relations (
    id INTEGER PRIMARY KEY,
    source_type_id INTEGER NOT NULL REFERENCES declared_types(id),
    target_type_name TEXT NOT NULL,
    kind TEXT NOT NULL CHECK(kind IN ('extends', 'implements', 'with')),
    UNIQUE(source_type_id, target_type_name, kind)
  )`,
  `CREATE TABLE type_usage_references (
    id INTEGER PRIMARY KEY,
    referenced_type_id INTEGER NOT NULL REFERENCES declared_types(id),
    source_file_id INTEGER NOT NULL REFERENCES source_files(id),
    source_type_id INTEGER REFERENCES declared_types(id),
    source_method_id INTEGER REFERENCES methods(id),
    kind TEXT NOT NULL
      CHECK(kind IN ('creation', 'extension', 'implementation', 'usage'))
  )`,
  `CREATE TABLE method_usage_references (
    id INTEGER PRIMARY KEY,
    referenced_method_id INTEGER NOT NULL REFERENCES methods(id),
    source_file_id INTEGER NOT NULL REFERENCES source_files(id),
    source_type_id INTEGER REFERENCES declared_types(id),
    source_method_id INTEGER REFERENCES methods(id),
    is_direct_call INTEGER NOT NULL DEFAULT 1
  )`,
];

const INDEXES = [
  "CREATE INDEX idx_files_path ON source_files(path)",
  "CREATE INDEX idx_file_imports_file ON file_import_relations(file_id)",
  "CREATE INDEX idx_file_imports_import ON file_import_relations(import_id)",
  "CREATE INDEX idx_types_file ON declared_types(file_id)",
  "CREATE INDEX idx_types_name ON declared_types(name)",
  "CREATE INDEX idx_methods_type ON methods(type_id)",
  "CREATE INDEX idx_methods_name ON methods(name)",
  "CREATE INDEX idx_relations_source ON type_relations(source_type_id)",
  "CREATE INDEX idx_relations_target ON type_relations(target_type_name)",
  "CREATE INDEX idx_type_usages_referenced ON type_usage_references(referenced_type_id)",
  "CREATE INDEX idx_type_usages_source ON type_usage_references(source_file_id, source_type_id)",
  "CREATE INDEX idx_method_usages_referenced ON method_usage_references(referenced_method_id)",
  "CREATE INDEX idx_method_usages_source ON method_usage_references(source_file_id, source_type_id)",
];

/**
 * Tables in drop order (referencing tables first).
 */
export const TABLE_NAMES = [
  "method_usage_references",
  "type_usage_references",
  "type_relations",
  "methods",
  "declared_types",
  "file_import_relations",
  "imports",
  "source_files",
] as const;

/**
 * Create all tables and indexes. Expects an empty database.
 *
 * @param db - better-sqlite3 database instance
 */
export const initializeSchema = (db: Database.Database): void => {
  setDbSchemaVersion(db);

  for (const tableSql of TABLES) {
    db.exec(tableSql);
  }

  for (const indexSql of INDEXES) {
    db.exec(indexSql);
  }
};

/**
 * Drop all tables.
 *
 * @param db - better-sqlite3 database instance
 */
export const dropAllTables = (db: Database.Database): void => {
  for (const table of TABLE_NAMES) {
    db.exec(`DROP TABLE IF EXISTS ${table}`);
  }
};

/**
 * Drop and recreate the whole schema in one transaction.
 * Either every table exists afterwards or nothing changed.
 *
 * @throws SchemaInitError if any statement fails (the transaction is rolled back)
 */
export const recreateSchema = (db: Database.Database): void => {
  const recreate = db.transaction(() => {
    dropAllTables(db);
    initializeSchema(db);
  });

  try {
    recreate();
  } catch (e) {
    throw new SchemaInitError(
      `Failed to create schema: ${e instanceof Error ? e.message : String(e)}`,
      { cause: e },
    );
  }
};
