import type Database from "better-sqlite3";
import type {
  AuditReader,
  ComplexMethod,
  UnusedMethod,
  UnusedType,
  UsageStatistics,
} from "../AuditReader.js";
import type { DeclaredTypeKind } from "../Types.js";

interface UnusedTypeRow {
  id: number;
  name: string;
  kind: DeclaredTypeKind;
  file_path: string;
  method_count: number;
  average_cyclomatic: number | null;
}

interface MethodRow {
  id: number;
  name: string;
  type_name: string;
  file_path: string;
  cyclomatic: number;
  cognitive: number;
  parameter_count: number;
}

interface TotalsRow {
  total: number;
  used: number;
}

const TYPE_IS_REFERENCED = `
  EXISTS (
    SELECT 1 FROM type_usage_references u
    WHERE u.referenced_type_id = t.id
  ) OR EXISTS (
    SELECT 1 FROM type_relations tr
    WHERE tr.target_type_name = t.name AND tr.source_type_id <> t.id
  )
`;

const METHOD_IS_REFERENCED = `
  EXISTS (
    SELECT 1 FROM method_usage_references mu
    WHERE mu.referenced_method_id = m.id
  )
`;

const toTotals = (row: TotalsRow): UsageStatistics["types"] => ({
  total: row.total,
  used: row.used,
  unused: row.total - row.used,
});

/**
 * Create an AuditReader backed by SQLite.
 *
 * @param db - better-sqlite3 database holding a finished run
 */
export const createSqliteAuditReader = (db: Database.Database): AuditReader => ({
  findUnusedTypes(): UnusedType[] {
    const rows = db
      .prepare(
        `SELECT
           t.id, t.name, t.kind, f.path AS file_path,
           (SELECT COUNT(*) FROM methods m WHERE m.type_id = t.id) AS method_count,
           (SELECT AVG(m.cyclomatic) FROM methods m WHERE m.type_id = t.id) AS average_cyclomatic
         FROM declared_types t
         JOIN source_files f ON f.id = t.file_id
         WHERE NOT (${TYPE_IS_REFERENCED})
         ORDER BY f.path, t.id`,
      )
      .all() as UnusedTypeRow[];

    return rows.map((row) => ({
      id: row.id,
      name: row.name,
      kind: row.kind,
      filePath: row.file_path,
      methodCount: row.method_count,
      averageCyclomatic: row.average_cyclomatic,
    }));
  },

  findUnusedMethods(): UnusedMethod[] {
    const rows = db
      .prepare(
        `SELECT
           m.id, m.name, t.name AS type_name, f.path AS file_path,
           m.cyclomatic, m.cognitive, m.parameter_count
         FROM methods m
         JOIN declared_types t ON t.id = m.type_id
         JOIN source_files f ON f.id = t.file_id
         WHERE NOT (${METHOD_IS_REFERENCED})
         ORDER BY f.path, m.id`,
      )
      .all() as MethodRow[];

    return rows.map((row) => ({
      id: row.id,
      name: row.name,
      typeName: row.type_name,
      filePath: row.file_path,
      cyclomatic: row.cyclomatic,
      cognitive: row.cognitive,
    }));
  },

  getUsageStatistics(): UsageStatistics {
    const types = db
      .prepare(
        `SELECT COUNT(*) AS total,
                COALESCE(SUM(CASE WHEN ${TYPE_IS_REFERENCED} THEN 1 ELSE 0 END), 0) AS used
         FROM declared_types t`,
      )
      .get() as TotalsRow;
    const methods = db
      .prepare(
        `SELECT COUNT(*) AS total,
                COALESCE(SUM(CASE WHEN ${METHOD_IS_REFERENCED} THEN 1 ELSE 0 END), 0) AS used
         FROM methods m`,
      )
      .get() as TotalsRow;

    return { types: toTotals(types), methods: toTotals(methods) };
  },

  findMostComplexMethods(limit: number): ComplexMethod[] {
    const rows = db
      .prepare(
        `SELECT
           m.id, m.name, t.name AS type_name, f.path AS file_path,
           m.cyclomatic, m.cognitive, m.parameter_count
         FROM methods m
         JOIN declared_types t ON t.id = m.type_id
         JOIN source_files f ON f.id = t.file_id
         ORDER BY m.cognitive DESC, m.cyclomatic DESC, m.id
         LIMIT ?`,
      )
      .all(limit) as MethodRow[];

    return rows.map((row) => ({
      id: row.id,
      name: row.name,
      typeName: row.type_name,
      filePath: row.file_path,
      cyclomatic: row.cyclomatic,
      cognitive: row.cognitive,
      parameterCount: row.parameter_count,
    }));
  },
});
