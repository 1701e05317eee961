import type {
  ImportStatistics,
  NewDeclaredType,
  NewMethod,
  NewMethodUsageReference,
  NewSourceFile,
  NewTypeRelation,
  NewTypeUsageReference,
  RecordCounts,
} from "./Types.js";

/**
 * Session over the analysis store, passed by reference to every pass.
 *
 * One writer per run; every call is synchronous. Ids returned by the
 * insert methods are the join keys used by later passes.
 */
export interface AnalysisStore {
  /**
   * Drop every table and recreate the schema in one transaction.
   *
   * @throws SchemaInitError if the schema cannot be created
   */
  recreateSchema(): void;

  /** Insert one source file record. */
  insertSourceFile(file: NewSourceFile): number;

  /**
   * Insert an import if its path is new (dedup by path across all files).
   *
   * @returns The id of the existing or new import
   */
  upsertImport(path: string, isInternal: boolean): number;

  /** Link a file to an import. Idempotent per (file, import) pair. */
  linkFileImport(fileId: number, importId: number): void;

  /** Insert one declared type; import_count and is_used start at 0. */
  insertDeclaredType(type: NewDeclaredType): number;

  /**
   * Insert one method.
   *
   * @throws RecordInsertError if the type already has a method with this name
   */
  insertMethod(method: NewMethod): number;

  /** Insert a relation by target name. Duplicates are ignored. */
  insertTypeRelation(relation: NewTypeRelation): void;

  insertTypeUsage(reference: NewTypeUsageReference): number;

  insertMethodUsage(reference: NewMethodUsageReference): number;

  /** Resolve a type by name, globally. Lowest id wins among same-named types. */
  findTypeIdByName(name: string): number | undefined;

  /** Resolve a method by name, globally. Lowest id wins among same-named methods. */
  findMethodIdByName(name: string): number | undefined;

  /** Resolve a method by name within one type. */
  findMethodIdInType(typeId: number, name: string): number | undefined;

  /** Imports not flagged internal (candidates for the package flag). */
  listExternalImports(): Array<{ id: number; path: string }>;

  /** Set is_package on the given imports. */
  markPackageImports(importIds: number[]): void;

  /** Set import_count on every type: distinct imports of its owning file. */
  updateImportCounts(): void;

  /**
   * Set is_used on every type: an inbound usage reference exists, or a
   * relation from another type names it.
   */
  updateUsageFlags(): void;

  countRecords(): RecordCounts;

  importStatistics(): ImportStatistics;

  /** Run `fn` inside one transaction. */
  transaction<T>(fn: () => T): T;
}
