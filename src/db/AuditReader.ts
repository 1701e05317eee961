import type { DeclaredTypeKind } from "./Types.js";

export interface UnusedType {
  id: number;
  name: string;
  kind: DeclaredTypeKind;
  filePath: string;
  methodCount: number;
  /** Average cyclomatic complexity of its methods, null without methods */
  averageCyclomatic: number | null;
}

export interface UnusedMethod {
  id: number;
  name: string;
  typeName: string;
  filePath: string;
  cyclomatic: number;
  cognitive: number;
}

export interface ComplexMethod {
  id: number;
  name: string;
  typeName: string;
  filePath: string;
  cyclomatic: number;
  cognitive: number;
  parameterCount: number;
}

export interface UsageStatistics {
  types: { total: number; used: number; unused: number };
  methods: { total: number; used: number; unused: number };
}

/**
 * Read-side queries over a finished analysis store.
 * Must not run while an analysis run is writing.
 *
 * Resolution is name-based, so a same-named symbol elsewhere can hide a
 * dead one: results are dead-code candidates, not proof.
 */
export interface AuditReader {
  /** Types with no inbound usage reference and no relation from another type. */
  findUnusedTypes(): UnusedType[];

  /** Methods with no inbound method usage reference. */
  findUnusedMethods(): UnusedMethod[];

  getUsageStatistics(): UsageStatistics;

  /** Methods ordered by cognitive, then cyclomatic complexity (highest first). */
  findMostComplexMethods(limit: number): ComplexMethod[];
}
