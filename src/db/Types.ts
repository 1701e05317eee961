/**
 * Kinds of declared types.
 * Mixins are TypeScript mixin factories (functions returning a class expression).
 */
export type DeclaredTypeKind =
  | "class"
  | "abstract"
  | "mixin"
  | "interface"
  | "enum";

export type TypeUsageKind = "creation" | "extension" | "implementation" | "usage";

export type TypeRelationKind = "extends" | "implements" | "with";

/** Classification of an import path */
export type ImportScope = "internal" | "package" | "builtin";

// Records as written by the analysis passes (ids assigned by the store)

export interface NewSourceFile {
  /** Path relative to the source root, forward slashes */
  path: string;
  sizeBytes: number;
  /** ISO-8601 modification time */
  lastModified: string;
}

export interface NewDeclaredType {
  fileId: number;
  name: string;
  kind: DeclaredTypeKind;
  widgetKind?: string;
  frameworkKind?: string;
}

export interface NewMethod {
  typeId: number;
  name: string;
  returnType: string;
  isAsync: boolean;
  isStatic: boolean;
  parameterCount: number;
  cyclomatic: number;
  cognitive: number;
  hasAnnotation: boolean;
}

export interface NewTypeRelation {
  sourceTypeId: number;
  /** Stored by name; may name a type that was never recorded */
  targetTypeName: string;
  kind: TypeRelationKind;
}

/** Where a reference occurs */
export interface ReferenceSource {
  sourceFileId: number;
  sourceTypeId?: number;
  sourceMethodId?: number;
}

export interface NewTypeUsageReference extends ReferenceSource {
  referencedTypeId: number;
  kind: TypeUsageKind;
}

export interface NewMethodUsageReference extends ReferenceSource {
  referencedMethodId: number;
  isDirectCall: boolean;
}

// Records as read back

export interface SourceFileRecord extends NewSourceFile {
  id: number;
}

export interface ImportRecord {
  id: number;
  path: string;
  isInternal: boolean;
  isPackage: boolean;
}

export interface DeclaredTypeRecord {
  id: number;
  fileId: number;
  name: string;
  kind: DeclaredTypeKind;
  importCount: number;
  isUsed: boolean;
  widgetKind: string | null;
  frameworkKind: string | null;
}

export interface MethodRecord extends NewMethod {
  id: number;
}

/** Row counts per table, used for run summaries */
export interface RecordCounts {
  files: number;
  imports: number;
  fileImports: number;
  types: number;
  methods: number;
  typeRelations: number;
  typeUsages: number;
  methodUsages: number;
}

export interface ImportStatistics {
  internal: number;
  package: number;
  total: number;
}
