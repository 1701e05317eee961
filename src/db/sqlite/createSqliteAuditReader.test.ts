import type Database from "better-sqlite3";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { AnalysisStore } from "../AnalysisStore.js";
import type { NewMethod } from "../Types.js";
import { createSqliteAuditReader } from "./createSqliteAuditReader.js";
import { createSqliteStore } from "./createSqliteStore.js";
import { closeDatabase, openDatabase } from "./sqliteConnection.utils.js";

const method = (
  typeId: number,
  name: string,
  cyclomatic = 1,
  cognitive = 0,
): NewMethod => ({
  typeId,
  name,
  returnType: "void",
  isAsync: false,
  isStatic: false,
  parameterCount: 1,
  cyclomatic,
  cognitive,
  hasAnnotation: false,
});

describe(createSqliteAuditReader.name, () => {
  let db: Database.Database;
  let store: AnalysisStore;
  let fileId: number;

  beforeEach(() => {
    db = openDatabase({ path: ":memory:" });
    store = createSqliteStore(db);
    store.recreateSchema();
    fileId = store.insertSourceFile({
      path: "models/user.ts",
      sizeBytes: 10,
      lastModified: "2024-01-01T00:00:00.000Z",
    });
  });

  afterEach(() => {
    closeDatabase(db);
  });

  it("reports a type nobody references as unused", () => {
    const used = store.insertDeclaredType({ fileId, name: "User", kind: "class" });
    const dead = store.insertDeclaredType({ fileId, name: "Legacy", kind: "class" });
    store.insertMethod(method(dead, "a", 2));
    store.insertMethod(method(dead, "b", 4));
    store.insertTypeUsage({ referencedTypeId: used, sourceFileId: fileId, kind: "creation" });

    const reader = createSqliteAuditReader(db);

    expect(reader.findUnusedTypes()).toEqual([
      {
        id: dead,
        name: "Legacy",
        kind: "class",
        filePath: "models/user.ts",
        methodCount: 2,
        averageCyclomatic: 3,
      },
    ]);
  });

  it("treats a relation from another type as a reference", () => {
    const base = store.insertDeclaredType({ fileId, name: "Base", kind: "abstract" });
    const child = store.insertDeclaredType({ fileId, name: "Child", kind: "class" });
    store.insertTypeRelation({ sourceTypeId: child, targetTypeName: "Base", kind: "extends" });

    const unused = createSqliteAuditReader(db).findUnusedTypes();

    expect(unused.map((t) => t.id)).toEqual([child]);
    expect(unused.map((t) => t.id)).not.toContain(base);
  });

  it("reports methods without inbound references", () => {
    const typeId = store.insertDeclaredType({ fileId, name: "User", kind: "class" });
    const called = store.insertMethod(method(typeId, "save"));
    const dead = store.insertMethod(method(typeId, "legacy"));
    store.insertMethodUsage({
      referencedMethodId: called,
      sourceFileId: fileId,
      isDirectCall: true,
    });

    const unused = createSqliteAuditReader(db).findUnusedMethods();

    expect(unused).toEqual([
      {
        id: dead,
        name: "legacy",
        typeName: "User",
        filePath: "models/user.ts",
        cyclomatic: 1,
        cognitive: 0,
      },
    ]);
  });

  it("computes usage statistics", () => {
    const a = store.insertDeclaredType({ fileId, name: "A", kind: "class" });
    store.insertDeclaredType({ fileId, name: "B", kind: "class" });
    const run = store.insertMethod(method(a, "run"));
    store.insertMethod(method(a, "stop"));
    store.insertTypeUsage({ referencedTypeId: a, sourceFileId: fileId, kind: "usage" });
    store.insertMethodUsage({ referencedMethodId: run, sourceFileId: fileId, isDirectCall: false });

    expect(createSqliteAuditReader(db).getUsageStatistics()).toEqual({
      types: { total: 2, used: 1, unused: 1 },
      methods: { total: 2, used: 1, unused: 1 },
    });
  });

  it("returns zero totals on an empty store", () => {
    expect(createSqliteAuditReader(db).getUsageStatistics()).toEqual({
      types: { total: 0, used: 0, unused: 0 },
      methods: { total: 0, used: 0, unused: 0 },
    });
  });

  it("orders complex methods by cognitive then cyclomatic", () => {
    const typeId = store.insertDeclaredType({ fileId, name: "A", kind: "class" });
    store.insertMethod(method(typeId, "simple", 1, 0));
    store.insertMethod(method(typeId, "branchy", 6, 3));
    store.insertMethod(method(typeId, "nested", 3, 5));
    store.insertMethod(method(typeId, "wide", 8, 3));

    const names = createSqliteAuditReader(db)
      .findMostComplexMethods(3)
      .map((m) => m.name);

    expect(names).toEqual(["nested", "wide", "branchy"]);
  });
});
