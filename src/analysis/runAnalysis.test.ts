import {
  existsSync,
  mkdirSync,
  mkdtempSync,
  rmSync,
  writeFileSync,
} from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { CONFIG_FILE_NAME } from "../config/configLoader.utils.js";
import { createSqliteAuditReader } from "../db/sqlite/createSqliteAuditReader.js";
import {
  closeDatabase,
  openDatabase,
} from "../db/sqlite/sqliteConnection.utils.js";
import { ConfigurationError } from "../errors/AnalysisError.js";
import { silentLogger } from "../logging/SilentAnalyzerLogger.js";
import { runAnalysis } from "./runAnalysis.js";

describe(runAnalysis.name, () => {
  let projectRoot: string;

  beforeEach(() => {
    projectRoot = mkdtempSync(join(tmpdir(), "code-census-run-"));
    mkdirSync(join(projectRoot, "lib"));
    writeFileSync(
      join(projectRoot, "lib", "shapes.ts"),
      [
        "export class Circle { area(): number { return 1; } }",
        "export class Square { area(): number { return new Circle().area(); } }",
      ].join("\n"),
    );
  });

  afterEach(() => {
    rmSync(projectRoot, { recursive: true, force: true });
  });

  const writeConfig = (config: unknown): string => {
    const configPath = join(projectRoot, "custom.json");
    writeFileSync(configPath, JSON.stringify(config));
    return configPath;
  };

  it("writes the store where the config says", () => {
    writeFileSync(
      join(projectRoot, CONFIG_FILE_NAME),
      JSON.stringify({
        analyzer: { sourceRoot: "lib" },
        database: { path: "out/census.db" },
      }),
    );

    const summary = runAnalysis({ projectRoot, logger: silentLogger });

    expect(summary.status).toBe("success");
    const dbPath = join(projectRoot, "out", "census.db");
    expect(existsSync(dbPath)).toBe(true);

    const db = openDatabase({ path: dbPath });
    try {
      const unused = createSqliteAuditReader(db).findUnusedTypes();
      expect(unused.map((t) => t.name)).toEqual(["Square"]);
    } finally {
      closeDatabase(db);
    }
  });

  it("uses the default database location", () => {
    runAnalysis({
      projectRoot,
      logger: silentLogger,
      configPath: writeConfig({ analyzer: { sourceRoot: "lib" } }),
    });

    expect(existsSync(join(projectRoot, ".code-census", "census.db"))).toBe(
      true,
    );
  });

  it("rejects an explicit config path that does not exist", () => {
    expect(() =>
      runAnalysis({
        projectRoot,
        logger: silentLogger,
        configPath: join(projectRoot, "missing.json"),
      }),
    ).toThrow(ConfigurationError);
  });

  it("rejects an invalid config before touching the database", () => {
    const configPath = writeConfig({ analyzer: { extensions: ["ts"] } });

    expect(() =>
      runAnalysis({ projectRoot, logger: silentLogger, configPath }),
    ).toThrow(ConfigurationError);
    expect(existsSync(join(projectRoot, ".code-census"))).toBe(false);
  });
});
