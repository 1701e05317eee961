import { readFileSync } from "node:fs";
import type { AnalysisSession, FileAnalysisContext } from "./AnalysisSession.js";
import { analyzeImports } from "./imports/analyzeImports.js";
import { analyzeMethods } from "./methods/analyzeMethods.js";
import { parseSourceText } from "./parseSourceText.js";
import { recordSourceFile } from "./recordSourceFile.js";
import { analyzeTypes } from "./types/analyzeTypes.js";
import { analyzeUsages } from "./usages/analyzeUsages.js";

/**
 * Records added for one file.
 */
export interface FileAnalysisResult {
  fileId: number;
  imports: number;
  types: number;
  methods: number;
  methodUsages: number;
  typeUsages: number;
}

/**
 * Run every per-file pass on one file: parse, record the file, then its
 * imports, types (with relations) and, type by type, methods then usages.
 *
 * The file is parsed before anything is written, so a file with syntax
 * errors leaves no records.
 *
 * @param absolutePath - Location on disk
 * @param sourcePath - Path relative to the source root (stored)
 * @param session - Run state
 * @throws ParseError if the file has syntax errors
 */
export const analyzeFile = (
  absolutePath: string,
  sourcePath: string,
  session: AnalysisSession,
): FileAnalysisResult => {
  const text = readFileSync(absolutePath, "utf-8");
  const sourceFile = parseSourceText(session.project, sourcePath, text);

  try {
    const fileId = recordSourceFile(session.store, absolutePath, sourcePath);
    const ctx: FileAnalysisContext = { ...session, fileId, filePath: sourcePath };

    const result: FileAnalysisResult = {
      fileId,
      imports: analyzeImports(ctx, text),
      types: 0,
      methods: 0,
      methodUsages: 0,
      typeUsages: 0,
    };

    const types = analyzeTypes(sourceFile, ctx);
    result.types = types.size;

    for (const entry of types) {
      result.methods += analyzeMethods(entry, ctx);
      const usages = analyzeUsages(entry, ctx);
      result.methodUsages += usages.methodUsages;
      result.typeUsages += usages.typeUsages;
    }

    return result;
  } finally {
    session.project.removeSourceFile(sourceFile);
  }
};
