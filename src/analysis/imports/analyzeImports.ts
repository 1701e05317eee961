import type { ImportStatistics } from "../../db/Types.js";
import type {
  AnalysisSession,
  FileAnalysisContext,
} from "../AnalysisSession.js";
import { classifyImport } from "./classifyImport.js";
import { extractImportPaths } from "./extractImportPaths.js";

/**
 * Record the imports of one file.
 * Imports are shared by path across files; each file gets one link per path.
 *
 * @returns Number of distinct imports found in the file
 */
export const analyzeImports = (
  ctx: FileAnalysisContext,
  text: string,
): number => {
  const paths = extractImportPaths(text);

  for (const path of paths) {
    const isInternal = classifyImport(path, ctx.config) === "internal";
    const importId = ctx.store.upsertImport(path, isInternal);
    ctx.store.linkFileImport(ctx.fileId, importId);
  }

  return paths.length;
};

/**
 * Aggregate imports once every file is recorded: flag third-party
 * packages, set per-type import counts and log the totals.
 */
export const postProcessImports = (
  session: AnalysisSession,
): ImportStatistics => {
  const { store, config, logger } = session;

  const packageIds = store
    .listExternalImports()
    .filter((i) => classifyImport(i.path, config) === "package")
    .map((i) => i.id);
  store.markPackageImports(packageIds);
  store.updateImportCounts();

  const stats = store.importStatistics();
  logger.info(
    `Imports: ${stats.internal} internal, ${stats.package} package, ${stats.total} total`,
  );
  return stats;
};
