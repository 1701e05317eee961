import { resolve } from "node:path";
import type { AnalyzerConfig } from "../config/Config.schemas.js";
import type { AnalysisStore } from "../db/AnalysisStore.js";
import type { RecordCounts } from "../db/Types.js";
import {
  AnalysisError,
  type AnalysisErrorKind,
  errorMessage,
} from "../errors/AnalysisError.js";
import type { AnalyzerLogger } from "../logging/AnalyzerLogger.js";
import type { AnalysisSession, SkippedRecord } from "./AnalysisSession.js";
import { analyzeFile } from "./analyzeFile.js";
import { postProcessImports } from "./imports/analyzeImports.js";
import { createSyntaxProject } from "./parseSourceText.js";
import {
  assertSourceRoot,
  selectSourceFiles,
  toSourcePath,
} from "./selectSourceFiles.js";

export interface AnalyzeProjectOptions {
  /** Project root directory (the source root is resolved against it) */
  projectRoot: string;
  /** Logger for progress reporting */
  logger: AnalyzerLogger;
}

/**
 * A file whose analysis stopped early. Records written before the failure stay.
 */
export interface FileFailure {
  file: string;
  kind: AnalysisErrorKind | "unexpected";
  message: string;
}

export interface AnalysisSummary {
  status: "success" | "success-with-warnings";
  /** Files analyzed to the end */
  filesProcessed: number;
  filesFailed: number;
  recordsSkipped: number;
  failures: FileFailure[];
  skippedRecords: SkippedRecord[];
  counts: RecordCounts;
  durationMs: number;
}

/**
 * Analyze a whole project into a freshly recreated store.
 *
 * Files are processed one at a time in selection order. A failing file is
 * logged and counted and the run moves on; a failure to create the schema
 * or to post-process aborts the run.
 *
 * @param config - Analyzer configuration
 * @param store - Analysis store (its contents are replaced)
 * @param options - Project root and logger
 * @returns Run summary
 * @throws SchemaInitError if the schema cannot be recreated
 * @throws ConfigurationError if the source root does not exist (the store is left untouched)
 */
export const analyzeProject = (
  config: AnalyzerConfig,
  store: AnalysisStore,
  options: AnalyzeProjectOptions,
): AnalysisSummary => {
  const startTime = Date.now();
  const { logger } = options;
  const sourceRoot = resolve(options.projectRoot, config.analyzer.sourceRoot);

  // A missing root must not wipe the previous run's records
  assertSourceRoot(sourceRoot);
  store.recreateSchema();

  const session: AnalysisSession = {
    store,
    config,
    logger,
    project: createSyntaxProject(),
    skippedRecords: [],
  };

  const files = [...selectSourceFiles(sourceRoot, config.analyzer)];
  const failures: FileFailure[] = [];
  let filesProcessed = 0;

  logger.startProgress(files.length, config.analyzer.sourceRoot);

  files.forEach((absolutePath, index) => {
    const sourcePath = toSourcePath(sourceRoot, absolutePath);
    try {
      const result = analyzeFile(absolutePath, sourcePath, session);
      filesProcessed++;
      logger.debug(
        `${sourcePath}: ${result.types} types, ${result.methods} methods, ${result.imports} imports`,
      );
    } catch (e) {
      const message = errorMessage(e);
      failures.push({
        file: sourcePath,
        kind: e instanceof AnalysisError ? e.kind : "unexpected",
        message,
      });
      logger.warn(`Failed to analyze ${sourcePath}: ${message}`);
    }
    logger.updateProgress(index + 1);
  });

  store.transaction(() => {
    postProcessImports(session);
    store.updateUsageFlags();
  });

  const counts = store.countRecords();
  logger.completeProgress(filesProcessed, counts.types);

  const { skippedRecords } = session;
  return {
    status:
      failures.length > 0 || skippedRecords.length > 0
        ? "success-with-warnings"
        : "success",
    filesProcessed,
    filesFailed: failures.length,
    recordsSkipped: skippedRecords.length,
    failures,
    skippedRecords,
    counts,
    durationMs: Date.now() - startTime,
  };
};
