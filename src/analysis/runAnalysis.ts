import {
  CONFIG_FILE_NAME,
  loadConfigOrDefault,
} from "../config/configLoader.utils.js";
import { getDbPath } from "../config/getCacheDir.js";
import { createSqliteStore } from "../db/sqlite/createSqliteStore.js";
import {
  closeDatabase,
  openDatabase,
} from "../db/sqlite/sqliteConnection.utils.js";
import type { AnalyzerLogger } from "../logging/AnalyzerLogger.js";
import { createConsoleAnalyzerLogger } from "../logging/ConsoleAnalyzerLogger.js";
import { type AnalysisSummary, analyzeProject } from "./analyzeProject.js";

/**
 * Options for running a full analysis.
 */
export interface RunAnalysisOptions {
  /** Project root directory */
  projectRoot: string;
  /** Config file (default: code-census.config.json in the project root, if present) */
  configPath?: string;
  /** Logger (default: console logger at the configured level) */
  logger?: AnalyzerLogger;
}

const reportSummary = (
  summary: AnalysisSummary,
  logger: AnalyzerLogger,
): void => {
  const { counts } = summary;
  logger.success(
    `Analyzed ${summary.filesProcessed} files (${counts.types} types, ${counts.methods} methods, ${counts.typeUsages + counts.methodUsages} references) in ${summary.durationMs}ms`,
  );

  if (summary.failures.length > 0) {
    logger.warn(`${summary.failures.length} files could not be analyzed:`);
    for (const failure of summary.failures) {
      logger.warn(`  - ${failure.file}: ${failure.message}`);
    }
  }

  if (summary.skippedRecords.length > 0) {
    logger.warn(`${summary.skippedRecords.length} records were skipped:`);
    for (const skipped of summary.skippedRecords) {
      logger.warn(`  - ${skipped.file}: ${skipped.message}`);
    }
  }
};

/**
 * Run a full analysis of a project.
 *
 * Loads the config, opens the database, rebuilds it, prints the summary and
 * closes the database.
 *
 * @throws ConfigurationError for a missing or invalid config, or a missing source root
 * @throws SchemaInitError if the store cannot be recreated
 */
export const runAnalysis = (options: RunAnalysisOptions): AnalysisSummary => {
  const { projectRoot } = options;
  const { config, source, configPath } = loadConfigOrDefault(
    projectRoot,
    options.configPath,
  );
  const logger =
    options.logger ?? createConsoleAnalyzerLogger({ level: config.logging.level });

  logger.info(
    source === "explicit"
      ? `Using config: ${configPath ?? CONFIG_FILE_NAME}`
      : "No config file found. Using defaults.",
  );

  const dbPath = getDbPath(projectRoot, config);
  logger.info(`Database: ${dbPath}`);

  const db = openDatabase({ path: dbPath });
  try {
    const summary = analyzeProject(config, createSqliteStore(db), {
      projectRoot,
      logger,
    });
    reportSummary(summary, logger);
    return summary;
  } finally {
    closeDatabase(db);
  }
};
