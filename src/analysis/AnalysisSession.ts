import type { Project } from "ts-morph";
import type { AnalyzerConfig } from "../config/Config.schemas.js";
import type { AnalysisStore } from "../db/AnalysisStore.js";
import { RecordInsertError } from "../errors/AnalysisError.js";
import type { AnalyzerLogger } from "../logging/AnalyzerLogger.js";

/**
 * A record rejected by the store; the run continues without it.
 */
export interface SkippedRecord {
  file: string;
  record: string;
  message: string;
}

/**
 * State shared by every pass of one analysis run.
 * Created once by the coordinator and passed by reference.
 */
export interface AnalysisSession {
  store: AnalysisStore;
  config: AnalyzerConfig;
  logger: AnalyzerLogger;
  /** Syntax project; each file is removed once analyzed */
  project: Project;
  skippedRecords: SkippedRecord[];
}

/**
 * Per-file view of the session handed to the file-level passes.
 */
export interface FileAnalysisContext extends AnalysisSession {
  fileId: number;
  /** Path relative to the source root */
  filePath: string;
}

/**
 * Run one insert; a rejected record is logged and counted instead of
 * failing the file.
 *
 * @returns The insert's result, or undefined when the record was rejected
 */
export const insertOrSkip = <T>(
  ctx: FileAnalysisContext,
  record: string,
  insert: () => T,
): T | undefined => {
  try {
    return insert();
  } catch (e) {
    if (e instanceof RecordInsertError) {
      ctx.skippedRecords.push({
        file: ctx.filePath,
        record,
        message: e.message,
      });
      ctx.logger.warn(`${ctx.filePath}: ${e.message}`);
      return undefined;
    }
    throw e;
  }
};
