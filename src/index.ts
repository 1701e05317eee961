export type {
  AnalysisSummary,
  AnalyzeProjectOptions,
  FileFailure,
} from "./analysis/analyzeProject.js";
export { analyzeProject } from "./analysis/analyzeProject.js";
export type { SkippedRecord } from "./analysis/AnalysisSession.js";
export type { RunAnalysisOptions } from "./analysis/runAnalysis.js";
export { runAnalysis } from "./analysis/runAnalysis.js";
export type {
  AnalyzerConfig,
  AnalyzerConfigInput,
  FrameworkBaseClass,
} from "./config/Config.schemas.js";
export {
  CONFIG_FILE_NAME,
  defineConfig,
  loadConfig,
  loadConfigOrDefault,
} from "./config/configLoader.utils.js";
export type { AnalysisStore } from "./db/AnalysisStore.js";
export type {
  AuditReader,
  ComplexMethod,
  UnusedMethod,
  UnusedType,
  UsageStatistics,
} from "./db/AuditReader.js";
export { createSqliteAuditReader } from "./db/sqlite/createSqliteAuditReader.js";
export { createSqliteStore } from "./db/sqlite/createSqliteStore.js";
export {
  closeDatabase,
  openDatabase,
} from "./db/sqlite/sqliteConnection.utils.js";
export type {
  DeclaredTypeKind,
  DeclaredTypeRecord,
  ImportRecord,
  ImportScope,
  ImportStatistics,
  MethodRecord,
  RecordCounts,
  SourceFileRecord,
  TypeRelationKind,
  TypeUsageKind,
} from "./db/Types.js";
export {
  AnalysisError,
  type AnalysisErrorKind,
  ConfigurationError,
  ParseError,
  RecordInsertError,
  SchemaInitError,
} from "./errors/AnalysisError.js";
export type { AnalyzerLogger, LogLevel } from "./logging/AnalyzerLogger.js";
export { createConsoleAnalyzerLogger } from "./logging/ConsoleAnalyzerLogger.js";
export { silentLogger } from "./logging/SilentAnalyzerLogger.js";
