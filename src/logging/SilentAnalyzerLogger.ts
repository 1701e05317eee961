import type { AnalyzerLogger } from "./AnalyzerLogger.js";

/**
 * Silent logger that discards all output.
 * Used in tests to suppress console noise.
 */
export const silentLogger: AnalyzerLogger = {
  startProgress(): void {},
  updateProgress(): void {},
  completeProgress(): void {},
  success(): void {},
  info(): void {},
  debug(): void {},
  warn(): void {},
  error(): void {},
};
