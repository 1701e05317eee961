/**
 * Verbosity threshold, lowest first.
 */
export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Check whether a message at `level` passes the `threshold`.
 *
 * @example
 * isLevelEnabled("debug", "info") // false
 * isLevelEnabled("warn", "info") // true
 */
export const isLevelEnabled = (level: LogLevel, threshold: LogLevel): boolean =>
  LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(threshold);

/**
 * Logging interface for an analysis run.
 *
 * Handles both progress updates (in-place terminal updates) and simple logs.
 * All output goes to stderr. The level threshold only affects what is
 * printed, never what is recorded.
 *
 * @example
 * ```typescript
 * logger.startProgress(120, "src");
 * logger.updateProgress(42);
 * logger.completeProgress(120, 310);
 *
 * logger.warn("Skipping src/broken.ts: Syntax errors");
 * ```
 */
export interface AnalyzerLogger {
  /**
   * Start progress tracking for a source root.
   * Displays: [code-census] → Analyzing {label}... 0/{total} files
   */
  startProgress(total: number, label: string): void;

  /**
   * Update progress count (in-place terminal update).
   */
  updateProgress(current: number): void;

  /**
   * Complete progress. Prints a permanent line:
   * [code-census] ✓ {label} ({filesCount} files, {typesCount} types)
   */
  completeProgress(filesCount: number, typesCount: number): void;

  success(message: string): void;

  info(message: string): void;

  /** Per-declaration and per-reference detail. */
  debug(message: string): void;

  warn(message: string): void;

  error(message: string): void;
}
