import chalk from "chalk";
import {
  type AnalyzerLogger,
  isLevelEnabled,
  type LogLevel,
} from "./AnalyzerLogger.js";

const PREFIX = chalk.dim("[code-census]");
const MOVE_UP = "\x1b[1A"; // Move cursor up one line
const CLEAR_LINE = "\x1b[2K\r"; // Clear entire line and return to column 0

export interface ConsoleAnalyzerLoggerOptions {
  /** Minimum level printed (default: "info") */
  level?: LogLevel;
  /** Output sink (default: process.stderr) */
  stream?: NodeJS.WritableStream;
}

/**
 * Terminal-based logger with colors and in-place progress updates.
 *
 * - Progress updates overwrite the current line
 * - Progress is only drawn at "info" verbosity or lower
 * - All output goes to stderr
 */
export const createConsoleAnalyzerLogger = (
  options: ConsoleAnalyzerLoggerOptions = {},
): AnalyzerLogger => {
  const threshold = options.level ?? "info";
  const stream = options.stream ?? process.stderr;
  const showProgress = isLevelEnabled("info", threshold);

  let currentLabel = "";
  let currentTotal = 0;
  let isProgressActive = false;

  const clearProgress = (): void => {
    if (isProgressActive) {
      stream.write(`${MOVE_UP}${CLEAR_LINE}`);
      isProgressActive = false;
    }
  };

  const writeProgress = (current: number): void => {
    if (!showProgress) return;
    const progressText = `${PREFIX} ${chalk.cyan("→")} Analyzing ${currentLabel}... ${current}/${currentTotal} files`;
    if (isProgressActive) {
      stream.write(`${MOVE_UP}${CLEAR_LINE}${progressText}\n`);
    } else {
      stream.write(`${progressText}\n`);
    }
    isProgressActive = true;
  };

  const writeLine = (level: LogLevel, text: string): void => {
    if (!isLevelEnabled(level, threshold)) return;
    clearProgress();
    stream.write(`${text}\n`);
  };

  return {
    startProgress(total: number, label: string): void {
      currentLabel = label;
      currentTotal = total;
      writeProgress(0);
    },

    updateProgress(current: number): void {
      writeProgress(current);
    },

    completeProgress(filesCount: number, typesCount: number): void {
      clearProgress();
      writeLine(
        "info",
        `${PREFIX} ${chalk.green("✓")} ${currentLabel} (${filesCount} files, ${typesCount} types)`,
      );
      currentLabel = "";
      currentTotal = 0;
    },

    success(message: string): void {
      writeLine("info", `${PREFIX} ${chalk.green("✓")} ${message}`);
    },

    info(message: string): void {
      writeLine("info", `${PREFIX} ${message}`);
    },

    debug(message: string): void {
      writeLine("debug", `${PREFIX} ${chalk.gray(message)}`);
    },

    warn(message: string): void {
      writeLine("warn", `${PREFIX} ${chalk.yellow("⚠")} ${message}`);
    },

    error(message: string): void {
      writeLine("error", `${PREFIX} ${chalk.red("✗")} ${message}`);
    },
  };
};
