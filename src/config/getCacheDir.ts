import { mkdirSync } from "node:fs";
import { isAbsolute, join } from "node:path";
import type { AnalyzerConfig } from "./Config.schemas.js";

/**
 * Cache directory name in project root.
 */
const CACHE_DIR = ".code-census";

/**
 * Get the cache directory for code-census.
 *
 * @param projectRoot - The project root directory
 * @returns Absolute path to the cache directory
 */
export const getCacheDir = (projectRoot: string): string => {
  const cacheDir = join(projectRoot, CACHE_DIR);
  mkdirSync(cacheDir, { recursive: true });
  return cacheDir;
};

/**
 * Get the database path for a project: the configured path (resolved
 * against the project root) or .code-census/census.db.
 */
export const getDbPath = (projectRoot: string, config: AnalyzerConfig): string => {
  const configured = config.database.path;
  if (configured === undefined) {
    return join(getCacheDir(projectRoot), "census.db");
  }
  return isAbsolute(configured) ? configured : join(projectRoot, configured);
};
