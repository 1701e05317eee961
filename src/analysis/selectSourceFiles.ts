import { existsSync, readdirSync, statSync } from "node:fs";
import { join, relative } from "node:path";
import type { AnalyzerConfig } from "../config/Config.schemas.js";
import { ConfigurationError } from "../errors/AnalysisError.js";

type SelectionSettings = AnalyzerConfig["analyzer"];

const BACKSLASH_REGEX = /\\/g;
const EDGE_SLASHES_REGEX = /^\/+|\/+$/g;

/**
 * Path of a file relative to the source root, with forward slashes.
 *
 * @example
 * toSourcePath("/repo/src", "/repo/src/models/user.ts") // "models/user.ts"
 */
export const toSourcePath = (sourceRoot: string, absolutePath: string): string =>
  relative(sourceRoot, absolutePath).replace(BACKSLASH_REGEX, "/");

/**
 * Check whether a relative path contains a fragment on segment boundaries.
 *
 * @example
 * containsPathFragment("lib/generated/api.ts", "generated") // true
 * containsPathFragment("lib/distance.ts", "dist") // false
 */
export const containsPathFragment = (
  sourcePath: string,
  fragment: string,
): boolean => {
  const trimmed = fragment.replace(BACKSLASH_REGEX, "/").replace(EDGE_SLASHES_REGEX, "");
  if (trimmed.length === 0) return false;
  return `/${sourcePath}/`.includes(`/${trimmed}/`);
};

/**
 * Decide whether a file (path relative to the source root) is analyzed:
 * recognized extension, no excluded fragment, no excluded suffix.
 */
export const isSelectedSourcePath = (
  sourcePath: string,
  settings: SelectionSettings,
): boolean => {
  if (!settings.extensions.some((ext) => sourcePath.endsWith(ext))) {
    return false;
  }
  if (settings.excluded.files.some((suffix) => sourcePath.endsWith(suffix))) {
    return false;
  }
  return !settings.excluded.dirs.some((fragment) =>
    containsPathFragment(sourcePath, fragment),
  );
};

/**
 * @throws ConfigurationError if the source root is not a directory
 */
export const assertSourceRoot = (sourceRoot: string): void => {
  if (!existsSync(sourceRoot) || !statSync(sourceRoot).isDirectory()) {
    throw new ConfigurationError(`Source root not found: ${sourceRoot}`);
  }
};

/**
 * Walk a source root and lazily yield the absolute paths of files to analyze.
 * Directory entries are visited in name order, so the sequence is stable
 * across runs on an unchanged tree. Symbolic links are not followed.
 *
 * @param sourceRoot - Absolute path of the directory to walk
 * @param settings - Extension filter and exclusion lists
 * @throws ConfigurationError if the source root is not a directory
 */
export function* selectSourceFiles(
  sourceRoot: string,
  settings: SelectionSettings,
): Generator<string> {
  assertSourceRoot(sourceRoot);

  const walk = function* (directory: string): Generator<string> {
    const entries = readdirSync(directory, { withFileTypes: true }).sort(
      (a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0),
    );

    for (const entry of entries) {
      const absolutePath = join(directory, entry.name);
      const sourcePath = toSourcePath(sourceRoot, absolutePath);

      if (entry.isDirectory()) {
        const excluded = settings.excluded.dirs.some((fragment) =>
          containsPathFragment(sourcePath, fragment),
        );
        if (!excluded) {
          yield* walk(absolutePath);
        }
      } else if (entry.isFile() && isSelectedSourcePath(sourcePath, settings)) {
        yield absolutePath;
      }
    }
  };

  yield* walk(sourceRoot);
}
