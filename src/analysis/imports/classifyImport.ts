import { isBuiltin } from "node:module";
import type { AnalyzerConfig } from "../../config/Config.schemas.js";
import type { ImportScope } from "../../db/Types.js";

type ClassificationConfig = Pick<AnalyzerConfig, "app" | "imports">;

const isRelativePath = (path: string): boolean =>
  path === "." ||
  path === ".." ||
  path.startsWith("./") ||
  path.startsWith("../") ||
  path.startsWith("/");

/**
 * Classify a module specifier.
 *
 * - builtin: carries a builtin prefix (`node:` by default) or names a Node core module
 * - internal: relative, starts with one of the application's import prefixes,
 *   or lacks every configured package prefix
 * - package: anything else
 *
 * @example
 * classifyImport("node:fs", config) // "builtin"
 * classifyImport("./user.js", config) // "internal"
 * classifyImport("zod", config) // "package"
 */
export const classifyImport = (
  path: string,
  config: ClassificationConfig,
): ImportScope => {
  if (
    config.imports.builtinPrefixes.some((prefix) => path.startsWith(prefix)) ||
    isBuiltin(path)
  ) {
    return "builtin";
  }

  if (
    isRelativePath(path) ||
    config.app.importPrefixes.some((prefix) => path.startsWith(prefix))
  ) {
    return "internal";
  }

  const { packagePrefixes } = config.imports;
  if (
    packagePrefixes.length > 0 &&
    !packagePrefixes.some((prefix) => path.startsWith(prefix))
  ) {
    return "internal";
  }

  return "package";
};
