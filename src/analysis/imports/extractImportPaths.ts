/**
 * Patterns for module specifiers, matched on raw text (no syntax tree):
 * - `import x from "m"` and `export { x } from "m"`
 * - `import "m"`
 * - `import("m")` and `require("m")`
 */
const IMPORT_PATTERNS = [
  /\bfrom\s+["']([^"'\n]+)["']/g,
  /\bimport\s+["']([^"'\n]+)["']/g,
  /\b(?:import|require)\s*\(\s*["']([^"'\n]+)["']\s*\)/g,
];

/**
 * Extract the module specifiers a file imports.
 *
 * Matching is textual, so specifiers inside comments or strings that look
 * like imports are included too.
 *
 * @param text - Raw file contents
 * @returns Unique specifiers in order of first occurrence
 *
 * @example
 * extractImportPaths('import { z } from "zod";\nimport "./polyfill";')
 * // ["zod", "./polyfill"]
 */
export const extractImportPaths = (text: string): string[] => {
  const matches: Array<{ index: number; path: string }> = [];

  for (const pattern of IMPORT_PATTERNS) {
    for (const match of text.matchAll(pattern)) {
      const path = match[1];
      if (path !== undefined) {
        matches.push({ index: match.index ?? 0, path });
      }
    }
  }

  matches.sort((a, b) => a.index - b.index);

  return [...new Set(matches.map((m) => m.path))];
};
