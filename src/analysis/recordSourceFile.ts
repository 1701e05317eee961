import { statSync } from "node:fs";
import type { AnalysisStore } from "../db/AnalysisStore.js";

/**
 * Insert the record for one analyzed file.
 *
 * @param store - Analysis store
 * @param absolutePath - Location on disk (for size and modification time)
 * @param sourcePath - Normalized path stored in the record
 * @returns The new file id
 */
export const recordSourceFile = (
  store: AnalysisStore,
  absolutePath: string,
  sourcePath: string,
): number => {
  const stats = statSync(absolutePath);
  return store.insertSourceFile({
    path: sourcePath,
    sizeBytes: stats.size,
    lastModified: stats.mtime.toISOString(),
  });
};
