import fs from "node:fs";
import { scanRepository } from "./fileDiscovery.js";
import { logger } from "./logger.js";
import type { RepoStats, ScanOptions } from "./types.js";

/** Newline-terminated lines, plus a final unterminated one if present. */
export function countLines(content: string): number {
  if (content.length === 0) return 0;
  let count = 0;
  for (let i = 0; i < content.length; i += 1) {
    if (content.charCodeAt(i) === 10) count += 1;
  }
  return content.endsWith("\n") ? count : count + 1;
}

export function computeRepoStats(repoRoot: string, opts: ScanOptions = {}): RepoStats {
  const byLanguage: Record<string, number> = Object.create(null);
  const byExtension: Record<string, number> = Object.create(null);
  let totalFiles = 0;
  let totalLines = 0;

  for (const file of scanRepository(repoRoot, opts)) {
    totalFiles++;
    byLanguage[file.language] = (byLanguage[file.language] ?? 0) + 1;
    const ext = file.extension || "no_extension";
    byExtension[ext] = (byExtension[ext] ?? 0) + 1;

    try {
      totalLines += countLines(fs.readFileSync(file.path, "utf-8"));
    } catch (err) {
      logger.debug(`Cannot read ${file.relativePath}: ${String(err)}`);
    }
  }

  return { totalFiles, totalLines, byLanguage, byExtension };
}
