import { cycleContaining } from "./deps/reach.js";
import { resolveRepoFile } from "./fileDiscovery.js";
import type { SymbolIndex } from "./symbolIndex.js";
import type { ImpactReport, RiskLevel } from "./types.js";

export const MEDIUM_RISK_MIN = 1;
export const HIGH_RISK_MIN = 6;

export function classifyRisk(totalAffected: number): RiskLevel {
  if (totalAffected >= HIGH_RISK_MIN) return "high";
  if (totalAffected >= MEDIUM_RISK_MIN) return "medium";
  return "low";
}

function recommendationFor(risk: RiskLevel, totalAffected: number): string {
  switch (risk) {
    case "low":
      return "Safe to modify. No other files depend on this.";
    case "medium":
      return `Moderate caution. ${totalAffected} files may be affected. Review before changing public interfaces.`;
    case "high":
      return `High impact. ${totalAffected} files depend on this. Consider backward compatibility and thorough testing.`;
  }
}

/**
 * Files that import `filePath` directly, and those one import further
 * out. The indirect set never repeats the file or a direct dependent.
 * An import cycle through the file is reported but does not change the risk.
 */
export function analyzeChangeImpact(index: SymbolIndex, filePath: string): ImpactReport {
  const relPath = resolveRepoFile(index.repoRoot, filePath);

  const direct = new Set(index.graph.importedBy(relPath));
  direct.delete(relPath);

  const indirect = new Set<string>();
  for (const dependent of direct) {
    for (const next of index.graph.importedBy(dependent)) {
      if (next === relPath || direct.has(next)) continue;
      indirect.add(next);
    }
  }

  const totalAffected = direct.size + indirect.size;
  const risk = classifyRisk(totalAffected);
  const symbols = index.symbolsByFile.get(relPath) ?? [];

  return {
    file: relPath,
    exported: symbols.filter((s) => !s.name.startsWith("_")),
    directDependents: [...direct].sort(),
    indirectDependents: [...indirect].sort(),
    totalAffected,
    cycle: cycleContaining(index.graph, relPath),
    risk,
    recommendation: recommendationFor(risk, totalAffected),
  };
}
