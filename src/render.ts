import path from "node:path";
import { detectLanguage } from "./languages.js";
import type { SymbolIndex } from "./symbolIndex.js";
import type {
  ArchitectureLayer,
  ArchitectureMap,
  CallGraphResult,
  DependencyReach,
  FileContext,
  FlowStep,
  ImpactReport,
  ImportSpec,
  RepoStats,
  SearchHit,
  SmartContext,
  SymbolEntry,
} from "./types.js";

export const DEFAULT_MAP_TOKENS = 8000;
const MAX_IMPORTS_SHOWN = 5;
const MAX_ITEMS_SHOWN = 3;
const TRUNCATED = "... (truncated)";

export type RepoMapOptions = {
  maxTokens?: number;
  includeDocstrings?: boolean;
};

function compactComment(comment: string, maxLen: number): string {
  const singleLine = comment.replace(/\s+/g, " ").trim();
  if (singleLine.length <= maxLen) return singleLine;
  return `${singleLine.slice(0, maxLen)}...`;
}

function formatImport(spec: ImportSpec): string {
  if (spec.items.length > 0) {
    return `{${spec.items.slice(0, MAX_ITEMS_SHOWN).join(", ")}} from ${spec.module}`;
  }
  return spec.alias ? `${spec.module} as ${spec.alias}` : spec.module;
}

function formatSymbolLabel(sym: SymbolEntry, python: boolean): string {
  if (sym.kind === "class") {
    if (!sym.signature) return `class ${sym.name}`;
    const sep = sym.signature.startsWith("(") ? "" : " ";
    return `class ${sym.name}${sep}${sym.signature}`;
  }
  return `${python ? "def" : "function"} ${sym.name}${sym.signature}`;
}

function renderSymbol(
  sym: SymbolEntry,
  python: boolean,
  indent: string,
  includeDocstrings: boolean,
): string[] {
  const lines = [`${indent}${sym.startLine}-${sym.endLine}: ${formatSymbolLabel(sym, python)}`];
  if (includeDocstrings && sym.docstring) {
    const doc = compactComment(sym.docstring, 100);
    lines.push(python ? `${indent}  """${doc}"""` : `${indent}  /** ${doc} */`);
  }
  return lines;
}

function renderFileEntry(
  relPath: string,
  symbols: readonly SymbolEntry[],
  imports: readonly ImportSpec[],
  includeDocstrings: boolean,
): string[] {
  const python = detectLanguage(relPath) === "python";
  const lines = [`### ${path.posix.basename(relPath)}`];

  if (imports.length > 0) {
    lines.push(`  imports: ${imports.slice(0, MAX_IMPORTS_SHOWN).map(formatImport).join(", ")}`);
  }

  for (const cls of symbols.filter((s) => s.kind === "class")) {
    lines.push(...renderSymbol(cls, python, "  ", includeDocstrings));
    for (const method of symbols.filter((s) => s.kind === "method" && s.parent === cls.name)) {
      lines.push(...renderSymbol(method, python, "    ", includeDocstrings));
    }
  }

  for (const fn of symbols.filter((s) => s.kind === "function")) {
    lines.push(...renderSymbol(fn, python, "  ", includeDocstrings));
  }

  lines.push("");
  return lines;
}

function truncateLines(lines: string[], maxTokens: number): string {
  const out: string[] = [];
  let used = 0;
  for (const line of lines) {
    const cost = Math.floor(line.length / 4) + 1;
    if (used + cost > maxTokens) {
      out.push(TRUNCATED);
      break;
    }
    out.push(line);
    used += cost;
  }
  return out.join("\n");
}

/**
 * Outline of every indexed file, grouped by directory. Output over the
 * token budget is cut line by line.
 */
export function renderRepoMap(index: SymbolIndex, opts: RepoMapOptions = {}): string {
  const maxTokens = opts.maxTokens ?? DEFAULT_MAP_TOKENS;
  const includeDocstrings = opts.includeDocstrings ?? false;

  const byDir = new Map<string, string[]>();
  for (const relPath of [...index.symbolsByFile.keys()].sort()) {
    const dir = path.posix.dirname(relPath);
    const list = byDir.get(dir) ?? [];
    list.push(relPath);
    byDir.set(dir, list);
  }

  const lines = [`# Repository Map: ${path.basename(index.repoRoot)}`, ""];
  for (const dir of [...byDir.keys()].sort()) {
    lines.push(dir === "." ? "## ./" : `## ${dir}/`, "");
    for (const relPath of byDir.get(dir) ?? []) {
      lines.push(
        ...renderFileEntry(
          relPath,
          index.symbolsByFile.get(relPath) ?? [],
          index.importsByFile.get(relPath) ?? [],
          includeDocstrings,
        ),
      );
    }
  }

  const text = lines.join("\n");
  if (Math.floor(text.length / 4) <= maxTokens) return text;
  return truncateLines(lines, maxTokens);
}

export function renderFlow(steps: readonly FlowStep[]): string {
  return steps
    .map((step) => {
      const indent = "  ".repeat(step.depth);
      if (step.type === "external") {
        return `${indent}→ ${step.function}() [external]`;
      }
      return `${indent}→ ${step.function}() @ ${step.file}:${step.line}`;
    })
    .join("\n");
}

export function renderCallGraph(result: CallGraphResult): string {
  const lines = [`${result.function} @ ${result.file}:${result.line}`];

  if (result.callers) {
    lines.push(`  callers: ${result.callers.length}`);
    for (const caller of result.callers) {
      const indent = "    " + "  ".repeat(caller.depth - 1);
      lines.push(`${indent}- ${caller.function} @ ${caller.file}:${caller.line}`);
    }
  }

  if (result.callees) {
    lines.push(`  callees: ${result.callees.length}`);
    for (const callee of result.callees) {
      const indent = "    " + "  ".repeat(callee.depth - 1);
      const where = callee.file ? ` @ ${callee.file}:${callee.line ?? "?"}` : " [external]";
      lines.push(`${indent}- ${callee.function}${where}`);
    }
  }

  return lines.join("\n");
}

export function renderImpact(report: ImpactReport): string {
  const lines = [
    `${report.file}: risk ${report.risk} (${report.totalAffected} affected)`,
    `  ${report.recommendation}`,
  ];

  const section = (label: string, items: string[]) => {
    lines.push(`  ${label}: ${items.length}`);
    for (const item of items) {
      lines.push(`    - ${item}`);
    }
  };
  section("direct dependents", report.directDependents);
  section("indirect dependents", report.indirectDependents);
  section(
    "exported",
    report.exported.map((s) => `${s.parent ? `${s.parent}.` : ""}${s.name} (${s.kind})`),
  );
  if (report.cycle.length > 0) {
    lines.push(`  import cycle: ${report.cycle.join(", ")}`);
  }

  return lines.join("\n");
}

export function renderStats(stats: RepoStats): string {
  const lines = ["# Project Overview", "", "## Languages"];
  for (const [lang, count] of Object.entries(stats.byLanguage).sort((a, b) => b[1] - a[1])) {
    lines.push(`- ${lang}: ${count} files`);
  }
  lines.push("", "## Extensions");
  for (const [ext, count] of Object.entries(stats.byExtension).sort((a, b) => b[1] - a[1])) {
    lines.push(`- ${ext}: ${count} files`);
  }
  lines.push("", "## Statistics");
  lines.push(`- Total files: ${stats.totalFiles}`);
  lines.push(`- Total lines: ${stats.totalLines.toLocaleString()}`);
  return lines.join("\n");
}

export function renderDependencyReach(reach: DependencyReach): string {
  const label = reach.direction === "imports" ? "imports" : "imported by";
  const lines = [`${reach.file} ${label}:`];
  for (const layer of reach.layers) {
    lines.push(`  hop ${layer.hop}: ${layer.files.join(", ")}`);
  }
  if (reach.external.length > 0) {
    lines.push(`  external: ${reach.external.join(", ")}`);
  }
  if (reach.layers.length === 0 && reach.external.length === 0) {
    lines.push("  (none)");
  }
  if (reach.truncated) {
    lines.push("  ... (hop limit reached)");
  }
  return lines.join("\n");
}

export function renderCycles(cycles: readonly string[][]): string {
  if (cycles.length === 0) return "No import cycles found.";
  return ["Import cycles:", ...cycles.map((members) => `- ${members.join(", ")}`)].join("\n");
}

export function renderSearchHits(hits: readonly SearchHit[]): string {
  if (hits.length === 0) return "No matches.";
  return hits
    .map((hit) =>
      hit.matchType === "symbol"
        ? `${hit.file}:${hit.line} [symbol, ${hit.relevance}] ${hit.symbol}`
        : `${hit.file}:${hit.line} [${hit.usageType}, ${hit.relevance}] ${hit.content}`,
    )
    .join("\n");
}

export function renderFileContext(ctx: FileContext): string {
  const lines = [`### ${ctx.file} (${ctx.language})`];
  if (ctx.symbols.length > 0) lines.push(`  symbols: ${ctx.symbols.join("; ")}`);
  if (ctx.imports.length > 0) lines.push(`  imports: ${ctx.imports.join(", ")}`);
  for (const rel of ctx.related) {
    if (rel.relationship === "used_by") {
      lines.push(`  used by ${rel.file}`);
    } else {
      const symbols = rel.symbols.length > 0 ? `: ${rel.symbols.join("; ")}` : "";
      lines.push(`  imports ${rel.file}${symbols}`);
    }
  }
  lines.push("```", ctx.content, "```");
  return lines.join("\n");
}

export function renderSmartContext(ctx: SmartContext): string {
  const lines = [
    `Question: ${ctx.question}`,
    `Keywords: ${ctx.keywords.join(", ")}`,
    `Files scored: ${ctx.filesAnalyzed}, included: ${ctx.files.length}, estimated tokens: ${ctx.estimatedTokens}`,
  ];
  for (const file of ctx.files) {
    lines.push("", `### ${file.file} (score ${file.score})`);
    if (file.matchedSymbols.length > 0) lines.push(`matched: ${file.matchedSymbols.join("; ")}`);
    lines.push("```", file.content, "```");
  }
  return lines.join("\n");
}

const LAYER_TITLES: ReadonlyArray<readonly [ArchitectureLayer, string]> = [
  ["components", "UI Layer"],
  ["api", "API Layer"],
  ["services", "Business Logic"],
  ["models", "Data Layer"],
  ["utils", "Utilities"],
  ["config", "Configuration"],
];
const FILES_PER_LAYER = 5;

export function renderArchitecture(layers: ArchitectureMap, projectName: string): string {
  const lines = [`# Architecture: ${projectName}`];
  for (const [layer, title] of LAYER_TITLES) {
    const files = layers[layer];
    if (files.length === 0) continue;
    lines.push("", `## ${title} (${files.length} files)`);
    for (const file of files.slice(0, FILES_PER_LAYER)) {
      lines.push(`- ${file}`);
    }
    if (files.length > FILES_PER_LAYER) {
      lines.push(`- ... and ${files.length - FILES_PER_LAYER} more`);
    }
  }
  if (lines.length === 1) lines.push("", "No files matched a layer.");
  return lines.join("\n");
}
