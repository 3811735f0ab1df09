import { CHARS_PER_TOKEN } from "./compress.js";
import { ErrorCodes, RepoGraphError } from "./errors.js";
import { resolveRepoFile } from "./fileDiscovery.js";
import { detectLanguage } from "./languages.js";
import { SourceReader } from "./refs/source.js";
import { describeSymbol, extractKeywords, rankFiles } from "./search.js";
import type { SymbolIndex } from "./symbolIndex.js";
import type { ContextFile, FileContext, RelatedFile, SmartContext } from "./types.js";

export const SMART_CONTEXT_TOKENS = 15000;
export const MAX_CONTEXT_FILES = 20;
/** Files kept (cut short if need be) even when they overflow the budget. */
export const MIN_CONTEXT_FILES = 3;
export const RELATED_FILES = 5;
export const RELATED_SYMBOLS = 10;

/**
 * Files relevant to a free-text question, best first, packed into a token
 * budget. The first three ranked files are cut to fit; later ones that do
 * not fit are skipped.
 */
export function smartContext(
  index: SymbolIndex,
  question: string,
  maxTokens = SMART_CONTEXT_TOKENS,
): SmartContext {
  const budget = Number.isFinite(maxTokens) ? Math.max(0, Math.floor(maxTokens)) : SMART_CONTEXT_TOKENS;
  const maxChars = budget * CHARS_PER_TOKEN;
  const keywords = extractKeywords(question);
  const reader = new SourceReader(index.repoRoot);
  const ranked = rankFiles(index, keywords, reader);

  const files: ContextFile[] = [];
  let total = 0;
  for (const entry of ranked.slice(0, MAX_CONTEXT_FILES)) {
    let content = reader.text(entry.file);
    if (content === null) continue;

    if (total + content.length > maxChars) {
      if (files.length >= MIN_CONTEXT_FILES) continue;
      content = content.slice(0, maxChars - total);
    }
    total += content.length;
    files.push({ ...entry, content });
    if (total >= maxChars) break;
  }

  return {
    question,
    keywords,
    filesAnalyzed: ranked.length,
    files,
    estimatedTokens: Math.floor(total / CHARS_PER_TOKEN),
  };
}

/**
 * A file with its symbols and imports, plus up to five files it imports
 * (with their first ten symbols) and five files that import it.
 */
export function fileContext(index: SymbolIndex, filePath: string): FileContext {
  const relPath = resolveRepoFile(index.repoRoot, filePath);
  const content = new SourceReader(index.repoRoot).text(relPath);
  if (content === null) {
    throw new RepoGraphError(ErrorCodes.FILE_NOT_FOUND, `Cannot read file: ${filePath}`);
  }

  const seen = new Set<string>([relPath]);
  const related: RelatedFile[] = [];
  for (const dep of [...index.graph.importsOf(relPath)].sort().slice(0, RELATED_FILES)) {
    seen.add(dep);
    related.push({
      file: dep,
      relationship: "imports",
      symbols: (index.symbolsByFile.get(dep) ?? []).slice(0, RELATED_SYMBOLS).map(describeSymbol),
    });
  }
  for (const user of [...index.graph.importedBy(relPath)].sort().slice(0, RELATED_FILES)) {
    if (seen.has(user)) continue;
    seen.add(user);
    related.push({ file: user, relationship: "used_by" });
  }

  return {
    file: relPath,
    language: detectLanguage(relPath),
    content,
    symbols: (index.symbolsByFile.get(relPath) ?? []).map(describeSymbol),
    imports: (index.importsByFile.get(relPath) ?? []).map((spec) => spec.module),
    related,
  };
}
