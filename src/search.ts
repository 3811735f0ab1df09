import fs from "node:fs";
import { SourceReader } from "./refs/source.js";
import { findUsages } from "./refs/usages.js";
import type { SymbolIndex } from "./symbolIndex.js";
import type { RankedFile, SearchHit, SymbolEntry } from "./types.js";

export const MIN_KEYWORD_LENGTH = 3;
export const EXACT_MATCH_SCORE = 10;
export const PARTIAL_MATCH_SCORE = 5;
export const USAGE_SCORE = 1;
export const DEFAULT_SEARCH_RESULTS = 10;
export const USAGES_PER_KEYWORD = 5;

const STOP_WORDS_FILE = new URL("../data/stop-words.txt", import.meta.url);
const WORD = /\b[a-zA-Z_][a-zA-Z0-9_]*\b/g;

let stopWords: ReadonlySet<string> | null = null;

function loadStopWords(): ReadonlySet<string> {
  if (!stopWords) {
    stopWords = new Set(
      fs
        .readFileSync(STOP_WORDS_FILE, "utf-8")
        .split(/\r?\n/)
        .map((line) => line.trim().toLowerCase())
        .filter((line) => line.length > 0 && !line.startsWith("#")),
    );
  }
  return stopWords;
}

/** Identifier-like words of three or more characters, minus stop words, first occurrence order. */
export function extractKeywords(text: string): string[] {
  const stop = loadStopWords();
  const keywords = new Set<string>();
  for (const word of text.match(WORD) ?? []) {
    if (word.length < MIN_KEYWORD_LENGTH || stop.has(word.toLowerCase())) continue;
    keywords.add(word);
  }
  return [...keywords];
}

export function describeSymbol(symbol: SymbolEntry): string {
  const sep = symbol.signature && !symbol.signature.startsWith("(") ? " " : "";
  return `${symbol.kind} ${symbol.name}${sep}${symbol.signature}`;
}

type SymbolMatch = {
  name: string;
  exact: boolean;
};

function matchingNames(index: SymbolIndex, keyword: string): SymbolMatch[] {
  const lower = keyword.toLowerCase();
  const matches: SymbolMatch[] = [];
  for (const name of index.symbolsByName.keys()) {
    const candidate = name.toLowerCase();
    if (candidate.includes(lower)) matches.push({ name, exact: candidate === lower });
  }
  return matches;
}

/**
 * Scores files against keywords: 10 per symbol whose name equals a
 * keyword (case-insensitive), 5 per symbol whose name contains one, and
 * 1 per line mentioning one. Highest score first, ties by path.
 */
export function rankFiles(
  index: SymbolIndex,
  keywords: readonly string[],
  reader = new SourceReader(index.repoRoot),
): RankedFile[] {
  const scores = new Map<string, number>();
  const matched = new Map<string, Set<string>>();
  const bump = (file: string, points: number) => {
    scores.set(file, (scores.get(file) ?? 0) + points);
  };

  for (const keyword of keywords) {
    for (const { name, exact } of matchingNames(index, keyword)) {
      for (const occ of index.symbolsByName.get(name) ?? []) {
        bump(occ.path, exact ? EXACT_MATCH_SCORE : PARTIAL_MATCH_SCORE);
        let labels = matched.get(occ.path);
        if (!labels) {
          labels = new Set();
          matched.set(occ.path, labels);
        }
        labels.add(describeSymbol(occ.symbol));
      }
    }
  }

  for (const keyword of keywords) {
    for (const usage of findUsages(index, keyword, reader)) {
      bump(usage.file, USAGE_SCORE);
    }
  }

  return [...scores]
    .map(([file, score]) => ({ file, score, matchedSymbols: [...(matched.get(file) ?? [])] }))
    .sort((a, b) => b.score - a.score || a.file.localeCompare(b.file));
}

function searchRank(hit: SearchHit): number {
  return (hit.relevance === "high" ? 0 : 2) + (hit.matchType === "symbol" ? 0 : 1);
}

/**
 * Keyword search over symbol names, then over file contents. A file gives
 * at most one symbol hit, and a line already given as a symbol hit is not
 * repeated as content. Exact name matches rank first, then other symbol
 * hits, then content hits.
 */
export function searchCode(
  index: SymbolIndex,
  query: string,
  topK = DEFAULT_SEARCH_RESULTS,
): SearchHit[] {
  const limit = Number.isFinite(topK) ? Math.max(1, Math.floor(topK)) : DEFAULT_SEARCH_RESULTS;
  const keywords = extractKeywords(query);
  const reader = new SourceReader(index.repoRoot);
  const seen = new Set<string>();
  const hits: SearchHit[] = [];

  for (const keyword of keywords) {
    for (const { name, exact } of matchingNames(index, keyword)) {
      for (const occ of index.symbolsByName.get(name) ?? []) {
        if (seen.has(occ.path)) continue;
        seen.add(occ.path);
        seen.add(`${occ.path}:${occ.symbol.startLine}`);
        hits.push({
          matchType: "symbol",
          file: occ.path,
          line: occ.symbol.startLine,
          symbol: describeSymbol(occ.symbol),
          relevance: exact ? "high" : "medium",
        });
      }
    }
  }

  for (const keyword of keywords) {
    for (const usage of findUsages(index, keyword, reader).slice(0, USAGES_PER_KEYWORD)) {
      const key = `${usage.file}:${usage.line}`;
      if (seen.has(key)) continue;
      seen.add(key);
      hits.push({
        matchType: "content",
        file: usage.file,
        line: usage.line,
        content: usage.content,
        usageType: usage.type,
        relevance: "medium",
      });
    }
  }

  return hits.sort((a, b) => searchRank(a) - searchRank(b)).slice(0, limit);
}
