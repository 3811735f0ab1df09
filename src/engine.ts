/**
 * Query entry points. Each call loads configuration, builds a fresh index
 * and returns a Result; nothing here throws.
 */

import fs from "node:fs";
import path from "node:path";
import { classifyArchitecture } from "./architecture.js";
import { openCache } from "./cache/db.js";
import { compressContext, type CompressOptions } from "./compress.js";
import { loadConfig, type RepoGraphConfig } from "./config.js";
import { fileContext as buildFileContext, smartContext as buildSmartContext } from "./context.js";
import { dependencyReach, importCycles } from "./deps/reach.js";
import { ErrorCodes, fail, ok, toFailure, type Result } from "./errors.js";
import { assertProjectRoot, discoverFiles, resolveRepoFile } from "./fileDiscovery.js";
import { analyzeChangeImpact } from "./impact.js";
import { logger } from "./logger.js";
import { getCallGraph, traceFlow as traceCallFlow } from "./refs/call-graph.js";
import { findUsages } from "./refs/usages.js";
import { renderRepoMap } from "./render.js";
import { searchCode } from "./search.js";
import { computeRepoStats } from "./stats.js";
import {
  buildSymbolIndex,
  findSymbol,
  getFileDependencies,
  type SymbolIndex,
} from "./symbolIndex.js";
import { parseFile as parseFileFromDisk } from "./symbols.js";
import type {
  ArchitectureMap,
  CallDirection,
  CallGraphResult,
  CompressedContext,
  CompressionMode,
  DependencyDirection,
  DependencyReach,
  FileContext,
  FileDependencies,
  FileDescriptor,
  FlowTrace,
  ImpactReport,
  ParsedFile,
  RepoStats,
  ScanOptions,
  SearchHit,
  SmartContext,
  SymbolOccurrence,
  Usage,
} from "./types.js";

export type EngineOptions = Partial<RepoGraphConfig>;

function scanOptions(config: RepoGraphConfig): ScanOptions {
  return {
    maxDepth: config.maxDepth,
    ignore: config.ignore,
    patterns: config.patterns.length > 0 ? config.patterns : undefined,
  };
}

function attempt<T>(fn: () => T): Result<T> {
  try {
    return ok(fn());
  } catch (err) {
    return toFailure(err);
  }
}

function withIndex<T>(
  repoRoot: string,
  opts: EngineOptions,
  fn: (index: SymbolIndex, config: RepoGraphConfig) => T,
): Result<T> {
  return attempt(() => {
    const root = assertProjectRoot(repoRoot);
    const config = loadConfig(root, opts);
    const cache = config.cache ? openCache(root) : undefined;
    try {
      const index = buildSymbolIndex(root, { scan: scanOptions(config), cache });
      if (cache) {
        const cacheStats = cache.getStats();
        logger.verbose(`[Cache] ${cacheStats.entries} entries in ${cacheStats.cachePath}`);
      }
      return fn(index, config);
    } finally {
      cache?.close();
    }
  });
}

export function buildIndex(repoRoot: string, opts: EngineOptions = {}): Result<SymbolIndex> {
  return withIndex(repoRoot, opts, (index) => index);
}

/** Every file the scanner accepts, parseable or not. */
export function scan(repoRoot: string, opts: EngineOptions = {}): Result<FileDescriptor[]> {
  return attempt(() => {
    const root = assertProjectRoot(repoRoot);
    return discoverFiles(root, scanOptions(loadConfig(root, opts)));
  });
}

/** Null value when the file exists but has no adapter or does not parse. */
export function parseFile(filePath: string): Result<ParsedFile | null> {
  const abs = path.resolve(filePath);
  let isFile = false;
  try {
    isFile = fs.statSync(abs).isFile();
  } catch {
    isFile = false;
  }
  if (!isFile) {
    return fail(ErrorCodes.FILE_NOT_FOUND, `File not found: ${filePath}`);
  }
  return attempt(() => parseFileFromDisk(abs));
}

export function callGraph(
  repoRoot: string,
  name: string,
  direction: CallDirection = "both",
  depth = 1,
  opts: EngineOptions = {},
): Result<CallGraphResult> {
  return withIndex(repoRoot, opts, (index) => getCallGraph(index, name, direction, depth));
}

export function traceFlow(
  repoRoot: string,
  entry: string,
  maxDepth = 10,
  opts: EngineOptions = {},
): Result<FlowTrace> {
  return withIndex(repoRoot, opts, (index) => traceCallFlow(index, entry, maxDepth));
}

export function impact(
  repoRoot: string,
  filePath: string,
  opts: EngineOptions = {},
): Result<ImpactReport> {
  return withIndex(repoRoot, opts, (index) => analyzeChangeImpact(index, filePath));
}

export function compress(
  repoRoot: string,
  files: string[],
  mode: CompressionMode = "smart",
  compressOpts: CompressOptions = {},
): Result<CompressedContext> {
  return attempt(() => compressContext(assertProjectRoot(repoRoot), files, mode, compressOpts));
}

export function repoMap(
  repoRoot: string,
  mapOpts: { maxTokens?: number; includeDocstrings?: boolean } = {},
  opts: EngineOptions = {},
): Result<string> {
  return withIndex(repoRoot, opts, (index, config) =>
    renderRepoMap(index, {
      maxTokens: mapOpts.maxTokens ?? config.mapTokens,
      includeDocstrings: mapOpts.includeDocstrings,
    }),
  );
}

export function dependencies(
  repoRoot: string,
  filePath: string,
  opts: EngineOptions = {},
): Result<FileDependencies> {
  return withIndex(repoRoot, opts, (index) =>
    getFileDependencies(index, resolveRepoFile(index.repoRoot, filePath)),
  );
}

export function reach(
  repoRoot: string,
  filePath: string,
  reachOpts: { direction?: DependencyDirection; maxHops?: number } = {},
  opts: EngineOptions = {},
): Result<DependencyReach> {
  return withIndex(repoRoot, opts, (index) =>
    dependencyReach(
      index,
      resolveRepoFile(index.repoRoot, filePath),
      reachOpts.direction,
      reachOpts.maxHops,
    ),
  );
}

export function cycles(repoRoot: string, opts: EngineOptions = {}): Result<string[][]> {
  return withIndex(repoRoot, opts, (index) => importCycles(index.graph));
}

export function fileContext(
  repoRoot: string,
  filePath: string,
  opts: EngineOptions = {},
): Result<FileContext> {
  return withIndex(repoRoot, opts, (index) => buildFileContext(index, filePath));
}

export function smartContext(
  repoRoot: string,
  question: string,
  maxTokens?: number,
  opts: EngineOptions = {},
): Result<SmartContext> {
  return withIndex(repoRoot, opts, (index) => buildSmartContext(index, question, maxTokens));
}

export function search(
  repoRoot: string,
  query: string,
  topK?: number,
  opts: EngineOptions = {},
): Result<SearchHit[]> {
  return withIndex(repoRoot, opts, (index) => searchCode(index, query, topK));
}

/** Scanned files grouped into layers by path; no parsing involved. */
export function architecture(repoRoot: string, opts: EngineOptions = {}): Result<ArchitectureMap> {
  return attempt(() => {
    const root = assertProjectRoot(repoRoot);
    return classifyArchitecture(discoverFiles(root, scanOptions(loadConfig(root, opts))));
  });
}

export function findSymbols(
  repoRoot: string,
  name: string,
  opts: EngineOptions = {},
): Result<SymbolOccurrence[]> {
  return withIndex(repoRoot, opts, (index) => [...findSymbol(index, name)]);
}

export function usages(
  repoRoot: string,
  name: string,
  opts: EngineOptions = {},
): Result<Usage[]> {
  return withIndex(repoRoot, opts, (index) => findUsages(index, name));
}

export function stats(repoRoot: string, opts: EngineOptions = {}): Result<RepoStats> {
  return attempt(() => {
    const root = assertProjectRoot(repoRoot);
    return computeRepoStats(root, scanOptions(loadConfig(root, opts)));
  });
}
