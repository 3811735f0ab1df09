export {
  buildIndex,
  scan,
  parseFile,
  callGraph,
  traceFlow,
  impact,
  compress,
  repoMap,
  dependencies,
  reach,
  cycles,
  fileContext,
  smartContext,
  search,
  architecture,
  findSymbols,
  usages,
  stats,
} from "./engine.js";
export type { EngineOptions } from "./engine.js";

export { ErrorCodes, RepoGraphError, ok, fail, toFailure } from "./errors.js";
export type { ErrorCode, Failure, Result } from "./errors.js";
export { loadConfig, validateConfig, DEFAULT_CONFIG, CONFIG_FILE } from "./config.js";
export type { RepoGraphConfig } from "./config.js";
export { logger, LogLevel, parseLogLevel } from "./logger.js";

export { scanRepository, discoverFiles, DEFAULT_IGNORE_PATTERNS } from "./fileDiscovery.js";
export { detectLanguage, canExtractSymbols, PARSEABLE_EXTENSIONS } from "./languages.js";
export { computeRepoStats } from "./stats.js";
export { parseSource, getAdapter } from "./symbols.js";
export type { ParseAdapter } from "./symbols.js";

export {
  buildSymbolIndex,
  findSymbol,
  firstDefinition,
  getFileDependencies,
} from "./symbolIndex.js";
export type { SymbolIndex, BuildOptions } from "./symbolIndex.js";
export { ImportGraph } from "./deps/graph.js";
export { resolveImport, createResolverContext } from "./deps/resolver.js";
export type { ResolverContext } from "./deps/resolver.js";

// Cache and dependency graph
export { openCache } from "./cache/db.js";
export type { CacheDB, CacheStats } from "./cache/db.js";
export { dependencyReach, importCycles, cycleContaining } from "./deps/reach.js";

export { getCallGraph, traceFlow as traceCallFlow } from "./refs/call-graph.js";
export { findUsages, classifyUsage } from "./refs/usages.js";
export { analyzeChangeImpact, classifyRisk } from "./impact.js";
export { compressContext, estimateTokens } from "./compress.js";
export { extractKeywords, rankFiles, searchCode, describeSymbol } from "./search.js";
export {
  smartContext as buildSmartContext,
  fileContext as buildFileContext,
} from "./context.js";
export { classifyLayer, classifyArchitecture } from "./architecture.js";
export {
  renderRepoMap,
  renderFlow,
  renderCallGraph,
  renderImpact,
  renderStats,
  renderDependencyReach,
  renderCycles,
  renderSearchHits,
  renderFileContext,
  renderSmartContext,
  renderArchitecture,
} from "./render.js";

export type {
  Language,
  SymbolKind,
  SymbolEntry,
  FileDescriptor,
  ImportKind,
  ImportSpec,
  ImportResolution,
  ParsedSource,
  ParsedFile,
  SymbolOccurrence,
  ScanOptions,
  RepoStats,
  CallDirection,
  CallerEntry,
  CalleeEntry,
  CallGraphResult,
  FlowStep,
  FlowTrace,
  Usage,
  UsageKind,
  RiskLevel,
  ImpactReport,
  CompressionMode,
  CompressedContext,
  FileDependencies,
  DependencyDirection,
  DependencyLayer,
  DependencyReach,
  RankedFile,
  ContextFile,
  SmartContext,
  SearchRelevance,
  SearchHit,
  RelatedFile,
  FileContext,
  ArchitectureLayer,
  ArchitectureMap,
} from "./types.js";
