import fs from "node:fs";
import type { CacheDB } from "./cache/db.js";
import { hashContent } from "./cache/db.js";
import { ImportGraph } from "./deps/graph.js";
import { createResolverContext, resolveImport } from "./deps/resolver.js";
import { ErrorCodes, RepoGraphError } from "./errors.js";
import { assertProjectRoot, scanRepository } from "./fileDiscovery.js";
import { PARSEABLE_EXTENSIONS } from "./languages.js";
import { logger } from "./logger.js";
import { parseSource } from "./symbols.js";
import type {
  FileDependencies,
  FileDescriptor,
  ImportSpec,
  ParsedSource,
  ScanOptions,
  SymbolEntry,
  SymbolOccurrence,
} from "./types.js";

/**
 * Everything known about one repository after a single build. Keys are
 * repo-relative paths with forward slashes.
 */
export type SymbolIndex = {
  readonly repoRoot: string;
  /** Descriptors of files that parsed, in scan order. */
  readonly files: readonly FileDescriptor[];
  readonly symbolsByFile: ReadonlyMap<string, readonly SymbolEntry[]>;
  readonly symbolsByName: ReadonlyMap<string, readonly SymbolOccurrence[]>;
  readonly importsByFile: ReadonlyMap<string, readonly ImportSpec[]>;
  readonly graph: ImportGraph;
};

export type BuildOptions = {
  scan?: ScanOptions;
  cache?: CacheDB;
};

function parseWithCache(
  file: FileDescriptor,
  content: string,
  cache: CacheDB | undefined,
): ParsedSource | null {
  if (!cache) return parseSource(content, file.path, file.language);

  const hash = hashContent(content);
  const cached = cache.getParsed(file.relativePath, hash);
  if (cached) return cached;

  const parsed = parseSource(content, file.path, file.language);
  if (parsed) {
    cache.putParsed(file.relativePath, hash, file.language, parsed);
  } else {
    cache.deleteParsed(file.relativePath);
  }
  return parsed;
}

export function buildSymbolIndex(repoRoot: string, opts: BuildOptions = {}): SymbolIndex {
  const start = performance.now();
  const root = assertProjectRoot(repoRoot);

  const descriptors = [
    ...scanRepository(root, {
      ...opts.scan,
      includeExtensions: opts.scan?.includeExtensions ?? [...PARSEABLE_EXTENSIONS],
    }),
  ];

  const files: FileDescriptor[] = [];
  const symbolsByFile = new Map<string, SymbolEntry[]>();
  const symbolsByName = new Map<string, SymbolOccurrence[]>();
  const importsByFile = new Map<string, ImportSpec[]>();

  for (const file of descriptors) {
    let content: string;
    try {
      content = fs.readFileSync(file.path, "utf-8");
    } catch (err) {
      logger.debug(`Skipping ${file.relativePath}: ${String(err)}`);
      continue;
    }

    const parsed = parseWithCache(file, content, opts.cache);
    if (!parsed) {
      logger.debug(`Skipping ${file.relativePath}: could not parse`);
      continue;
    }

    files.push(file);
    symbolsByFile.set(file.relativePath, parsed.symbols);
    importsByFile.set(file.relativePath, parsed.imports);
    for (const symbol of parsed.symbols) {
      let bucket = symbolsByName.get(symbol.name);
      if (!bucket) {
        bucket = [];
        symbolsByName.set(symbol.name, bucket);
      }
      bucket.push({ path: file.relativePath, symbol });
    }
  }

  const ctx = createResolverContext(
    root,
    new Set(descriptors.map((file) => file.relativePath)),
  );
  const graph = new ImportGraph();
  for (const [importer, imports] of importsByFile) {
    for (const spec of imports) {
      const resolution = resolveImport(ctx, importer, spec);
      if (resolution.status === "resolved" && resolution.path !== importer) {
        graph.addEdge(importer, resolution.path);
      }
    }
  }
  graph.freeze();

  opts.cache?.prune(new Set(descriptors.map((file) => file.relativePath)));

  const symbolCount = [...symbolsByFile.values()].reduce((sum, list) => sum + list.length, 0);
  logger.indexSummary(files.length, symbolCount, graph.edgeCount(), performance.now() - start);

  return { repoRoot: root, files, symbolsByFile, symbolsByName, importsByFile, graph };
}

export function findSymbol(index: SymbolIndex, name: string): readonly SymbolOccurrence[] {
  return index.symbolsByName.get(name) ?? [];
}

/** Names defined more than once resolve to the first file in scan order. */
export function firstDefinition(index: SymbolIndex, name: string): SymbolOccurrence | undefined {
  return index.symbolsByName.get(name)?.[0];
}

export function getFileDependencies(index: SymbolIndex, relPath: string): FileDependencies {
  const symbols = index.symbolsByFile.get(relPath);
  if (!symbols) {
    throw new RepoGraphError(ErrorCodes.FILE_NOT_FOUND, `File not indexed: ${relPath}`);
  }
  return {
    file: relPath,
    imports: [...index.graph.importsOf(relPath)].sort(),
    importedBy: [...index.graph.importedBy(relPath)].sort(),
    symbols: [...symbols],
  };
}
