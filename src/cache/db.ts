import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { logger } from "../logger.js";
import type {
  ImportKind,
  ImportSpec,
  Language,
  ParsedSource,
  SymbolEntry,
  SymbolKind,
} from "../types.js";
import { migrate } from "./schema.js";

/** Bump when adapter output changes shape or content. */
export const EXTRACTOR_VERSION = "1";

export const CACHE_DIR = ".repograph";
export const CACHE_FILE = "cache.db";

type DB = Database.Database;

type ParsedFileRow = {
  hash: string;
  extractor_version: string;
  payload: string;
};

export type CacheStats = {
  cachePath: string;
  entries: number;
  extractorVersion: string | null;
};

export function hashContent(content: string): string {
  return crypto.createHash("sha256").update(content).digest("hex");
}

const SYMBOL_KINDS: ReadonlySet<string> = new Set<SymbolKind>([
  "function",
  "method",
  "class",
  "variable",
  "import",
]);

const IMPORT_KINDS: ReadonlySet<string> = new Set<ImportKind>([
  "import",
  "from_import",
  "export_from",
  "require",
  "dynamic_import",
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function isSymbolEntry(value: unknown): value is SymbolEntry {
  return (
    isRecord(value) &&
    typeof value.name === "string" &&
    typeof value.kind === "string" &&
    SYMBOL_KINDS.has(value.kind) &&
    typeof value.signature === "string" &&
    typeof value.startLine === "number" &&
    typeof value.endLine === "number" &&
    typeof value.docstring === "string" &&
    typeof value.parent === "string"
  );
}

function isImportSpec(value: unknown): value is ImportSpec {
  return (
    isRecord(value) &&
    typeof value.module === "string" &&
    Array.isArray(value.items) &&
    value.items.every((item) => typeof item === "string") &&
    typeof value.alias === "string" &&
    typeof value.isRelative === "boolean" &&
    typeof value.kind === "string" &&
    IMPORT_KINDS.has(value.kind)
  );
}

export function isParsedSource(value: unknown): value is ParsedSource {
  return (
    isRecord(value) &&
    Array.isArray(value.symbols) &&
    value.symbols.every(isSymbolEntry) &&
    Array.isArray(value.imports) &&
    value.imports.every(isImportSpec)
  );
}

export class CacheDB {
  private db: DB;
  private cachePath: string;

  constructor(db: DB, cachePath: string) {
    this.db = db;
    this.cachePath = cachePath;
  }

  get path(): string {
    return this.cachePath;
  }

  close(): void {
    this.db.close();
  }

  getMeta(key: string): string | null {
    const row = this.db
      .prepare<[string], { value: string }>("SELECT value FROM meta WHERE key = ?")
      .get(key);
    return row?.value ?? null;
  }

  setMeta(key: string, value: string): void {
    this.db
      .prepare(
        "INSERT INTO meta (key, value) VALUES (?, ?) ON CONFLICT(key) DO UPDATE SET value = excluded.value",
      )
      .run(key, value);
  }

  /**
   * Cached parse result for a file, or undefined when there is none for
   * this exact content.
   */
  getParsed(relPath: string, hash: string): ParsedSource | undefined {
    const row = this.db
      .prepare<[string], ParsedFileRow>(
        "SELECT hash, extractor_version, payload FROM parsed_files WHERE path = ?",
      )
      .get(relPath);
    if (!row) return undefined;
    if (row.hash !== hash || row.extractor_version !== EXTRACTOR_VERSION) {
      return undefined;
    }

    let payload: unknown;
    try {
      payload = JSON.parse(row.payload);
    } catch (err) {
      logger.debug(`Discarding corrupt cache entry for ${relPath}: ${String(err)}`);
      this.deleteParsed(relPath);
      return undefined;
    }
    if (!isParsedSource(payload)) {
      this.deleteParsed(relPath);
      return undefined;
    }
    return payload;
  }

  putParsed(relPath: string, hash: string, language: Language, parsed: ParsedSource): void {
    this.db
      .prepare(
        `INSERT INTO parsed_files (path, hash, language, extractor_version, payload, updated_at)
         VALUES (?, ?, ?, ?, ?, ?)
         ON CONFLICT(path) DO UPDATE SET
           hash = excluded.hash,
           language = excluded.language,
           extractor_version = excluded.extractor_version,
           payload = excluded.payload,
           updated_at = excluded.updated_at`,
      )
      .run(
        relPath,
        hash,
        language,
        EXTRACTOR_VERSION,
        JSON.stringify(parsed),
        new Date().toISOString(),
      );
  }

  deleteParsed(relPath: string): void {
    this.db.prepare("DELETE FROM parsed_files WHERE path = ?").run(relPath);
  }

  /** Drop entries for files that no longer exist in the scan. */
  prune(keep: ReadonlySet<string>): number {
    const rows = this.db.prepare<[], { path: string }>("SELECT path FROM parsed_files").all();
    const stale = rows.filter((row) => !keep.has(row.path));
    const remove = this.db.transaction((paths: string[]) => {
      const stmt = this.db.prepare("DELETE FROM parsed_files WHERE path = ?");
      for (const p of paths) stmt.run(p);
    });
    remove(stale.map((row) => row.path));
    return stale.length;
  }

  countEntries(): number {
    const row = this.db
      .prepare<[], { count: number }>("SELECT COUNT(*) as count FROM parsed_files")
      .get();
    return row?.count ?? 0;
  }

  getStats(): CacheStats {
    return {
      cachePath: this.cachePath,
      entries: this.countEntries(),
      extractorVersion: this.getMeta("extractor_version"),
    };
  }
}

function applyPragmas(db: DB): void {
  db.pragma("journal_mode = WAL");
  db.pragma("synchronous = NORMAL");
  db.pragma("busy_timeout = 5000");
  db.pragma("temp_store = MEMORY");
}

/** Entries written by an older extractor are dropped on open. */
function ensureExtractorVersion(cache: CacheDB): void {
  const stored = cache.getMeta("extractor_version");
  if (stored === EXTRACTOR_VERSION) return;
  if (stored !== null) {
    logger.verbose(`Parse cache version ${stored} is stale; clearing`);
  }
  cache.prune(new Set());
  cache.setMeta("extractor_version", EXTRACTOR_VERSION);
}

export function openCache(repoRoot: string): CacheDB {
  const cacheDir = path.join(repoRoot, CACHE_DIR);
  fs.mkdirSync(cacheDir, { recursive: true });
  const cachePath = path.join(cacheDir, CACHE_FILE);

  const db = new Database(cachePath);
  applyPragmas(db);
  migrate(db);

  const cache = new CacheDB(db, cachePath);
  ensureExtractorVersion(cache);
  return cache;
}
