import fs from "node:fs";
import { detectLanguage } from "./languages.js";
import { logger } from "./logger.js";
import { extractPythonSymbols } from "./symbols-python.js";
import { extractTsSymbols } from "./symbols-ts.js";
import type { Language, ParsedFile, ParsedSource } from "./types.js";

export type ParseAdapter = {
  readonly languages: readonly Language[];
  parse(content: string, filePath: string): ParsedSource | null;
};

export const pythonAdapter: ParseAdapter = {
  languages: ["python"],
  parse: (content) => extractPythonSymbols(content),
};

export const typescriptAdapter: ParseAdapter = {
  languages: ["typescript", "javascript"],
  parse: (content, filePath) => extractTsSymbols(filePath, content),
};

let registry: ReadonlyMap<Language, ParseAdapter> | null = null;

function getRegistry(): ReadonlyMap<Language, ParseAdapter> {
  if (!registry) {
    const map = new Map<Language, ParseAdapter>();
    for (const adapter of [pythonAdapter, typescriptAdapter]) {
      for (const language of adapter.languages) {
        map.set(language, adapter);
      }
    }
    registry = map;
  }
  return registry;
}

export function getAdapter(language: Language): ParseAdapter | undefined {
  return getRegistry().get(language);
}

/**
 * Parse source text with the adapter for its language. Null when no
 * adapter exists or the source does not parse.
 */
export function parseSource(
  content: string,
  filePath: string,
  language: Language = detectLanguage(filePath),
): ParsedSource | null {
  const adapter = getAdapter(language);
  if (!adapter) return null;
  try {
    return adapter.parse(content, filePath);
  } catch (err) {
    logger.debug(`Parse failed for ${filePath}: ${String(err)}`);
    return null;
  }
}

export function publicNames(parsed: ParsedSource): string[] {
  return parsed.symbols.filter((s) => !s.name.startsWith("_")).map((s) => s.name);
}

export function toParsedFile(filePath: string, parsed: ParsedSource): ParsedFile {
  return {
    path: filePath,
    language: detectLanguage(filePath),
    symbols: parsed.symbols,
    imports: parsed.imports,
    exports: publicNames(parsed),
  };
}

export function parseFile(filePath: string): ParsedFile | null {
  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    logger.debug(`Cannot read ${filePath}: ${String(err)}`);
    return null;
  }

  const parsed = parseSource(content, filePath);
  return parsed ? toParsedFile(filePath, parsed) : null;
}
