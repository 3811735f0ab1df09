import path from "node:path";
import type { Language } from "./types.js";

const EXTENSION_MAP: Record<string, Language> = {
  // Python
  ".py": "python",
  ".pyw": "python",

  // TypeScript
  ".ts": "typescript",
  ".tsx": "typescript",
  ".mts": "typescript",
  ".cts": "typescript",

  // JavaScript
  ".js": "javascript",
  ".jsx": "javascript",
  ".mjs": "javascript",
  ".cjs": "javascript",

  // Recognised for stats only
  ".json": "json",
  ".yaml": "yaml",
  ".yml": "yaml",
  ".md": "markdown",
  ".txt": "text",
  ".html": "html",
  ".css": "css",
  ".scss": "scss",
  ".sql": "sql",
  ".sh": "shell",
  ".bash": "shell",
  ".toml": "toml",
  ".ini": "ini",
  ".cfg": "ini",
  ".xml": "xml",
  ".go": "go",
  ".rs": "rust",
  ".java": "java",
  ".c": "c",
  ".h": "c",
  ".cpp": "cpp",
  ".hpp": "cpp",
};

const SYMBOL_LANGUAGES = new Set<Language>(["python", "typescript", "javascript"]);

export const PARSEABLE_EXTENSIONS: readonly string[] = Object.entries(EXTENSION_MAP)
  .filter(([, language]) => SYMBOL_LANGUAGES.has(language))
  .map(([ext]) => ext);

export function languageForExtension(extension: string): Language {
  return EXTENSION_MAP[extension.toLowerCase()] ?? "unknown";
}

export function detectLanguage(filePath: string): Language {
  return languageForExtension(path.extname(filePath));
}

export function canExtractSymbols(language: Language): boolean {
  return SYMBOL_LANGUAGES.has(language);
}
