import fs from "node:fs";
import path from "node:path";
import { isRepoFile } from "./fileDiscovery.js";
import { detectLanguage } from "./languages.js";
import { parseSource } from "./symbols.js";
import type { CompressedContext, CompressionMode } from "./types.js";

/** Files longer than this are summarised in smart mode. */
export const SMART_LINE_THRESHOLD = 100;
export const CHARS_PER_TOKEN = 4;

export type CompressOptions = {
  /** Token budget; files after the point it is reached are omitted. */
  budget?: number;
};

export function estimateTokens(text: string): number {
  return Math.floor(text.length / CHARS_PER_TOKEN);
}

function renderFull(relPath: string, content: string): string {
  return `### ${relPath}\n\`\`\`\n${content}\n\`\`\`\n`;
}

function renderSignatures(relPath: string, absPath: string, content: string): string {
  const parsed = parseSource(content, absPath);
  if (!parsed) return `### ${relPath} (could not parse)\n`;

  const keyword = detectLanguage(absPath) === "python" ? "def" : "function";
  const lines = [`### ${relPath} (signatures only)`];
  for (const symbol of parsed.symbols) {
    const indent = symbol.parent ? "    " : "";
    if (symbol.kind === "class") {
      lines.push(`${indent}class ${symbol.name}:`);
    } else if (symbol.kind === "function" || symbol.kind === "method") {
      lines.push(`${indent}${keyword} ${symbol.name}${symbol.signature}`);
    }
  }
  return `${lines.join("\n")}\n`;
}

function renderFile(repoRoot: string, relPath: string, mode: CompressionMode): string {
  const absPath = path.resolve(repoRoot, relPath);
  if (!isRepoFile(repoRoot, relPath)) {
    return `### ${relPath} (not found)\n`;
  }

  let content: string;
  try {
    content = fs.readFileSync(absPath, "utf-8");
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    return `### ${relPath} (error: ${reason})\n`;
  }

  const useSignatures =
    mode === "signatures" ||
    (mode === "smart" && content.split("\n").length > SMART_LINE_THRESHOLD);
  return useSignatures ? renderSignatures(relPath, absPath, content) : renderFull(relPath, content);
}

/**
 * Render files for a prompt. Sections are packed in order; with a budget,
 * packing stops once the running estimate reaches it, so the last file
 * included may overshoot.
 */
export function compressContext(
  repoRoot: string,
  files: string[],
  mode: CompressionMode = "smart",
  opts: CompressOptions = {},
): CompressedContext {
  const root = path.resolve(repoRoot);
  const sections: string[] = [];
  const filesIncluded: string[] = [];
  const omitted: string[] = [];

  for (const file of files) {
    if (opts.budget !== undefined && estimateTokens(sections.join("\n")) >= opts.budget) {
      omitted.push(file);
      continue;
    }
    sections.push(renderFile(root, file, mode));
    filesIncluded.push(file);
  }

  const content = sections.join("\n");
  return {
    content,
    mode,
    filesIncluded,
    omitted,
    estimatedTokens: estimateTokens(content),
  };
}
