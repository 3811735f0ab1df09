import type { SymbolIndex } from "../symbolIndex.js";
import type { Usage, UsageKind } from "../types.js";
import { SourceReader, escapeRegExp } from "./source.js";

export const MAX_USAGE_CONTENT = 150;

const FUNCTION_DEFINITION_PREFIXES = [
  "def ",
  "async def ",
  "function ",
  "async function ",
  "export function ",
  "export async function ",
  "export default function ",
];

const CLASS_DEFINITION_PREFIXES = [
  "class ",
  "abstract class ",
  "export class ",
  "export abstract class ",
  "export default class ",
];

const IMPORT_LINE = /^(import|from)\s|\brequire\s*\(|^export\s.*\sfrom\s/;

export function classifyUsage(line: string, name: string): UsageKind {
  const text = line.trim();

  if (FUNCTION_DEFINITION_PREFIXES.some((p) => text.startsWith(p)) && text.includes(`${name}(`)) {
    return "definition";
  }
  if (CLASS_DEFINITION_PREFIXES.some((p) => text.startsWith(p))) {
    return "definition";
  }
  if (IMPORT_LINE.test(text)) return "import";
  if (text.includes(`${name}(`)) return "call";
  if (text.includes(`.${name}`)) return "attribute";
  if (text.includes(`${name} =`) || text.includes(`${name}:`)) return "assignment";
  return "reference";
}

/** Every line of an indexed file that mentions `name` as a whole word. */
export function findUsages(
  index: SymbolIndex,
  name: string,
  reader = new SourceReader(index.repoRoot),
): Usage[] {
  const pattern = new RegExp(`\\b${escapeRegExp(name)}\\b`);
  const usages: Usage[] = [];

  for (const file of index.files) {
    const lines = reader.lines(file.relativePath);
    if (!lines) continue;

    lines.forEach((line, i) => {
      if (!pattern.test(line)) return;
      usages.push({
        file: file.relativePath,
        line: i + 1,
        content: line.trim().slice(0, MAX_USAGE_CONTENT),
        type: classifyUsage(line, name),
      });
    });
  }

  return usages;
}
