import { ErrorCodes, RepoGraphError } from "../errors.js";
import { detectLanguage } from "../languages.js";
import { firstDefinition, type SymbolIndex } from "../symbolIndex.js";
import type {
  CallDirection,
  CalleeEntry,
  CallerEntry,
  CallGraphResult,
  FlowStep,
  FlowTrace,
  Language,
  SymbolOccurrence,
} from "../types.js";
import { SourceReader, escapeRegExp } from "./source.js";

export const MAX_CALLEES_PER_SYMBOL = 30;
export const MAX_CALLERS = 50;
export const FLOW_FANOUT = 5;
export const DEFAULT_FLOW_DEPTH = 10;

const CALL_TOKEN = /\b([a-zA-Z_][a-zA-Z0-9_]*)\s*\(/g;

// Control flow and builtins that look like calls.
const PYTHON_NON_CALLS: ReadonlySet<string> = new Set([
  "if", "elif", "for", "while", "with", "try", "except", "return", "yield",
  "await", "lambda", "assert", "not", "and", "or", "in",
  "print", "len", "str", "int", "float", "list", "dict", "set", "tuple",
  "range", "enumerate", "zip", "map", "filter", "sorted", "open",
]);

const SCRIPT_NON_CALLS: ReadonlySet<string> = new Set([
  "if", "for", "while", "do", "else", "switch", "try", "catch", "with",
  "return", "typeof", "instanceof", "void", "delete", "in", "of",
  "function", "async", "await", "yield", "super", "import", "require",
  "constructor",
]);

function nonCallsFor(language: Language): ReadonlySet<string> {
  return language === "python" ? PYTHON_NON_CALLS : SCRIPT_NON_CALLS;
}

/**
 * Names that appear as `name(` inside the symbol's own line range, in
 * order of first appearance.
 */
export function scanCallees(reader: SourceReader, occ: SymbolOccurrence): string[] {
  const body = reader.slice(occ.path, occ.symbol.startLine, occ.symbol.endLine);
  const skip = nonCallsFor(detectLanguage(occ.path));
  const names: string[] = [];
  const seen = new Set<string>();

  for (const match of body.matchAll(CALL_TOKEN)) {
    const name = match[1];
    if (skip.has(name) || name === occ.symbol.name || seen.has(name)) continue;
    seen.add(name);
    names.push(name);
    if (names.length >= MAX_CALLEES_PER_SYMBOL) break;
  }

  return names;
}

function findCallees(
  index: SymbolIndex,
  reader: SourceReader,
  target: SymbolOccurrence,
  depth: number,
): CalleeEntry[] {
  const result: CalleeEntry[] = [];
  const seen = new Set<string>([target.symbol.name]);
  let frontier: SymbolOccurrence[] = [target];

  for (let level = 1; level <= depth && frontier.length > 0; level += 1) {
    const next: SymbolOccurrence[] = [];
    for (const current of frontier) {
      for (const name of scanCallees(reader, current)) {
        if (seen.has(name)) continue;
        seen.add(name);

        const def = firstDefinition(index, name);
        if (def) {
          result.push({ function: name, depth: level, file: def.path, line: def.symbol.startLine });
          next.push(def);
        } else {
          result.push({ function: name, depth: level });
        }
      }
    }
    frontier = next;
  }

  return result;
}

function findCallersOf(
  index: SymbolIndex,
  reader: SourceReader,
  name: string,
  target: string,
  level: number,
  recorded: Set<string>,
  limit: number,
): CallerEntry[] {
  const pattern = new RegExp(`\\b${escapeRegExp(name)}\\s*\\(`);
  const callers: CallerEntry[] = [];

  for (const file of index.files) {
    const lines = reader.lines(file.relativePath);
    if (!lines || !pattern.test(lines.join("\n"))) continue;

    for (const symbol of index.symbolsByFile.get(file.relativePath) ?? []) {
      if (symbol.kind !== "function" && symbol.kind !== "method") continue;
      if (symbol.name === name || symbol.name === target) continue;

      const key = `${file.relativePath}:${symbol.startLine}:${symbol.name}`;
      if (recorded.has(key)) continue;

      const body = lines.slice(symbol.startLine - 1, symbol.endLine).join("\n");
      if (!pattern.test(body)) continue;

      recorded.add(key);
      callers.push({
        file: file.relativePath,
        function: symbol.name,
        line: symbol.startLine,
        depth: level,
      });
      if (callers.length >= limit) return callers;
    }
  }

  return callers;
}

/**
 * Callers level by level. Each caller is listed once, at the shallowest
 * level it is found, and the target never lists itself.
 */
function findCallers(
  index: SymbolIndex,
  reader: SourceReader,
  target: string,
  depth: number,
): CallerEntry[] {
  const result: CallerEntry[] = [];
  const expanded = new Set<string>();
  const recorded = new Set<string>();
  let frontier = [target];

  for (let level = 1; level <= depth && frontier.length > 0; level += 1) {
    const next: string[] = [];
    for (const name of frontier) {
      if (expanded.has(name)) continue;
      expanded.add(name);

      const limit = MAX_CALLERS - result.length;
      for (const caller of findCallersOf(index, reader, name, target, level, recorded, limit)) {
        result.push(caller);
        if (!expanded.has(caller.function)) next.push(caller.function);
      }
      if (result.length >= MAX_CALLERS) return result;
    }
    frontier = next;
  }

  return result;
}

/** Whole levels of at least `min`; `fallback` when the value is not a number. */
function clampDepth(value: number, min: number, fallback: number): number {
  return Number.isFinite(value) ? Math.max(min, Math.floor(value)) : fallback;
}

function requireDefinition(index: SymbolIndex, name: string): SymbolOccurrence {
  const def = firstDefinition(index, name);
  if (!def) {
    throw new RepoGraphError(ErrorCodes.SYMBOL_NOT_FOUND, `Symbol '${name}' not found`);
  }
  return def;
}

/**
 * Callers and callees of the first definition of `name`. Both sides are
 * textual: a call is any `name(` token inside a symbol's line range.
 */
export function getCallGraph(
  index: SymbolIndex,
  name: string,
  direction: CallDirection = "both",
  depth = 1,
): CallGraphResult {
  const target = requireDefinition(index, name);
  const reader = new SourceReader(index.repoRoot);
  const levels = clampDepth(depth, 1, 1);

  const result: CallGraphResult = {
    function: name,
    file: target.path,
    line: target.symbol.startLine,
  };
  if (direction === "callers" || direction === "both") {
    result.callers = findCallers(index, reader, name, levels);
  }
  if (direction === "callees" || direction === "both") {
    result.callees = findCallees(index, reader, target, levels);
  }
  return result;
}

/**
 * Depth-first walk of callees from `entry`. Each name is visited once;
 * names with no definition in the index end the branch as external.
 */
export function traceFlow(
  index: SymbolIndex,
  entry: string,
  maxDepth = DEFAULT_FLOW_DEPTH,
): FlowTrace {
  requireDefinition(index, entry);
  const limit = clampDepth(maxDepth, 0, DEFAULT_FLOW_DEPTH);
  const reader = new SourceReader(index.repoRoot);
  const visited = new Set<string>();
  const steps: FlowStep[] = [];

  const trace = (name: string, depth: number): void => {
    if (depth > limit || visited.has(name)) return;
    visited.add(name);

    const def = firstDefinition(index, name);
    if (!def) {
      steps.push({ type: "external", depth, function: name });
      return;
    }

    steps.push({
      type: "internal",
      depth,
      function: name,
      file: def.path,
      line: def.symbol.startLine,
      signature: def.symbol.signature,
    });

    for (const callee of scanCallees(reader, def).slice(0, FLOW_FANOUT)) {
      trace(callee, depth + 1);
    }
  };

  trace(entry, 0);
  return { entryPoint: entry, steps };
}
