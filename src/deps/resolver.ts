import fs from "node:fs";
import path from "node:path";
import { detectLanguage } from "../languages.js";
import type { ImportResolution, ImportSpec } from "../types.js";

const TS_EXTENSIONS = [".ts", ".tsx", ".mts", ".cts", ".js", ".jsx", ".mjs", ".cjs"];

const INDEX_FILES = TS_EXTENSIONS.map((ext) => `index${ext}`);

// Compiled output names that point at a TypeScript source.
const JS_TO_TS: Record<string, string[]> = {
  ".js": [".ts", ".tsx"],
  ".jsx": [".tsx"],
  ".mjs": [".mts"],
  ".cjs": [".cts"],
};

const PYTHON_EXTENSIONS = [".py", ".pyw"];
const PYTHON_PACKAGE_ENTRY = "__init__.py";

export type ResolverContext = {
  repoRoot: string;
  /** Repo-relative paths known to exist, checked before the filesystem. */
  fileIndex?: ReadonlySet<string>;
};

export function createResolverContext(
  repoRoot: string,
  fileIndex?: ReadonlySet<string>,
): ResolverContext {
  return { repoRoot, fileIndex };
}

function isOutsideRoot(repoPath: string): boolean {
  return repoPath === ".." || repoPath.startsWith("../") || path.posix.isAbsolute(repoPath);
}

function fileExistsRepo(ctx: ResolverContext, repoPath: string): boolean {
  if (ctx.fileIndex?.has(repoPath)) return true;
  try {
    return fs.statSync(path.join(ctx.repoRoot, repoPath)).isFile();
  } catch {
    return false;
  }
}

function firstExisting(ctx: ResolverContext, candidates: string[]): string | null {
  for (const candidate of candidates) {
    if (fileExistsRepo(ctx, candidate)) return candidate;
  }
  return null;
}

/**
 * `from ..pkg.mod import x`: one dot is the importer's directory, each
 * further dot goes up one level.
 */
function resolvePythonModule(
  ctx: ResolverContext,
  importerPath: string,
  module: string,
): ImportResolution {
  const match = /^(\.*)(.*)$/.exec(module);
  const dots = match ? match[1].length : 0;
  const rest = match ? match[2] : module;

  let base = path.posix.dirname(importerPath);
  for (let i = 1; i < dots; i += 1) {
    base = path.posix.join(base, "..");
  }

  const segments = rest.split(".").filter((segment) => segment.length > 0);
  const target = path.posix.normalize(path.posix.join(base, ...segments));
  if (isOutsideRoot(target)) {
    return { status: "unresolved", reason: "outside_root" };
  }

  const candidates =
    segments.length === 0
      ? [path.posix.join(target, PYTHON_PACKAGE_ENTRY)]
      : [
          ...PYTHON_EXTENSIONS.map((ext) => `${target}${ext}`),
          path.posix.join(target, PYTHON_PACKAGE_ENTRY),
        ];

  const found = firstExisting(ctx, candidates);
  if (found) return { status: "resolved", path: found };
  return {
    status: "candidate",
    path: segments.length === 0 ? candidates[0] : `${target}.py`,
  };
}

function resolveCandidate(ctx: ResolverContext, candidate: string): string | null {
  const ext = path.posix.extname(candidate);
  const tryPaths: string[] = [candidate];

  const tsAlternatives = JS_TO_TS[ext];
  if (tsAlternatives) {
    const stem = candidate.slice(0, -ext.length);
    for (const alt of tsAlternatives) {
      tryPaths.push(stem + alt);
    }
  }

  if (!TS_EXTENSIONS.includes(ext)) {
    for (const extension of TS_EXTENSIONS) {
      tryPaths.push(candidate + extension);
    }
  }

  for (const indexFile of INDEX_FILES) {
    tryPaths.push(path.posix.join(candidate, indexFile));
  }

  return firstExisting(ctx, tryPaths);
}

function resolvePathModule(
  ctx: ResolverContext,
  importerPath: string,
  module: string,
): ImportResolution {
  let target = path.posix.normalize(path.posix.join(path.posix.dirname(importerPath), module));
  if (target.endsWith("/")) target = target.slice(0, -1);
  if (isOutsideRoot(target)) {
    return { status: "unresolved", reason: "outside_root" };
  }

  const found = resolveCandidate(ctx, target);
  if (found) return { status: "resolved", path: found };

  const fallbackExt = detectLanguage(importerPath) === "javascript" ? ".js" : ".ts";
  const hasExt = TS_EXTENSIONS.includes(path.posix.extname(target));
  return { status: "candidate", path: hasExt ? target : `${target}${fallbackExt}` };
}

/**
 * Map an import to the repo-relative file it names. Only relative imports
 * are followed; package imports are reported as external.
 */
export function resolveImport(
  ctx: ResolverContext,
  importerPath: string,
  spec: ImportSpec,
): ImportResolution {
  if (!spec.module) return { status: "unresolved", reason: "empty" };
  if (!spec.isRelative) return { status: "unresolved", reason: "external" };

  if (detectLanguage(importerPath) === "python") {
    return resolvePythonModule(ctx, importerPath, spec.module);
  }
  return resolvePathModule(ctx, importerPath, spec.module);
}
