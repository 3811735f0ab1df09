import fs from "node:fs";
import path from "node:path";
import ignoreModule from "ignore";
import micromatch from "micromatch";
import { ErrorCodes, RepoGraphError } from "./errors.js";
import { languageForExtension } from "./languages.js";
import { logger } from "./logger.js";
import type { FileDescriptor, ScanOptions } from "./types.js";

// The package ships CommonJS with an `export default` typing; under NodeNext
// the factory sits on `.default`, which the package also sets at runtime.
const createIgnore = ignoreModule.default;
type IgnoreMatcher = ReturnType<typeof createIgnore>;

export const DEFAULT_MAX_DEPTH = 15;
export const MAX_FILE_SIZE_BYTES = 1_000_000;

export const DEFAULT_IGNORE_PATTERNS: readonly string[] = [
  ".git/",
  ".git",
  "__pycache__/",
  "*.pyc",
  "node_modules/",
  ".venv/",
  "venv/",
  ".env",
  "dist/",
  "build/",
  "*.egg-info/",
  ".idea/",
  ".vscode/",
  "*.min.js",
  "*.min.css",
  "*.map",
  ".DS_Store",
  "Thumbs.db",
  "*.log",
  "coverage/",
  ".pytest_cache/",
  ".mypy_cache/",
  ".ruff_cache/",
];

const MM_OPTS = { dot: true } as const;

export function readGitignore(repoRoot: string): string[] {
  const gitignorePath = path.join(repoRoot, ".gitignore");
  let raw: string;
  try {
    raw = fs.readFileSync(gitignorePath, "utf-8");
  } catch {
    return [];
  }
  return raw
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("#"));
}

export function loadIgnoreRules(repoRoot: string, extra: string[] = []): IgnoreMatcher {
  return createIgnore()
    .add([...DEFAULT_IGNORE_PATTERNS])
    .add(readGitignore(repoRoot))
    .add(extra);
}

type WalkState = {
  rules: IgnoreMatcher;
  maxDepth: number;
  maxFileSize: number;
  extensions: Set<string> | null;
  patterns: string[];
};

function readEntries(dir: string): fs.Dirent[] {
  try {
    return fs
      .readdirSync(dir, { withFileTypes: true })
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  } catch (err) {
    logger.debug(`Skipping unreadable directory ${dir}: ${String(err)}`);
    return [];
  }
}

function* walk(state: WalkState, dir: string, relDir: string, depth: number): Generator<FileDescriptor> {
  if (depth > state.maxDepth) return;

  for (const ent of readEntries(dir)) {
    const relPath = relDir ? `${relDir}/${ent.name}` : ent.name;
    const full = path.join(dir, ent.name);

    if (ent.isDirectory()) {
      if (ent.name.startsWith(".")) continue;
      if (state.rules.ignores(`${relPath}/`)) continue;
      yield* walk(state, full, relPath, depth + 1);
      continue;
    }

    if (!ent.isFile() && !ent.isSymbolicLink()) continue;
    if (state.rules.ignores(relPath)) continue;

    const extension = path.extname(ent.name).toLowerCase();
    if (state.extensions && !state.extensions.has(extension)) continue;
    if (
      state.patterns.length > 0 &&
      !state.patterns.some((p) => micromatch.isMatch(relPath, p, MM_OPTS))
    ) {
      continue;
    }

    let stat: fs.Stats;
    try {
      stat = fs.statSync(full);
    } catch (err) {
      logger.debug(`Skipping ${relPath}: ${String(err)}`);
      continue;
    }
    if (!stat.isFile()) continue;
    if (stat.size > state.maxFileSize) {
      logger.debug(`Skipping ${relPath}: ${stat.size} bytes exceeds size limit`);
      continue;
    }

    yield {
      path: full,
      relativePath: relPath,
      extension,
      sizeBytes: stat.size,
      language: languageForExtension(extension),
    };
  }
}

/** Repo-relative, forward-slash form of a path given relative to the root or absolute. */
export function toRepoPath(repoRoot: string, filePath: string): string {
  const abs = path.resolve(repoRoot, filePath);
  return path.relative(repoRoot, abs).split(path.sep).join("/");
}

export function isInsideRoot(repoPath: string): boolean {
  return repoPath !== "" && repoPath !== ".." && !repoPath.startsWith("../") && !path.isAbsolute(repoPath);
}

export function assertProjectRoot(repoRoot: string): string {
  const root = path.resolve(repoRoot);
  let isDir = false;
  try {
    isDir = fs.statSync(root).isDirectory();
  } catch {
    isDir = false;
  }
  if (!isDir) {
    throw new RepoGraphError(
      ErrorCodes.PROJECT_NOT_FOUND,
      `Project path does not exist: ${root}`,
    );
  }
  return root;
}

/** Whether `filePath` names a regular file under the root; directories do not count. */
export function isRepoFile(repoRoot: string, filePath: string): boolean {
  const relPath = toRepoPath(repoRoot, filePath);
  if (!isInsideRoot(relPath)) return false;
  try {
    return fs.statSync(path.join(repoRoot, relPath)).isFile();
  } catch {
    return false;
  }
}

/** Repo-relative path of a regular file under the root. */
export function resolveRepoFile(repoRoot: string, filePath: string): string {
  if (!isRepoFile(repoRoot, filePath)) {
    throw new RepoGraphError(ErrorCodes.FILE_NOT_FOUND, `File not found: ${filePath}`);
  }
  return toRepoPath(repoRoot, filePath);
}

/**
 * Walk the repository lazily. Ignored and hidden directories are pruned
 * before their contents are read.
 */
export function* scanRepository(
  repoRoot: string,
  opts: ScanOptions = {},
): Generator<FileDescriptor> {
  const root = assertProjectRoot(repoRoot);
  const state: WalkState = {
    rules: loadIgnoreRules(root, opts.ignore),
    maxDepth: opts.maxDepth ?? DEFAULT_MAX_DEPTH,
    maxFileSize: opts.maxFileSizeBytes ?? MAX_FILE_SIZE_BYTES,
    extensions: opts.includeExtensions
      ? new Set(opts.includeExtensions.map((ext) => ext.toLowerCase()))
      : null,
    patterns: opts.patterns ?? [],
  };

  yield* walk(state, root, "", 0);
}

export function discoverFiles(repoRoot: string, opts: ScanOptions = {}): FileDescriptor[] {
  return [...scanRepository(repoRoot, opts)];
}
