/**
 * Project configuration.
 *
 * Sources, lowest precedence first:
 * - built-in defaults
 * - `.repographrc.json` at the repository root
 * - explicit overrides (CLI options)
 */

import fs from "node:fs";
import path from "node:path";
import { ErrorCodes, RepoGraphError } from "./errors.js";

export const CONFIG_FILE = ".repographrc.json";

export type RepoGraphConfig = {
  /** Directories deeper than this are not scanned. */
  maxDepth: number;
  /** Extra gitignore-style patterns, on top of defaults and .gitignore. */
  ignore: string[];
  /** Globs a file must match to be scanned; empty means all files. */
  patterns: string[];
  /** Reuse parse results from `.repograph/cache.db`. */
  cache: boolean;
  /** Token budget for the repository map. */
  mapTokens: number;
};

export const DEFAULT_CONFIG: RepoGraphConfig = {
  maxDepth: 15,
  ignore: [],
  patterns: [],
  cache: false,
  mapTokens: 8000,
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readPositiveInt(raw: Record<string, unknown>, key: string, source: string): number | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
    throw new RepoGraphError(
      ErrorCodes.INVALID_CONFIG,
      `${source}: "${key}" must be a non-negative integer.`,
    );
  }
  return value;
}

function readStringList(raw: Record<string, unknown>, key: string, source: string): string[] | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === "string")) {
    throw new RepoGraphError(
      ErrorCodes.INVALID_CONFIG,
      `${source}: "${key}" must be an array of strings.`,
    );
  }
  return value;
}

export function validateConfig(raw: unknown, source = CONFIG_FILE): Partial<RepoGraphConfig> {
  if (!isRecord(raw)) {
    throw new RepoGraphError(ErrorCodes.INVALID_CONFIG, `${source}: expected a JSON object.`);
  }

  const out: Partial<RepoGraphConfig> = {};
  const maxDepth = readPositiveInt(raw, "maxDepth", source);
  if (maxDepth !== undefined) out.maxDepth = maxDepth;
  const mapTokens = readPositiveInt(raw, "mapTokens", source);
  if (mapTokens !== undefined) out.mapTokens = mapTokens;
  const ignore = readStringList(raw, "ignore", source);
  if (ignore) out.ignore = ignore;
  const patterns = readStringList(raw, "patterns", source);
  if (patterns) out.patterns = patterns;

  if (raw.cache !== undefined) {
    if (typeof raw.cache !== "boolean") {
      throw new RepoGraphError(ErrorCodes.INVALID_CONFIG, `${source}: "cache" must be a boolean.`);
    }
    out.cache = raw.cache;
  }

  return out;
}

export function loadConfig(
  repoRoot: string,
  overrides: Partial<RepoGraphConfig> = {},
): RepoGraphConfig {
  const configPath = path.join(repoRoot, CONFIG_FILE);
  let fromFile: Partial<RepoGraphConfig> = {};

  if (fs.existsSync(configPath)) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(configPath, "utf-8"));
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new RepoGraphError(ErrorCodes.INVALID_CONFIG, `${CONFIG_FILE}: ${reason}`);
    }
    fromFile = validateConfig(parsed);
  }

  return {
    maxDepth: overrides.maxDepth ?? fromFile.maxDepth ?? DEFAULT_CONFIG.maxDepth,
    ignore: [...DEFAULT_CONFIG.ignore, ...(fromFile.ignore ?? []), ...(overrides.ignore ?? [])],
    patterns: overrides.patterns ?? fromFile.patterns ?? DEFAULT_CONFIG.patterns,
    cache: overrides.cache ?? fromFile.cache ?? DEFAULT_CONFIG.cache,
    mapTokens: overrides.mapTokens ?? fromFile.mapTokens ?? DEFAULT_CONFIG.mapTokens,
  };
}
