import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { RepoGraphError } from "../src/errors.js";

/** Write `files` (repo-relative path to content) under a fresh temp dir. */
export function createProject(files: Record<string, string>, prefix = "repograph-"): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  for (const [relPath, content] of Object.entries(files)) {
    const full = path.join(dir, relPath);
    fs.mkdirSync(path.dirname(full), { recursive: true });
    fs.writeFileSync(full, content);
  }
  return dir;
}

export function removeProject(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function lines(...rows: string[]): string {
  return `${rows.join("\n")}\n`;
}

/** Code of the RepoGraphError thrown by `fn`, if any. */
export function errorCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    return err instanceof RepoGraphError ? err.code : undefined;
  }
  return undefined;
}
