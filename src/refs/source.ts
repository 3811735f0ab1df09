import fs from "node:fs";
import path from "node:path";
import { logger } from "../logger.js";

/** Reads repository files once per query and hands out their text or lines. */
export class SourceReader {
  private readonly texts = new Map<string, string | null>();
  private readonly splits = new Map<string, string[] | null>();

  constructor(private readonly repoRoot: string) {}

  text(relPath: string): string | null {
    const hit = this.texts.get(relPath);
    if (hit !== undefined) return hit;

    let text: string | null;
    try {
      text = fs.readFileSync(path.join(this.repoRoot, relPath), "utf-8");
    } catch (err) {
      logger.debug(`Cannot read ${relPath}: ${String(err)}`);
      text = null;
    }
    this.texts.set(relPath, text);
    return text;
  }

  lines(relPath: string): string[] | null {
    const hit = this.splits.get(relPath);
    if (hit !== undefined) return hit;

    const text = this.text(relPath);
    const lines = text === null ? null : text.split(/\r?\n/);
    this.splits.set(relPath, lines);
    return lines;
  }

  /** Lines `startLine..endLine` (1-based, inclusive) joined with newlines. */
  slice(relPath: string, startLine: number, endLine: number): string {
    const lines = this.lines(relPath);
    if (!lines) return "";
    return lines.slice(startLine - 1, endLine).join("\n");
  }
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
