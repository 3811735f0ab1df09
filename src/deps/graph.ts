const EMPTY: ReadonlySet<string> = new Set();

/**
 * File-level import graph. Both directions are written by `addEdge` only,
 * so `b ∈ importsOf(a)` exactly when `a ∈ importedBy(b)`.
 */
export class ImportGraph {
  private readonly forward = new Map<string, Set<string>>();
  private readonly reverse = new Map<string, Set<string>>();
  private frozen = false;

  addEdge(from: string, to: string): void {
    if (this.frozen) {
      throw new Error("ImportGraph is frozen");
    }

    let out = this.forward.get(from);
    if (!out) {
      out = new Set();
      this.forward.set(from, out);
    }
    let inc = this.reverse.get(to);
    if (!inc) {
      inc = new Set();
      this.reverse.set(to, inc);
    }
    out.add(to);
    inc.add(from);
  }

  freeze(): this {
    this.frozen = true;
    return this;
  }

  isFrozen(): boolean {
    return this.frozen;
  }

  importsOf(file: string): ReadonlySet<string> {
    return this.forward.get(file) ?? EMPTY;
  }

  importedBy(file: string): ReadonlySet<string> {
    return this.reverse.get(file) ?? EMPTY;
  }

  /** Every edge as `[from, to]`, sorted. */
  edges(): Array<[string, string]> {
    const out: Array<[string, string]> = [];
    for (const [from, targets] of this.forward) {
      for (const to of targets) {
        out.push([from, to]);
      }
    }
    return out.sort((a, b) => a[0].localeCompare(b[0]) || a[1].localeCompare(b[1]));
  }

  edgeCount(): number {
    let count = 0;
    for (const targets of this.forward.values()) {
      count += targets.size;
    }
    return count;
  }

  /** Files that appear on either end of an edge, sorted. */
  nodes(): string[] {
    return [...new Set([...this.forward.keys(), ...this.reverse.keys()])].sort();
  }
}
