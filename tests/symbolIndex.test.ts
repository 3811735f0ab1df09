import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { openCache } from "../src/cache/db.js";
import { ErrorCodes } from "../src/errors.js";
import {
  buildSymbolIndex,
  findSymbol,
  firstDefinition,
  getFileDependencies,
} from "../src/symbolIndex.js";
import type { ImportGraph } from "../src/deps/graph.js";
import { isPythonParserAvailable } from "../src/symbols-python.js";
import { createProject, errorCode, lines, removeProject } from "./helpers.js";

const describePython = isPythonParserAvailable() ? describe : describe.skip;

function expectSymmetric(graph: ImportGraph): void {
  for (const [from, to] of graph.edges()) {
    expect(graph.importedBy(to).has(from)).toBe(true);
  }
  for (const file of graph.nodes()) {
    for (const importer of graph.importedBy(file)) {
      expect(graph.importsOf(importer).has(file)).toBe(true);
    }
  }
}

const SCRIPT_PROJECT = {
  "a.ts": lines("export function helper(): number {", "  return 1;", "}"),
  "b.ts": lines(
    'import { helper } from "./a";',
    'import { join } from "node:path";',
    "",
    "export function main(): number {",
    "  return helper();",
    "}",
  ),
  "c.ts": lines('import "./c";', "export function helper(): number {", "  return 2;", "}"),
  "broken.ts": "export function (\n",
  "notes.md": "# Notes\n",
};

describe("buildSymbolIndex", () => {
  let dir: string;

  beforeEach(() => {
    dir = createProject(SCRIPT_PROJECT, "repograph-index-");
  });

  afterEach(() => {
    removeProject(dir);
  });

  it("indexes parseable files and links resolved imports", () => {
    const index = buildSymbolIndex(dir);

    expect(index.files.map((f) => f.relativePath)).toEqual(["a.ts", "b.ts", "c.ts"]);
    expect(index.symbolsByFile.has("broken.ts")).toBe(false);
    expect(index.symbolsByFile.has("notes.md")).toBe(false);
    expect(index.graph.edges()).toEqual([["b.ts", "a.ts"]]);
    expect(index.graph.isFrozen()).toBe(true);
  });

  it("keeps every definition of a name in scan order", () => {
    const index = buildSymbolIndex(dir);

    expect(findSymbol(index, "helper").map((occ) => occ.path)).toEqual(["a.ts", "c.ts"]);
    expect(firstDefinition(index, "helper")?.path).toBe("a.ts");
    expect(findSymbol(index, "absent")).toEqual([]);
  });

  it("reports both sides of a file's dependencies", () => {
    const index = buildSymbolIndex(dir);

    const deps = getFileDependencies(index, "a.ts");
    expect(deps.imports).toEqual([]);
    expect(deps.importedBy).toEqual(["b.ts"]);
    expect(deps.symbols.map((s) => s.name)).toEqual(["helper"]);

    expect(errorCode(() => getFileDependencies(index, "broken.ts"))).toBe(
      ErrorCodes.FILE_NOT_FOUND,
    );
  });

  it("keeps both directions of the graph in step", () => {
    const extra = createProject(
      {
        "x.ts": lines('import "./y";', 'import "./z";'),
        "y.ts": lines('import "./w";'),
        "z.ts": lines('import "./w";', 'import "./y";', 'import "react";'),
        "w.ts": lines('import "./x";', 'export * from "./z";'),
      },
      "repograph-index-symmetry-",
    );
    try {
      const index = buildSymbolIndex(extra);

      expect(index.graph.edgeCount()).toBe(7);
      expectSymmetric(index.graph);
    } finally {
      removeProject(extra);
    }
  });

  it("builds the same index twice from unchanged files", () => {
    const first = buildSymbolIndex(dir);
    const second = buildSymbolIndex(dir);

    expect(second.graph.edges()).toEqual(first.graph.edges());
    expect([...second.symbolsByFile]).toEqual([...first.symbolsByFile]);
    expect([...second.importsByFile]).toEqual([...first.importsByFile]);
  });

  it("reuses and prunes the parse cache", () => {
    const cache = openCache(dir);
    try {
      const cold = buildSymbolIndex(dir, { cache });
      expect(cache.countEntries()).toBe(3);

      const warm = buildSymbolIndex(dir, { cache });
      expect([...warm.symbolsByFile]).toEqual([...cold.symbolsByFile]);
      expect(warm.graph.edges()).toEqual(cold.graph.edges());

      removeProject(`${dir}/c.ts`);
      buildSymbolIndex(dir, { cache });
      expect(cache.countEntries()).toBe(2);
    } finally {
      cache.close();
    }
  });
});

describePython("buildSymbolIndex on python sources", () => {
  let dir: string;

  beforeEach(() => {
    dir = createProject(
      {
        "a.py": lines("def helper():", "    return 1"),
        "b.py": lines("from .a import helper", "", "", "def main():", "    return helper()"),
        "c.py": lines("import a"),
        "broken.py": lines("def broken(:", "    pass"),
        "d.py": lines("from . import b"),
      },
      "repograph-index-py-",
    );
  });

  afterEach(() => {
    removeProject(dir);
  });

  it("links relative imports only", () => {
    const index = buildSymbolIndex(dir);

    expect([...index.graph.importedBy("a.py")]).toEqual(["b.py"]);
    expect([...index.graph.importsOf("b.py")]).toEqual(["a.py"]);
    expect(index.graph.importsOf("c.py").size).toBe(0);
    expectSymmetric(index.graph);
  });

  it("leaves out a file that does not parse", () => {
    const index = buildSymbolIndex(dir);

    expect(index.files.map((f) => f.relativePath)).toEqual(["a.py", "b.py", "c.py", "d.py"]);
    expect(index.symbolsByFile.has("broken.py")).toBe(false);
    expect(index.graph.nodes()).not.toContain("broken.py");
  });
});
