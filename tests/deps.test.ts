import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { cycleContaining, dependencyReach, importCycles } from "../src/deps/reach.js";
import { renderCycles, renderDependencyReach } from "../src/render.js";
import { buildSymbolIndex, type SymbolIndex } from "../src/symbolIndex.js";
import { createProject, lines, removeProject } from "./helpers.js";

describe("dependency reach", () => {
  let dir: string;
  let index: SymbolIndex;

  beforeAll(() => {
    dir = createProject(
      {
        "a.ts": lines('import "./b";', 'import "lodash";', "export const a = 1;"),
        "b.ts": lines('import "./c";', "export const b = 2;"),
        "c.ts": lines('import "./a";', "export const c = 3;"),
        "d.ts": lines("export const d = 4;"),
      },
      "repograph-deps-",
    );
    index = buildSymbolIndex(dir);
  });

  afterAll(() => {
    removeProject(dir);
  });

  it("groups imports by hop and lists packages separately", () => {
    const reach = dependencyReach(index, "a.ts", "imports", 5);

    expect(reach).toEqual({
      file: "a.ts",
      direction: "imports",
      layers: [
        { hop: 1, files: ["b.ts"] },
        { hop: 2, files: ["c.ts"] },
      ],
      external: ["lodash"],
      truncated: false,
    });
    expect(renderDependencyReach(reach)).toBe(
      ["a.ts imports:", "  hop 1: b.ts", "  hop 2: c.ts", "  external: lodash"].join("\n"),
    );
  });

  it("flags a walk cut short by the hop limit", () => {
    const reach = dependencyReach(index, "a.ts", "imports", 1);

    expect(reach.layers).toEqual([{ hop: 1, files: ["b.ts"] }]);
    expect(reach.truncated).toBe(true);
    expect(renderDependencyReach(reach).split("\n").at(-1)).toBe("  ... (hop limit reached)");
  });

  it("follows importers in the reverse direction", () => {
    expect(dependencyReach(index, "c.ts", "importedBy")).toEqual({
      file: "c.ts",
      direction: "importedBy",
      layers: [
        { hop: 1, files: ["b.ts"] },
        { hop: 2, files: ["a.ts"] },
      ],
      external: [],
      truncated: false,
    });
    expect(renderDependencyReach(dependencyReach(index, "d.ts"))).toBe("d.ts imports:\n  (none)");
  });

  it("reports the cycle as one component", () => {
    expect(importCycles(index.graph)).toEqual([["a.ts", "b.ts", "c.ts"]]);
    expect(cycleContaining(index.graph, "b.ts")).toEqual(["a.ts", "b.ts", "c.ts"]);
    expect(cycleContaining(index.graph, "d.ts")).toEqual([]);
  });
});

describe("import cycles", () => {
  let dir: string;
  let index: SymbolIndex;

  beforeAll(() => {
    dir = createProject(
      {
        "x.ts": lines('import "./y";', 'import "./z";'),
        "y.ts": lines('import "./w";'),
        "z.ts": lines('import "./w";', 'import "./y";'),
        "w.ts": lines('import "./x";'),
        "p.ts": lines('import "./q";'),
        "q.ts": lines('import "./p";'),
        "solo.ts": lines('import "./p";'),
      },
      "repograph-cycles-",
    );
    index = buildSymbolIndex(dir);
  });

  afterAll(() => {
    removeProject(dir);
  });

  it("places each file at its shortest hop", () => {
    expect(dependencyReach(index, "x.ts").layers).toEqual([
      { hop: 1, files: ["y.ts", "z.ts"] },
      { hop: 2, files: ["w.ts"] },
    ]);
  });

  it("finds every component and leaves files outside cycles out", () => {
    const cycles = importCycles(index.graph);

    expect(cycles).toEqual([
      ["p.ts", "q.ts"],
      ["w.ts", "x.ts", "y.ts", "z.ts"],
    ]);
    expect(renderCycles(cycles)).toBe(
      ["Import cycles:", "- p.ts, q.ts", "- w.ts, x.ts, y.ts, z.ts"].join("\n"),
    );
    expect(renderCycles([])).toBe("No import cycles found.");
  });
});
