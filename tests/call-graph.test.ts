import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { ErrorCodes } from "../src/errors.js";
import { getCallGraph, traceFlow } from "../src/refs/call-graph.js";
import { renderCallGraph, renderFlow } from "../src/render.js";
import { buildSymbolIndex, type SymbolIndex } from "../src/symbolIndex.js";
import { isPythonParserAvailable } from "../src/symbols-python.js";
import { createProject, errorCode, lines, removeProject } from "./helpers.js";

const describePython = isPythonParserAvailable() ? describe : describe.skip;

const APP = lines(
  "export function main(): void {",
  "  const data = load();",
  "  handle(data);",
  "  console.log(data);",
  "}",
  "",
  "export function load(): number[] {",
  '  return parse("1,2");',
  "}",
  "",
  "export function handle(items: number[]): void {",
  "  items.forEach((i) => save(i));",
  "}",
  "",
  "function parse(raw: string): number[] {",
  '  return raw.split(",").map(Number);',
  "}",
  "",
  "function save(value: number): void {",
  "  console.log(value);",
  "}",
);

describe("call graph", () => {
  let dir: string;
  let index: SymbolIndex;

  beforeAll(() => {
    dir = createProject({ "app.ts": APP }, "repograph-calls-");
    index = buildSymbolIndex(dir);
  });

  afterAll(() => {
    removeProject(dir);
  });

  it("lists callees in order of first call", () => {
    expect(getCallGraph(index, "main", "callees")).toEqual({
      function: "main",
      file: "app.ts",
      line: 1,
      callees: [
        { function: "load", depth: 1, file: "app.ts", line: 7 },
        { function: "handle", depth: 1, file: "app.ts", line: 11 },
        { function: "log", depth: 1 },
      ],
    });
  });

  it("finds direct callers", () => {
    expect(getCallGraph(index, "load", "callers").callers).toEqual([
      { file: "app.ts", function: "main", line: 1, depth: 1 },
    ]);
  });

  it("expands callers level by level", () => {
    const result = getCallGraph(index, "save", "callers", 2);

    expect(result.callers).toEqual([
      { file: "app.ts", function: "handle", line: 11, depth: 1 },
      { file: "app.ts", function: "main", line: 1, depth: 2 },
    ]);
    expect(result.callees).toBeUndefined();
    expect(renderCallGraph(result)).toBe(
      [
        "save @ app.ts:19",
        "  callers: 2",
        "    - handle @ app.ts:11",
        "      - main @ app.ts:1",
      ].join("\n"),
    );
  });

  it("treats a depth that is not a number as one level", () => {
    expect(getCallGraph(index, "save", "callers", Number.NaN).callers).toEqual([
      { file: "app.ts", function: "handle", line: 11, depth: 1 },
    ]);
  });

  it("fails for an unknown symbol", () => {
    expect(errorCode(() => getCallGraph(index, "nope"))).toBe(ErrorCodes.SYMBOL_NOT_FOUND);
    expect(() => getCallGraph(index, "nope")).toThrow("Symbol 'nope' not found");
  });
});

describe("callers under mutual recursion", () => {
  let dir: string;
  let index: SymbolIndex;

  beforeAll(() => {
    dir = createProject(
      {
        "loop.ts": lines(
          "export function a(): number {",
          "  return b();",
          "}",
          "",
          "export function b(): number {",
          "  return a();",
          "}",
          "",
          "export function c(): number {",
          "  return a() + b();",
          "}",
        ),
      },
      "repograph-calls-loop-",
    );
    index = buildSymbolIndex(dir);
  });

  afterAll(() => {
    removeProject(dir);
  });

  it("lists each caller once and never the target itself", () => {
    expect(getCallGraph(index, "a", "callers", 2).callers).toEqual([
      { file: "loop.ts", function: "b", line: 5, depth: 1 },
      { file: "loop.ts", function: "c", line: 9, depth: 1 },
    ]);
  });

  it("keeps the shallowest depth for a caller found again further out", () => {
    const callers = getCallGraph(index, "b", "callers", 3).callers ?? [];

    expect(callers).toEqual([
      { file: "loop.ts", function: "a", line: 1, depth: 1 },
      { file: "loop.ts", function: "c", line: 9, depth: 1 },
    ]);
  });
});

describe("traceFlow", () => {
  let dir: string;
  let index: SymbolIndex;

  beforeAll(() => {
    dir = createProject({ "app.ts": APP }, "repograph-flow-");
    index = buildSymbolIndex(dir);
  });

  afterAll(() => {
    removeProject(dir);
  });

  it("walks callees depth first, visiting each name once", () => {
    const trace = traceFlow(index, "main");

    expect(trace.entryPoint).toBe("main");
    expect(trace.steps.map((s) => [s.function, s.depth, s.type])).toEqual([
      ["main", 0, "internal"],
      ["load", 1, "internal"],
      ["parse", 2, "internal"],
      ["split", 3, "external"],
      ["map", 3, "external"],
      ["handle", 1, "internal"],
      ["forEach", 2, "external"],
      ["save", 2, "internal"],
      ["log", 3, "external"],
    ]);
    expect(trace.steps[0]).toEqual({
      type: "internal",
      depth: 0,
      function: "main",
      file: "app.ts",
      line: 1,
      signature: "(): void",
    });
  });

  it("stops at the depth limit", () => {
    const trace = traceFlow(index, "main", 1);
    const names = trace.steps.map((s) => s.function);

    expect(names).toEqual(["main", "load", "handle", "log"]);
    expect(new Set(names).size).toBe(names.length);
    expect(Math.max(...trace.steps.map((s) => s.depth))).toBe(1);
  });

  it("falls back to the default depth when the limit is not a number", () => {
    expect(traceFlow(index, "main", Number.NaN).steps).toEqual(traceFlow(index, "main").steps);
  });

  it("renders one arrow per step", () => {
    const rendered = renderFlow(traceFlow(index, "main", 1).steps);

    expect(rendered).toBe(
      [
        "→ main() @ app.ts:1",
        "  → load() @ app.ts:7",
        "  → handle() @ app.ts:11",
        "  → log() [external]",
      ].join("\n"),
    );
  });

  it("fails for an unknown entry point", () => {
    expect(errorCode(() => traceFlow(index, "nope"))).toBe(ErrorCodes.SYMBOL_NOT_FOUND);
  });
});

describePython("call graph on python sources", () => {
  let dir: string;

  beforeAll(() => {
    dir = createProject({ "a.py": lines("def lonely():", "    return 1") }, "repograph-calls-py-");
  });

  afterAll(() => {
    removeProject(dir);
  });

  it("has empty sides for a function nothing calls", () => {
    const index = buildSymbolIndex(dir);

    expect(getCallGraph(index, "lonely")).toEqual({
      function: "lonely",
      file: "a.py",
      line: 1,
      callers: [],
      callees: [],
    });
  });
});
