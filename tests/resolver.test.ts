import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { createResolverContext, resolveImport, type ResolverContext } from "../src/deps/resolver.js";
import type { ImportSpec } from "../src/types.js";
import { createProject, removeProject } from "./helpers.js";

function spec(module: string, isRelative = module.startsWith(".")): ImportSpec {
  return { module, items: [], alias: "", isRelative, kind: "import" };
}

describe("resolveImport", () => {
  let dir: string;
  let ctx: ResolverContext;

  beforeAll(() => {
    dir = createProject(
      {
        "pkg/__init__.py": "",
        "pkg/a.py": "",
        "pkg/sub/__init__.py": "",
        "pkg/sub/b.py": "",
        "top.py": "",
        "src/util.ts": "",
        "src/lib/index.ts": "",
        "src/comp.tsx": "",
        "src/legacy.js": "",
      },
      "repograph-resolver-",
    );
    ctx = createResolverContext(dir);
  });

  afterAll(() => {
    removeProject(dir);
  });

  it("reports package and empty imports without touching the filesystem", () => {
    expect(resolveImport(ctx, "pkg/a.py", spec("os"))).toEqual({
      status: "unresolved",
      reason: "external",
    });
    expect(resolveImport(ctx, "src/main.ts", spec("react"))).toEqual({
      status: "unresolved",
      reason: "external",
    });
    expect(resolveImport(ctx, "pkg/a.py", spec("", true))).toEqual({
      status: "unresolved",
      reason: "empty",
    });
  });

  it("resolves dotted relative imports", () => {
    const importer = "pkg/sub/b.py";
    expect(resolveImport(ctx, importer, spec("."))).toEqual({
      status: "resolved",
      path: "pkg/sub/__init__.py",
    });
    expect(resolveImport(ctx, importer, spec(".."))).toEqual({
      status: "resolved",
      path: "pkg/__init__.py",
    });
    expect(resolveImport(ctx, importer, spec("..a"))).toEqual({
      status: "resolved",
      path: "pkg/a.py",
    });
    expect(resolveImport(ctx, "top.py", spec(".pkg"))).toEqual({
      status: "resolved",
      path: "pkg/__init__.py",
    });
  });

  it("falls back to a candidate path when nothing exists", () => {
    expect(resolveImport(ctx, "pkg/sub/b.py", spec(".missing"))).toEqual({
      status: "candidate",
      path: "pkg/sub/missing.py",
    });
    expect(resolveImport(ctx, "src/main.ts", spec("./nothing"))).toEqual({
      status: "candidate",
      path: "src/nothing.ts",
    });
    expect(resolveImport(ctx, "src/app.js", spec("./nothing"))).toEqual({
      status: "candidate",
      path: "src/nothing.js",
    });
  });

  it("refuses to climb above the root", () => {
    expect(resolveImport(ctx, "pkg/sub/b.py", spec("...."))).toEqual({
      status: "unresolved",
      reason: "outside_root",
    });
    expect(resolveImport(ctx, "src/main.ts", spec("../../x"))).toEqual({
      status: "unresolved",
      reason: "outside_root",
    });
  });

  it("probes script extensions, compiled names and index files", () => {
    const resolved = (module: string) => resolveImport(ctx, "src/main.ts", spec(module));
    expect(resolved("./util")).toEqual({ status: "resolved", path: "src/util.ts" });
    expect(resolved("./util.js")).toEqual({ status: "resolved", path: "src/util.ts" });
    expect(resolved("./lib")).toEqual({ status: "resolved", path: "src/lib/index.ts" });
    expect(resolved("./comp")).toEqual({ status: "resolved", path: "src/comp.tsx" });
    expect(resolved("./legacy")).toEqual({ status: "resolved", path: "src/legacy.js" });
  });

  it("trusts the file index before the filesystem", () => {
    const indexed = createResolverContext(dir, new Set(["src/virtual.ts"]));
    expect(resolveImport(indexed, "src/main.ts", spec("./virtual"))).toEqual({
      status: "resolved",
      path: "src/virtual.ts",
    });
  });
});
