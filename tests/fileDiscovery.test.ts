import path from "node:path";
import os from "node:os";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ErrorCodes } from "../src/errors.js";
import { discoverFiles, isInsideRoot, toRepoPath } from "../src/fileDiscovery.js";
import { createProject, errorCode, removeProject } from "./helpers.js";

function relPaths(files: { relativePath: string }[]): string[] {
  return files.map((f) => f.relativePath);
}

describe("discoverFiles", () => {
  let dir: string;

  beforeEach(() => {
    dir = createProject(
      {
        ".gitignore": "generated/\n*.tmp\n!keep.tmp\n",
        ".hidden/secret.py": "x = 1\n",
        "README.md": "# Title\n",
        "a.py": "x = 1\n",
        "generated/gen.py": "y = 2\n",
        "keep.tmp": "keep\n",
        "node_modules/lib/index.js": "module.exports = {};\n",
        "notes.tmp": "scratch\n",
        "pkg/__pycache__/b.cpython-311.pyc": "",
        "pkg/b.py": "def b():\n    return 1\n",
      },
      "repograph-discovery-",
    );
  });

  afterEach(() => {
    removeProject(dir);
  });

  it("applies default, gitignore and negated rules and prunes hidden dirs", () => {
    expect(relPaths(discoverFiles(dir))).toEqual([
      ".gitignore",
      "README.md",
      "a.py",
      "keep.tmp",
      "pkg/b.py",
    ]);
  });

  it("describes each file", () => {
    const [a] = discoverFiles(dir, { includeExtensions: [".py"] });
    expect(a).toEqual({
      path: path.join(dir, "a.py"),
      relativePath: "a.py",
      extension: ".py",
      sizeBytes: 6,
      language: "python",
    });
  });

  it("filters by extension, depth, size, pattern and extra ignores", () => {
    const py = [".py"];
    expect(relPaths(discoverFiles(dir, { includeExtensions: py }))).toEqual(["a.py", "pkg/b.py"]);
    expect(relPaths(discoverFiles(dir, { includeExtensions: py, maxDepth: 0 }))).toEqual(["a.py"]);
    expect(
      relPaths(discoverFiles(dir, { includeExtensions: py, maxFileSizeBytes: 10 })),
    ).toEqual(["a.py"]);
    expect(relPaths(discoverFiles(dir, { includeExtensions: py, patterns: ["pkg/**"] }))).toEqual([
      "pkg/b.py",
    ]);
    expect(relPaths(discoverFiles(dir, { includeExtensions: py, ignore: ["pkg/"] }))).toEqual([
      "a.py",
    ]);
  });

  it("fails on a missing root", () => {
    const missing = path.join(os.tmpdir(), "repograph-does-not-exist", "nested");
    expect(errorCode(() => discoverFiles(missing))).toBe(ErrorCodes.PROJECT_NOT_FOUND);
  });
});

describe("repo paths", () => {
  it("normalises relative and absolute paths", () => {
    const root = path.resolve("/repo");
    expect(toRepoPath(root, path.join(root, "pkg", "a.py"))).toBe("pkg/a.py");
    expect(toRepoPath(root, "pkg/./b.py")).toBe("pkg/b.py");
    expect(toRepoPath(root, "../elsewhere.py")).toBe("../elsewhere.py");
  });

  it("rejects paths that leave the root", () => {
    expect(isInsideRoot("pkg/a.py")).toBe(true);
    expect(isInsideRoot("../elsewhere.py")).toBe(false);
    expect(isInsideRoot("..")).toBe(false);
    expect(isInsideRoot("")).toBe(false);
  });
});
