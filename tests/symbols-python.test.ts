import { describe, expect, it } from "vitest";
import { parseSource } from "../src/symbols.js";
import { extractPythonSymbols, isPythonParserAvailable } from "../src/symbols-python.js";
import { lines } from "./helpers.js";

const describePython = isPythonParserAvailable() ? describe : describe.skip;

const MODULE = lines(
  "import os",
  "import numpy as np, sys",
  "from . import sibling",
  "from ..pkg.mod import thing as alias, other",
  "from typing import *",
  "",
  "",
  "class Base:",
  '    """Base class."""',
  "",
  "    def run(self, x: int) -> str:",
  '        """Run it."""',
  "        return str(x)",
  "",
  "",
  "class Child(Base):",
  "    class Inner:",
  "        pass",
  "",
  "    async def go(self):",
  "        def helper():",
  "            pass",
  "        return helper()",
  "",
  "",
  "def top(a, b=1):",
  "    return a + b",
);

describePython("extractPythonSymbols", () => {
  it("extracts classes, methods and functions with their parents", () => {
    const parsed = extractPythonSymbols(MODULE);

    expect(
      parsed?.symbols.map((s) => [s.name, s.kind, s.parent, s.startLine, s.endLine]),
    ).toEqual([
      ["Base", "class", "", 8, 13],
      ["run", "method", "Base", 11, 13],
      ["Child", "class", "", 16, 23],
      ["Inner", "class", "Child", 17, 18],
      ["go", "method", "Child", 20, 23],
      ["top", "function", "", 26, 27],
    ]);
  });

  it("keeps signatures and docstrings as written", () => {
    const parsed = extractPythonSymbols(MODULE);
    const find = (name: string) => parsed?.symbols.find((s) => s.name === name);

    expect(find("run")?.signature).toBe("(self, x: int) -> str");
    expect(find("run")?.docstring).toBe("Run it.");
    expect(find("Base")?.docstring).toBe("Base class.");
    expect(find("Child")?.signature).toBe("(Base)");
    expect(find("top")?.signature).toBe("(a, b=1)");
    expect(find("helper")).toBeUndefined();
  });

  it("extracts one import per module", () => {
    const parsed = extractPythonSymbols(MODULE);

    expect(parsed?.imports).toEqual([
      { module: "os", items: [], alias: "", isRelative: false, kind: "import" },
      { module: "numpy", items: [], alias: "np", isRelative: false, kind: "import" },
      { module: "sys", items: [], alias: "", isRelative: false, kind: "import" },
      { module: ".", items: ["sibling"], alias: "", isRelative: true, kind: "from_import" },
      {
        module: "..pkg.mod",
        items: ["thing", "other"],
        alias: "",
        isRelative: true,
        kind: "from_import",
      },
      { module: "typing", items: ["*"], alias: "", isRelative: false, kind: "from_import" },
    ]);
  });

  it("returns null for source with syntax errors", () => {
    expect(extractPythonSymbols("def broken(:\n    pass\n")).toBeNull();
    expect(parseSource("def broken(:\n    pass\n", "pkg/broken.py")).toBeNull();
  });
});
