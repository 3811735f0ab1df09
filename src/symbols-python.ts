import { createRequire } from "node:module";
import type Parser from "tree-sitter";
import { logger } from "./logger.js";
import type { ImportSpec, ParsedSource, SymbolEntry } from "./types.js";

const disablePython = process.env.REPOGRAPH_DISABLE_PYTHON === "1";

// Grammars assign node classes onto SyntaxNode; keep `type` writable so
// that assignment does not throw in strict mode.
function ensureWritableTypeProperty(parserCtor: unknown): void {
  if (typeof parserCtor !== "function") return;
  const syntaxNode: unknown = Reflect.get(parserCtor, "SyntaxNode");
  if (typeof syntaxNode !== "function") return;
  const proto: unknown = syntaxNode.prototype;
  if (typeof proto !== "object" || proto === null) return;
  const desc = Object.getOwnPropertyDescriptor(proto, "type");
  if (!desc || desc.set) return;
  Object.defineProperty(proto, "type", { ...desc, set: () => {} });
}

let parser: Parser | null = null;

if (!disablePython) {
  try {
    const require = createRequire(import.meta.url);
    const ParserCtor = require("tree-sitter") as typeof import("tree-sitter");
    const Python = require("tree-sitter-python") as unknown;
    ensureWritableTypeProperty(ParserCtor);
    parser = new ParserCtor();
    parser.setLanguage(Python);
  } catch (err) {
    logger.debug(`Python grammar unavailable: ${String(err)}`);
    parser = null;
  }
}

export function isPythonParserAvailable(): boolean {
  return parser !== null;
}

function getNodeText(node: Parser.SyntaxNode, source: string): string {
  return source.slice(node.startIndex, node.endIndex);
}

function getLineRange(node: Parser.SyntaxNode): { startLine: number; endLine: number } {
  return {
    startLine: node.startPosition.row + 1,
    endLine: node.endPosition.row + 1,
  };
}

function fieldText(
  node: Parser.SyntaxNode,
  field: string,
  source: string,
): string | null {
  const child = node.childForFieldName(field);
  return child ? getNodeText(child, source) : null;
}

function stripStringLiteral(raw: string): string {
  return raw
    .replace(/^[rRbBuUfF]+(?=["'])/, "")
    .replace(/^("""|'''|"|')/, "")
    .replace(/("""|'''|"|')$/, "")
    .trim();
}

/** First statement of a body block, when it is a bare string. */
function extractDocstring(node: Parser.SyntaxNode, source: string): string {
  const body = node.childForFieldName("body");
  const first = body?.namedChildren[0];
  if (!first || first.type !== "expression_statement") return "";
  const expr = first.namedChildren[0];
  if (!expr || expr.type !== "string") return "";
  return stripStringLiteral(getNodeText(expr, source));
}

function extractImportStatement(node: Parser.SyntaxNode, source: string): ImportSpec[] {
  const specs: ImportSpec[] = [];
  for (const child of node.childrenForFieldName("name")) {
    if (child.type === "aliased_import") {
      specs.push({
        module: fieldText(child, "name", source) ?? getNodeText(child, source),
        items: [],
        alias: fieldText(child, "alias", source) ?? "",
        isRelative: false,
        kind: "import",
      });
    } else {
      specs.push({
        module: getNodeText(child, source),
        items: [],
        alias: "",
        isRelative: false,
        kind: "import",
      });
    }
  }
  return specs;
}

function extractFromImport(node: Parser.SyntaxNode, source: string): ImportSpec | null {
  const moduleNode = node.childForFieldName("module_name");
  const module = moduleNode ? getNodeText(moduleNode, source) : "";
  const isRelative = moduleNode?.type === "relative_import" || module.startsWith(".");

  const items: string[] = [];
  for (const child of node.childrenForFieldName("name")) {
    if (child.type === "aliased_import") {
      items.push(fieldText(child, "name", source) ?? getNodeText(child, source));
    } else {
      items.push(getNodeText(child, source));
    }
  }
  if (node.namedChildren.some((child) => child.type === "wildcard_import")) {
    items.push("*");
  }

  if (!module && items.length === 0) return null;
  return { module, items, alias: "", isRelative, kind: "from_import" };
}

export function extractPythonSymbols(content: string): ParsedSource | null {
  if (!parser) return null;

  let tree: Parser.Tree;
  try {
    tree = parser.parse(content, undefined, { bufferSize: content.length * 2 + 1024 });
  } catch (err) {
    logger.debug(`Python parse failed: ${String(err)}`);
    return null;
  }
  // ERROR and MISSING nodes both count.
  if (tree.rootNode.hasError) return null;

  const symbols: SymbolEntry[] = [];
  const imports: ImportSpec[] = [];

  const handleFunction = (node: Parser.SyntaxNode, parent: string): void => {
    const name = fieldText(node, "name", content) ?? "unknown";
    const params = fieldText(node, "parameters", content) ?? "()";
    const returns = fieldText(node, "return_type", content);
    symbols.push({
      name,
      kind: parent ? "method" : "function",
      signature: returns ? `${params} -> ${returns}` : params,
      ...getLineRange(node),
      docstring: extractDocstring(node, content),
      parent,
    });
  };

  const handleClass = (node: Parser.SyntaxNode, parent: string): void => {
    const name = fieldText(node, "name", content) ?? "unknown";
    symbols.push({
      name,
      kind: "class",
      signature: fieldText(node, "superclasses", content) ?? "",
      ...getLineRange(node),
      docstring: extractDocstring(node, content),
      parent,
    });

    const body = node.childForFieldName("body");
    if (!body) return;
    for (const child of body.namedChildren) {
      visit(child, name);
    }
  };

  const visit = (node: Parser.SyntaxNode, parent: string): void => {
    switch (node.type) {
      case "function_definition":
        handleFunction(node, parent);
        return;
      case "class_definition":
        handleClass(node, parent);
        return;
      case "import_statement":
        imports.push(...extractImportStatement(node, content));
        return;
      case "import_from_statement": {
        const spec = extractFromImport(node, content);
        if (spec) imports.push(spec);
        return;
      }
      default:
        break;
    }

    for (const child of node.namedChildren) {
      visit(child, parent);
    }
  };

  visit(tree.rootNode, "");

  return { symbols, imports };
}
