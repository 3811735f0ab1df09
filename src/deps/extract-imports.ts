import { Node, SourceFile, SyntaxKind } from "ts-morph";
import type { ImportKind, ImportSpec } from "../types.js";

function getLiteralText(node: Node): string | null {
  if (Node.isStringLiteral(node) || Node.isNoSubstitutionTemplateLiteral(node)) {
    return node.getLiteralText();
  }
  return null;
}

function uniqueStrings(values: string[]): string[] {
  if (values.length <= 1) return values;
  return [...new Set(values)];
}

function makeSpec(
  kind: ImportKind,
  module: string,
  items: string[],
  alias: string,
): ImportSpec {
  return {
    module,
    items: uniqueStrings(items),
    alias,
    isRelative: module.startsWith("."),
    kind,
  };
}

/**
 * Module references of a TypeScript or JavaScript file, in the order the
 * declarations are visited. Non-literal `require()`/`import()` arguments
 * are skipped.
 */
export function extractImportSpecs(sourceFile: SourceFile): ImportSpec[] {
  const specs: ImportSpec[] = [];

  for (const importDecl of sourceFile.getImportDeclarations()) {
    const items: string[] = [];

    if (importDecl.getDefaultImport()) {
      items.push("default");
    }

    for (const named of importDecl.getNamedImports()) {
      items.push(named.getName());
    }

    const namespace = importDecl.getNamespaceImport();
    specs.push(
      makeSpec(
        "import",
        importDecl.getModuleSpecifierValue(),
        items,
        namespace ? namespace.getText() : "",
      ),
    );
  }

  for (const exportDecl of sourceFile.getExportDeclarations()) {
    const module = exportDecl.getModuleSpecifierValue();
    if (!module) continue;

    const items: string[] = [];
    if (exportDecl.isNamespaceExport()) {
      items.push("*");
    } else {
      for (const named of exportDecl.getNamedExports()) {
        items.push(named.getName());
      }
    }

    specs.push(makeSpec("export_from", module, items, ""));
  }

  for (const importEquals of sourceFile.getDescendantsOfKind(
    SyntaxKind.ImportEqualsDeclaration,
  )) {
    const moduleRef = importEquals.getModuleReference();
    if (!Node.isExternalModuleReference(moduleRef)) continue;

    const expr = moduleRef.getExpression();
    if (!expr) continue;
    const literal = getLiteralText(expr);
    if (literal === null) continue;

    specs.push(makeSpec("require", literal, [], importEquals.getName()));
  }

  for (const call of sourceFile.getDescendantsOfKind(SyntaxKind.CallExpression)) {
    const expr = call.getExpression();
    let kind: ImportKind | null = null;

    if (expr.getKind() === SyntaxKind.ImportKeyword) {
      kind = "dynamic_import";
    } else if (Node.isIdentifier(expr) && expr.getText() === "require") {
      kind = "require";
    }

    if (!kind) continue;

    const arg = call.getArguments()[0];
    if (!arg) continue;

    const literal = getLiteralText(arg);
    if (literal === null) continue;

    specs.push(makeSpec(kind, literal, [], ""));
  }

  return specs;
}
