import {
  Project,
  Node,
  SourceFile,
  FunctionDeclaration,
  MethodDeclaration,
  ConstructorDeclaration,
  GetAccessorDeclaration,
  SetAccessorDeclaration,
  ArrowFunction,
  FunctionExpression,
  ClassDeclaration,
  ts,
} from "ts-morph";
import { extractImportSpecs } from "./deps/extract-imports.js";
import type { ParsedSource, SymbolEntry } from "./types.js";

let project: Project | null = null;
let virtualCounter = 0;

function getProject(): Project {
  if (!project) {
    project = new Project({
      compilerOptions: {
        allowJs: true,
        checkJs: false,
        jsx: ts.JsxEmit.Preserve,
        target: ts.ScriptTarget.ESNext,
        module: ts.ModuleKind.ESNext,
        strict: false,
        skipLibCheck: true,
        noEmit: true,
      },
      useInMemoryFileSystem: true,
      skipLoadingLibFiles: true,
    });
  }
  return project;
}

function cleanupSignature(sig: string): string {
  return sig.replace(/\s+/g, " ").trim();
}

function extractJsDoc(node: Node): string {
  const jsDocs = Node.isJSDocable(node) ? node.getJsDocs() : [];
  if (jsDocs.length === 0) return "";

  const parts: string[] = [];
  for (const doc of jsDocs) {
    const description = doc.getDescription().trim();
    if (description) parts.push(description);
  }
  return parts.join("\n").trim();
}

type FunctionLike =
  | FunctionDeclaration
  | MethodDeclaration
  | ConstructorDeclaration
  | GetAccessorDeclaration
  | SetAccessorDeclaration
  | ArrowFunction
  | FunctionExpression;

/** `(params): ReturnType`, using only what is written in the source. */
function getFunctionSignature(node: FunctionLike): string {
  const params = node
    .getParameters()
    .map((p) => p.getText())
    .join(", ");
  const returnType = node.getReturnTypeNode()?.getText();
  const returnStr = returnType ? `: ${returnType}` : "";
  return cleanupSignature(`(${params})${returnStr}`);
}

function getClassSignature(node: ClassDeclaration): string {
  return cleanupSignature(
    node
      .getHeritageClauses()
      .map((clause) => clause.getText())
      .join(" "),
  );
}

function lineRange(node: Node): { startLine: number; endLine: number } {
  return {
    startLine: node.getStartLineNumber(),
    endLine: node.getEndLineNumber(),
  };
}

type ClassMember =
  | ConstructorDeclaration
  | MethodDeclaration
  | GetAccessorDeclaration
  | SetAccessorDeclaration;

function extractClassMembers(cls: ClassDeclaration, className: string): SymbolEntry[] {
  const members: ClassMember[] = [
    ...cls.getConstructors(),
    ...cls.getMethods(),
    ...cls.getGetAccessors(),
    ...cls.getSetAccessors(),
  ];
  members.sort((a, b) => a.getStart() - b.getStart());

  return members.map((member): SymbolEntry => ({
    name: Node.isConstructorDeclaration(member) ? "constructor" : member.getName(),
    kind: "method",
    signature: getFunctionSignature(member),
    ...lineRange(member),
    docstring: extractJsDoc(member),
    parent: className,
  }));
}

function extractSymbols(sourceFile: SourceFile): SymbolEntry[] {
  const symbols: SymbolEntry[] = [];

  for (const statement of sourceFile.getStatements()) {
    if (Node.isFunctionDeclaration(statement)) {
      symbols.push({
        name: statement.getName() ?? "default",
        kind: "function",
        signature: getFunctionSignature(statement),
        ...lineRange(statement),
        docstring: extractJsDoc(statement),
        parent: "",
      });
      continue;
    }

    if (Node.isClassDeclaration(statement)) {
      const className = statement.getName() ?? "default";
      symbols.push({
        name: className,
        kind: "class",
        signature: getClassSignature(statement),
        ...lineRange(statement),
        docstring: extractJsDoc(statement),
        parent: "",
      });
      symbols.push(...extractClassMembers(statement, className));
      continue;
    }

    if (Node.isVariableStatement(statement)) {
      for (const varDecl of statement.getDeclarations()) {
        const init = varDecl.getInitializer();
        if (!init || !(Node.isArrowFunction(init) || Node.isFunctionExpression(init))) {
          continue;
        }
        symbols.push({
          name: varDecl.getName(),
          kind: "function",
          signature: getFunctionSignature(init),
          ...lineRange(varDecl),
          docstring: extractJsDoc(statement),
          parent: "",
        });
      }
    }
  }

  return symbols;
}

/**
 * Parse TypeScript or JavaScript source. The virtual file keeps the real
 * extension so `.tsx` and `.jsx` get JSX parsing. Returns null when the
 * source has syntax errors.
 */
export function extractTsSymbols(filePath: string, content: string): ParsedSource | null {
  const proj = getProject();
  const vpath = `/virtual_${virtualCounter++}/${filePath.replace(/\\/g, "/").replace(/^\/+/, "")}`;
  const sourceFile = proj.createSourceFile(vpath, content, { overwrite: true });

  try {
    const diagnostics = proj.getProgram().getSyntacticDiagnostics(sourceFile);
    if (diagnostics.length > 0) return null;

    return {
      symbols: extractSymbols(sourceFile),
      imports: extractImportSpecs(sourceFile),
    };
  } finally {
    proj.removeSourceFile(sourceFile);
  }
}

export function clearProjectCache(): void {
  project = null;
}
