export type Language =
  | "python"
  | "typescript"
  | "javascript"
  | "json"
  | "yaml"
  | "markdown"
  | "text"
  | "html"
  | "css"
  | "scss"
  | "sql"
  | "shell"
  | "toml"
  | "ini"
  | "xml"
  | "go"
  | "rust"
  | "java"
  | "c"
  | "cpp"
  | "unknown";

export type SymbolKind = "function" | "method" | "class" | "variable" | "import";

export type FileDescriptor = {
  path: string;
  relativePath: string;
  extension: string;
  sizeBytes: number;
  language: Language;
};

export type SymbolEntry = {
  name: string;
  kind: SymbolKind;
  signature: string;
  startLine: number;
  endLine: number;
  docstring: string;
  /** Enclosing class name, "" at module level. */
  parent: string;
};

export type ImportKind =
  | "import"
  | "from_import"
  | "export_from"
  | "require"
  | "dynamic_import";

export type ImportSpec = {
  module: string;
  items: string[];
  alias: string;
  isRelative: boolean;
  kind: ImportKind;
};

export type ParsedSource = {
  symbols: SymbolEntry[];
  imports: ImportSpec[];
};

export type ParsedFile = ParsedSource & {
  path: string;
  language: Language;
  exports: string[];
};

export type ImportResolution =
  | { status: "resolved"; path: string }
  | { status: "candidate"; path: string }
  | { status: "unresolved"; reason: "external" | "empty" | "outside_root" };

export type SymbolOccurrence = {
  path: string;
  symbol: SymbolEntry;
};

export type ScanOptions = {
  maxDepth?: number;
  includeExtensions?: string[];
  patterns?: string[];
  ignore?: string[];
  maxFileSizeBytes?: number;
};

export type RepoStats = {
  totalFiles: number;
  totalLines: number;
  byLanguage: Record<string, number>;
  byExtension: Record<string, number>;
};

export type CallDirection = "callers" | "callees" | "both";

export type CallerEntry = {
  file: string;
  function: string;
  line: number;
  depth: number;
};

export type CalleeEntry = {
  function: string;
  depth: number;
  file?: string;
  line?: number;
};

export type CallGraphResult = {
  function: string;
  file: string;
  line: number;
  callers?: CallerEntry[];
  callees?: CalleeEntry[];
};

export type FlowStep =
  | {
      type: "internal";
      depth: number;
      function: string;
      file: string;
      line: number;
      signature: string;
    }
  | { type: "external"; depth: number; function: string };

export type FlowTrace = {
  entryPoint: string;
  steps: FlowStep[];
};

export type UsageKind =
  | "definition"
  | "import"
  | "call"
  | "attribute"
  | "assignment"
  | "reference";

export type Usage = {
  file: string;
  line: number;
  content: string;
  type: UsageKind;
};

export type RiskLevel = "low" | "medium" | "high";

export type ImpactReport = {
  file: string;
  exported: SymbolEntry[];
  directDependents: string[];
  indirectDependents: string[];
  totalAffected: number;
  /** Sorted members of the import cycle through the file; empty when none. */
  cycle: string[];
  risk: RiskLevel;
  recommendation: string;
};

export type DependencyDirection = "imports" | "importedBy";

export type DependencyLayer = {
  hop: number;
  files: string[];
};

export type DependencyReach = {
  file: string;
  direction: DependencyDirection;
  /** Files grouped by the fewest import hops needed to reach them. */
  layers: DependencyLayer[];
  /** Package names imported by the file itself (forward direction only). */
  external: string[];
  /** Files reached but not expanded because of the hop limit. */
  truncated: boolean;
};

export type CompressionMode = "full" | "signatures" | "smart";

export type CompressedContext = {
  content: string;
  mode: CompressionMode;
  filesIncluded: string[];
  omitted: string[];
  estimatedTokens: number;
};

export type FileDependencies = {
  file: string;
  imports: string[];
  importedBy: string[];
  symbols: SymbolEntry[];
};

export type RankedFile = {
  file: string;
  score: number;
  /** `kind name signature` of each matching symbol in the file. */
  matchedSymbols: string[];
};

export type ContextFile = RankedFile & {
  content: string;
};

export type SmartContext = {
  question: string;
  keywords: string[];
  filesAnalyzed: number;
  files: ContextFile[];
  estimatedTokens: number;
};

export type SearchRelevance = "high" | "medium";

export type SearchHit =
  | {
      matchType: "symbol";
      file: string;
      line: number;
      symbol: string;
      relevance: SearchRelevance;
    }
  | {
      matchType: "content";
      file: string;
      line: number;
      content: string;
      usageType: UsageKind;
      relevance: SearchRelevance;
    };

export type RelatedFile =
  | { file: string; relationship: "imports"; symbols: string[] }
  | { file: string; relationship: "used_by" };

export type FileContext = {
  file: string;
  language: Language;
  content: string;
  symbols: string[];
  imports: string[];
  related: RelatedFile[];
};

export type ArchitectureLayer = "api" | "services" | "models" | "components" | "utils" | "config";

export type ArchitectureMap = Record<ArchitectureLayer, string[]>;
