#!/usr/bin/env node
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import path from "node:path";
import {
  architecture,
  callGraph,
  compress,
  cycles,
  fileContext,
  findSymbols,
  impact,
  reach,
  repoMap,
  scan,
  search,
  smartContext,
  stats,
  traceFlow,
  usages,
  type EngineOptions,
} from "./engine.js";
import { RepoGraphError, type Result } from "./errors.js";
import { LogLevel, logger, parseLogLevel } from "./logger.js";
import {
  renderArchitecture,
  renderCallGraph,
  renderCycles,
  renderDependencyReach,
  renderFileContext,
  renderFlow,
  renderImpact,
  renderSearchHits,
  renderSmartContext,
  renderStats,
} from "./render.js";
import type { SymbolOccurrence, Usage } from "./types.js";

type OutputFormat = "text" | "json";

function unwrap<T>(result: Result<T>): T {
  if (!result.ok) {
    throw new RepoGraphError(result.error.code, result.error.message);
  }
  return result.value;
}

function emit<T>(result: Result<T>, output: OutputFormat, toText: (value: T) => string): void {
  const value = unwrap(result);
  console.log(output === "json" ? JSON.stringify(value, null, 2) : toText(value));
}

function engineOptions(argv: { cache?: boolean }): EngineOptions {
  return argv.cache === undefined ? {} : { cache: argv.cache };
}

function formatOccurrence(occ: SymbolOccurrence): string {
  const { symbol } = occ;
  const name = symbol.parent ? `${symbol.parent}.${symbol.name}` : symbol.name;
  return `${occ.path}:${symbol.startLine}-${symbol.endLine} ${symbol.kind} ${name}${symbol.signature ? ` ${symbol.signature}` : ""}`;
}

function formatUsage(usage: Usage): string {
  return `${usage.file}:${usage.line} [${usage.type}] ${usage.content}`;
}

const cli = yargs(hideBin(process.argv))
  .scriptName("repograph")
  .usage("$0 <command> [options]")
  .option("dir", {
    alias: "C",
    type: "string",
    describe: "Repository root",
    default: process.cwd(),
    global: true,
  })
  .option("output", {
    alias: "o",
    type: "string",
    choices: ["text", "json"] as const,
    default: "text" as const,
    describe: "Output format",
    global: true,
  })
  .option("cache", {
    type: "boolean",
    describe: "Reuse parse results from .repograph/cache.db",
    global: true,
  })
  .option("verbose", {
    type: "boolean",
    default: false,
    describe: "Print progress and timing",
    global: true,
  })
  .option("debug", {
    type: "boolean",
    default: false,
    describe: "Print per-file diagnostics",
    global: true,
  })
  .middleware((argv) => {
    logger.setLevel(
      parseLogLevel({
        verbose: argv.verbose,
        debug: argv.debug,
        env: process.env.REPOGRAPH_LOG_LEVEL,
      }),
    );
  })
  .command(
    "scan",
    "List files the scanner accepts",
    (y) => y,
    (argv) => {
      emit(scan(argv.dir, engineOptions(argv)), argv.output, (files) =>
        files.map((f) => `${f.relativePath} (${f.language}, ${f.sizeBytes} bytes)`).join("\n"),
      );
    },
  )
  .command(
    "map",
    "Print the repository map",
    (y) =>
      y
        .option("tokens", {
          type: "number",
          describe: "Token budget (default from config, 8000)",
        })
        .option("docstrings", {
          type: "boolean",
          default: false,
          describe: "Include docstrings",
        }),
    (argv) => {
      const result = repoMap(
        argv.dir,
        { maxTokens: argv.tokens, includeDocstrings: argv.docstrings },
        engineOptions(argv),
      );
      emit(result, argv.output, (text) => text);
    },
  )
  .command(
    "find <name>",
    "Find definitions of a symbol",
    (y) => y.positional("name", { type: "string", demandOption: true }),
    (argv) => {
      emit(findSymbols(argv.dir, argv.name, engineOptions(argv)), argv.output, (found) =>
        found.length === 0 ? `No symbol named '${argv.name}'.` : found.map(formatOccurrence).join("\n"),
      );
    },
  )
  .command(
    "usages <name>",
    "Find every line that mentions a name",
    (y) => y.positional("name", { type: "string", demandOption: true }),
    (argv) => {
      emit(usages(argv.dir, argv.name, engineOptions(argv)), argv.output, (list) =>
        list.map(formatUsage).join("\n"),
      );
    },
  )
  .command(
    "deps <target>",
    "Show the files a file reaches through imports, hop by hop",
    (y) =>
      y
        .positional("target", {
          describe: "File path",
          type: "string",
          demandOption: true,
        })
        .option("reverse", {
          type: "boolean",
          default: false,
          describe: "Follow importers instead of imports",
        })
        .option("hops", {
          type: "number",
          default: 10,
          describe: "Max import hops",
        }),
    (argv) => {
      const result = reach(
        argv.dir,
        argv.target,
        { direction: argv.reverse ? "importedBy" : "imports", maxHops: argv.hops },
        engineOptions(argv),
      );
      emit(result, argv.output, renderDependencyReach);
    },
  )
  .command(
    "cycles",
    "List import cycles",
    (y) => y,
    (argv) => {
      emit(cycles(argv.dir, engineOptions(argv)), argv.output, renderCycles);
    },
  )
  .command(
    "context <file>",
    "Print a file with the files it imports and is used by",
    (y) => y.positional("file", { type: "string", demandOption: true }),
    (argv) => {
      emit(fileContext(argv.dir, argv.file, engineOptions(argv)), argv.output, renderFileContext);
    },
  )
  .command(
    "relevant <question..>",
    "Collect the files most relevant to a question within a token budget",
    (y) =>
      y
        .positional("question", { type: "string", array: true, demandOption: true })
        .option("tokens", {
          type: "number",
          default: 15000,
          describe: "Token budget",
        }),
    (argv) => {
      const question = argv.question.join(" ");
      emit(
        smartContext(argv.dir, question, argv.tokens, engineOptions(argv)),
        argv.output,
        renderSmartContext,
      );
    },
  )
  .command(
    "search <query..>",
    "Search symbol names and file contents by keyword",
    (y) =>
      y
        .positional("query", { type: "string", array: true, demandOption: true })
        .option("top", {
          type: "number",
          default: 10,
          describe: "Max results",
        }),
    (argv) => {
      const query = argv.query.join(" ");
      emit(search(argv.dir, query, argv.top, engineOptions(argv)), argv.output, renderSearchHits);
    },
  )
  .command(
    "architecture",
    "Group files into layers by path",
    (y) => y,
    (argv) => {
      emit(architecture(argv.dir, engineOptions(argv)), argv.output, (layers) =>
        renderArchitecture(layers, path.basename(path.resolve(argv.dir))),
      );
    },
  )
  .command(
    "calls <name>",
    "Show callers and callees of a function",
    (y) =>
      y
        .positional("name", { type: "string", demandOption: true })
        .option("direction", {
          type: "string",
          choices: ["callers", "callees", "both"] as const,
          default: "both" as const,
          describe: "Which side of the graph to show",
        })
        .option("depth", {
          type: "number",
          default: 1,
          describe: "Levels to expand",
        }),
    (argv) => {
      const result = callGraph(argv.dir, argv.name, argv.direction, argv.depth, engineOptions(argv));
      emit(result, argv.output, renderCallGraph);
    },
  )
  .command(
    "flow <entry>",
    "Trace calls from an entry point",
    (y) =>
      y
        .positional("entry", { type: "string", demandOption: true })
        .option("depth", {
          type: "number",
          default: 10,
          describe: "Max depth",
        }),
    (argv) => {
      emit(traceFlow(argv.dir, argv.entry, argv.depth, engineOptions(argv)), argv.output, (trace) =>
        renderFlow(trace.steps),
      );
    },
  )
  .command(
    "impact <file>",
    "Estimate what a change to a file affects",
    (y) => y.positional("file", { type: "string", demandOption: true }),
    (argv) => {
      emit(impact(argv.dir, argv.file, engineOptions(argv)), argv.output, renderImpact);
    },
  )
  .command(
    "compress <files..>",
    "Render files for a prompt, full or as signatures",
    (y) =>
      y
        .positional("files", { type: "string", array: true, demandOption: true })
        .option("mode", {
          type: "string",
          choices: ["full", "signatures", "smart"] as const,
          default: "smart" as const,
          describe: "Compression mode",
        })
        .option("budget", {
          type: "number",
          describe: "Token budget",
        }),
    (argv) => {
      const result = compress(argv.dir, argv.files, argv.mode, { budget: argv.budget });
      emit(result, argv.output, (ctx) => {
        const footer = [`---`, `Files: ${ctx.filesIncluded.length}`, `Estimated tokens: ${ctx.estimatedTokens}`];
        if (ctx.omitted.length > 0) footer.push(`Omitted: ${ctx.omitted.join(", ")}`);
        return `${ctx.content}\n${footer.join("\n")}`;
      });
    },
  )
  .command(
    "stats",
    "Summarise files and lines by language",
    (y) => y,
    (argv) => {
      emit(stats(argv.dir, engineOptions(argv)), argv.output, renderStats);
    },
  )
  .demandCommand(1)
  .strict()
  .fail((msg, err) => {
    throw err instanceof Error ? err : new Error(msg);
  })
  .help()
  .version();

async function main() {
  await cli.parse();
}

main().catch((err: unknown) => {
  if (logger.getLevel() === LogLevel.SILENT) logger.setLevel(LogLevel.NORMAL);
  logger.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
