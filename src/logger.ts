/**
 * Level-aware logging for diagnostics.
 *
 * Everything goes to stderr: stdout carries command output (including
 * JSON) and must stay clean.
 */

import chalk from "chalk";

export enum LogLevel {
  SILENT = 0,
  NORMAL = 1,
  VERBOSE = 2,
  DEBUG = 3,
}

const LEVEL_NAMES: Record<string, LogLevel> = {
  silent: LogLevel.SILENT,
  normal: LogLevel.NORMAL,
  verbose: LogLevel.VERBOSE,
  debug: LogLevel.DEBUG,
};

export function parseLogLevel(options: {
  verbose?: boolean;
  debug?: boolean;
  env?: string;
}): LogLevel {
  if (options.debug) return LogLevel.DEBUG;
  if (options.verbose) return LogLevel.VERBOSE;
  if (options.env) {
    return LEVEL_NAMES[options.env.trim().toLowerCase()] ?? LogLevel.NORMAL;
  }
  return LogLevel.NORMAL;
}

type Sink = (line: string) => void;

class Logger {
  private level: LogLevel = parseLogLevel({ env: process.env.REPOGRAPH_LOG_LEVEL });
  private sink: Sink = (line) => process.stderr.write(`${line}\n`);

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  /** Redirect output, e.g. to collect lines in tests. */
  setSink(sink: Sink): void {
    this.sink = sink;
  }

  warn(message: string): void {
    if (this.level >= LogLevel.NORMAL) {
      this.sink(chalk.yellow(`Warning: ${message}`));
    }
  }

  error(message: string): void {
    if (this.level >= LogLevel.NORMAL) {
      this.sink(chalk.red(message));
    }
  }

  verbose(message: string): void {
    if (this.level >= LogLevel.VERBOSE) {
      this.sink(chalk.dim(message));
    }
  }

  debug(message: string): void {
    if (this.level >= LogLevel.DEBUG) {
      this.sink(chalk.dim(`[Debug] ${message}`));
    }
  }

  /** Index build summary at VERBOSE level. */
  indexSummary(files: number, symbols: number, edges: number, ms: number): void {
    if (this.level >= LogLevel.VERBOSE) {
      this.sink(
        chalk.dim(
          `[Index] ${files} files, ${symbols} symbols, ${edges} import edges (${ms.toFixed(0)}ms)`,
        ),
      );
    }
  }
}

export const logger = new Logger();
