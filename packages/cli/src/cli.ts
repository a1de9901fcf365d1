/**
 * hitch CLI - expand attached macros in a file
 *
 * Usage:
 *   hitch expand <file> [--verbose] [--no-color]
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { createRegistry, printDiagnostics } from "@hitch/core";
import { expandSource, printSourceFile } from "@hitch/expander";
import { registerStandardMacros } from "@hitch/macros";

export interface CliOptions {
  command: "expand";
  file?: string;
  verbose: boolean;
  /** Undefined means auto-detect from the environment */
  colors?: boolean;
}

export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
  readFile(file: string): string | undefined;
}

export const processIO: CliIO = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
  readFile: (file) => (fs.existsSync(file) ? fs.readFileSync(file, "utf8") : undefined),
};

const USAGE = "Usage: hitch expand <file> [--verbose] [--no-color]";

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export function parseArgs(args: readonly string[]): CliOptions | "help" {
  const [command, ...rest] = args;
  if (command === undefined || command === "--help" || command === "-h") return "help";
  if (command !== "expand") {
    throw new UsageError(`Unknown command: ${command}`);
  }

  let file: string | undefined;
  let verbose = false;
  let colors: boolean | undefined;

  for (const arg of rest) {
    if (arg === "--verbose" || arg === "-v") {
      verbose = true;
    } else if (arg === "--no-color") {
      colors = false;
    } else if (arg === "--color") {
      colors = true;
    } else if (arg === "--help" || arg === "-h") {
      return "help";
    } else if (arg.startsWith("-")) {
      throw new UsageError(`Unknown option: ${arg}`);
    } else if (!file) {
      file = arg;
    } else {
      throw new UsageError(`Unexpected argument: ${arg}`);
    }
  }

  return { command, file, verbose, colors };
}

/** Expand one file; returns the exit code */
export function runExpand(options: CliOptions, io: CliIO = processIO): number {
  if (!options.file) {
    io.stderr(`Error: expand command requires a file argument\n${USAGE}\n`);
    return 1;
  }

  const filePath = path.resolve(options.file);
  const text = io.readFile(filePath);
  if (text === undefined) {
    io.stderr(`File not found: ${filePath}\n`);
    return 1;
  }

  const registry = createRegistry();
  registerStandardMacros(registry);

  const { sourceFile, diagnostics } = expandSource(text, options.file, {
    registry,
    verbose: options.verbose,
  });

  io.stdout(printSourceFile(sourceFile));
  if (diagnostics.length > 0) {
    printDiagnostics(diagnostics, { colors: options.colors, writer: (rendered) => io.stderr(`${rendered}\n`) });
  }

  return diagnostics.some((d) => d.severity === "error") ? 1 : 0;
}

export function main(argv: readonly string[], io: CliIO = processIO): number {
  let options: CliOptions | "help";
  try {
    options = parseArgs(argv);
  } catch (error) {
    if (!(error instanceof UsageError)) throw error;
    io.stderr(`${error.message}\n${USAGE}\n`);
    return 1;
  }

  if (options === "help") {
    io.stdout(`${USAGE}\n`);
    return 0;
  }

  return runExpand(options, io);
}
