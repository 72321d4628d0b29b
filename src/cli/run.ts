/**
 * Command-line driver: decode a JSON syntax tree and print it.
 */

import { readFileSync } from "node:fs";
import { TreeDecoder } from "../ast/decode.ts";
import { formatDiagnostic } from "../errors/index.ts";
import { print, tokenize } from "../index.ts";
import type { RenderOptions } from "../printer/render.ts";

export const VERSION = "0.1.0";

const KNOWN_FLAGS = new Set(["--tokens", "--keep-separators", "--help", "-h", "--version", "-V"]);

export interface CliIO {
  readFile(path: string): string;
  stdout(line: string): void;
  stderr(line: string): void;
}

export const nodeIO: CliIO = {
  readFile: (path) => readFileSync(path, "utf8"),
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
};

export const HELP = `pathprint ${VERSION} — print qualified paths from their syntax tree

Usage: pathprint <file.json> [options]

The input is a JSON syntax tree whose root is a QualifiedPath, Path,
type or expression node.

Options:
  --tokens            Print the token stream, one "kind text" pair per line
  --keep-separators   Keep the trailing separators of argument and bound lists
  --help, -h          Show this help message
  --version, -V       Show the version

Examples:
  pathprint qpath.json               Print the path on one line
  pathprint qpath.json --tokens      Show the tokens the printer emits`;

/** Runs the CLI and returns the process exit code. */
export function run(args: readonly string[], io: CliIO = nodeIO): number {
  if (args.includes("--help") || args.includes("-h")) {
    io.stdout(HELP);
    return 0;
  }
  if (args.includes("--version") || args.includes("-V")) {
    io.stdout(`pathprint ${VERSION}`);
    return 0;
  }

  const flags = args.filter((a) => a.startsWith("-"));
  for (const flag of flags) {
    if (!KNOWN_FLAGS.has(flag)) {
      io.stderr(`error: unknown flag '${flag}'`);
      io.stderr("Run with --help to see available options.");
      return 1;
    }
  }

  const filePath = args.find((a) => !a.startsWith("-"));
  if (filePath === undefined) {
    io.stderr("error: no input file provided");
    io.stderr("Run with --help to see available options.");
    return 1;
  }

  let content: string;
  try {
    content = io.readFile(filePath);
  } catch {
    io.stderr(`error: could not read file '${filePath}'`);
    return 1;
  }

  let document: unknown;
  try {
    document = JSON.parse(content);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    io.stderr(`error: '${filePath}' is not valid JSON: ${reason}`);
    return 1;
  }

  const decoder = new TreeDecoder(filePath);
  const node = decoder.decode(document);
  if (node === null) {
    for (const diag of decoder.getDiagnostics()) {
      io.stderr(formatDiagnostic(diag));
    }
    return 1;
  }

  if (flags.includes("--tokens")) {
    for (const token of tokenize(node)) {
      io.stdout(`${token.kind} ${token.text}`);
    }
    return 0;
  }

  const options: RenderOptions = {
    trailingSeparators: flags.includes("--keep-separators") ? "keep" : "strip",
  };
  io.stdout(print(node, options));
  return 0;
}
