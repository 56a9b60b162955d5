/**
 * CLI argument parser
 */

import type { CliOptions } from "../types.js";

export type ParsedArgs = {
  readonly command: string;
  readonly treeFile?: string;
  readonly options: CliOptions;
  /** Flags the parser does not know, in order of appearance */
  readonly unknownOptions: readonly string[];
};

/**
 * Parse CLI arguments
 */
export const parseArgs = (args: readonly string[]): ParsedArgs => {
  const options: CliOptions = {};
  const unknownOptions: string[] = [];
  let command = "";
  let treeFile: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;

    if (!arg.startsWith("-")) {
      if (!command) {
        command = arg;
      } else if (treeFile === undefined) {
        treeFile = arg;
      } else {
        unknownOptions.push(arg);
      }
      continue;
    }

    switch (arg) {
      case "-h":
      case "--help":
        return { command: "help", options: {}, unknownOptions: [] };
      case "-v":
      case "--version":
        return { command: "version", options: {}, unknownOptions: [] };
      case "-V":
      case "--verbose":
        options.verbose = true;
        break;
      case "-q":
      case "--quiet":
        options.quiet = true;
        break;
      case "-c":
      case "--config":
        options.config = args[++i] ?? "";
        break;
      case "-o":
      case "--out":
        options.out = args[++i] ?? "";
        break;
      case "-m":
      case "--module":
        options.module = args[++i] ?? "";
        break;
      case "-e":
      case "--entry":
        options.entry = args[++i] ?? "";
        break;
      default:
        unknownOptions.push(arg);
    }
  }

  return { command, treeFile, options, unknownOptions };
};
