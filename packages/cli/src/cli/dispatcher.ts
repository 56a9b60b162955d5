/**
 * CLI command dispatcher
 */

import { dirname, resolve } from "node:path";
import { formatDiagnostic, type Diagnostic } from "@luacxx/frontend";
import { loadConfig, findConfig, resolveConfig } from "../config.js";
import { emitCommand } from "../commands/emit.js";
import { treeCommand } from "../commands/tree.js";
import type { LuacxxConfig, Result } from "../types.js";
import { EXIT_CODES, VERSION } from "./constants.js";
import { showHelp } from "./help.js";
import { parseArgs, type ParsedArgs } from "./parser.js";

const reportDiagnostics = (diagnostics: readonly Diagnostic[]): void => {
  for (const diagnostic of diagnostics) {
    console.error(formatDiagnostic(diagnostic));
  }
};

/**
 * The config file named by --config, or the nearest luacxx.json. No file
 * at all means defaults, rooted at the working directory.
 */
const loadProjectConfig = (
  parsed: ParsedArgs
): Result<{ config: LuacxxConfig; projectRoot: string }, string> => {
  const cwd = process.cwd();
  const configPath = parsed.options.config
    ? resolve(cwd, parsed.options.config)
    : findConfig(cwd);

  if (!configPath) {
    return { ok: true, value: { config: {}, projectRoot: cwd } };
  }

  const configResult = loadConfig(configPath);
  if (!configResult.ok) {
    return configResult;
  }
  if (parsed.options.verbose) {
    console.log(`Using config ${configPath}`);
  }
  return {
    ok: true,
    value: { config: configResult.value, projectRoot: dirname(configPath) },
  };
};

const runEmit = (parsed: ParsedArgs): number => {
  const loaded = loadProjectConfig(parsed);
  if (!loaded.ok) {
    console.error(`Error: ${loaded.error}`);
    return EXIT_CODES.config;
  }

  const config = resolveConfig(
    loaded.value.config,
    parsed.options,
    loaded.value.projectRoot,
    parsed.treeFile
  );
  if (config.treeFile === undefined) {
    console.error("Error: Tree file required");
    console.error("Usage: luacxx emit <tree.json> [--module <name>] [-o <dir>]");
    return EXIT_CODES.config;
  }

  const result = emitCommand(config.treeFile, config);
  if (!result.ok) {
    reportDiagnostics(result.error.diagnostics);
    return EXIT_CODES[result.error.stage];
  }

  if (!config.quiet) {
    reportDiagnostics(result.value.diagnostics);
  }
  return EXIT_CODES.ok;
};

const runTree = (parsed: ParsedArgs): number => {
  const treeFile = parsed.treeFile ?? parsed.options.entry;
  if (treeFile === undefined) {
    console.error("Error: Tree file required");
    console.error("Usage: luacxx tree <tree.json>");
    return EXIT_CODES.config;
  }

  const result = treeCommand(treeFile, { verbose: parsed.options.verbose });
  if (!result.ok) {
    reportDiagnostics(result.error);
    return EXIT_CODES.load;
  }
  return EXIT_CODES.ok;
};

/**
 * Main CLI entry point; returns the process exit code
 */
export const runCli = (args: readonly string[]): number => {
  const parsed = parseArgs(args);

  if (parsed.command === "version") {
    console.log(`luacxx v${VERSION}`);
    return EXIT_CODES.ok;
  }

  if (parsed.command === "help" || !parsed.command) {
    showHelp();
    return EXIT_CODES.ok;
  }

  if (parsed.unknownOptions.length > 0) {
    console.error(`Error: Unexpected argument '${parsed.unknownOptions[0]}'`);
    return EXIT_CODES.config;
  }

  switch (parsed.command) {
    case "emit":
      return runEmit(parsed);

    case "tree":
      return runTree(parsed);

    default:
      console.error(`Error: Unknown command '${parsed.command}'`);
      console.error("Run 'luacxx help' for usage");
      return EXIT_CODES.unknownCommand;
  }
};
