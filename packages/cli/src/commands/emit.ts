/**
 * luacxx emit command - translate a syntax tree to C++ files
 */

import { mkdirSync, writeFileSync } from "node:fs";
import { basename, join } from "node:path";
import {
  createDiagnostic,
  loadSyntaxTree,
  type Diagnostic,
} from "@luacxx/frontend";
import { emitUnit, unitFileNames } from "@luacxx/emitter";
import type { ResolvedConfig, Result } from "../types.js";

export type EmitSummary = {
  readonly outputDir: string;
  /** Paths of the written files */
  readonly files: readonly string[];
  readonly requiredModules: readonly string[];
  /** Warnings of a successful translation */
  readonly diagnostics: readonly Diagnostic[];
};

export type EmitFailure = {
  readonly stage: "load" | "emit" | "write";
  readonly diagnostics: readonly Diagnostic[];
};

const writeFiles = (
  outputDirectory: string,
  contents: readonly (readonly [string, string])[],
  verbose: boolean
): Result<string[], Diagnostic> => {
  let path = outputDirectory;
  try {
    mkdirSync(outputDirectory, { recursive: true });
    const files: string[] = [];
    for (const [name, text] of contents) {
      path = join(outputDirectory, name);
      writeFileSync(path, text, "utf-8");
      if (verbose) {
        console.log(`  Wrote ${path}`);
      }
      files.push(path);
    }
    return { ok: true, value: files };
  } catch (err) {
    return {
      ok: false,
      error: createDiagnostic(
        "LCX9005",
        "error",
        `Failed to write ${path}: ${err instanceof Error ? err.message : String(err)}`
      ),
    };
  }
};

/**
 * Load a tree, translate it and write the unit's files
 */
export const emitCommand = (
  treeFile: string,
  config: ResolvedConfig
): Result<EmitSummary, EmitFailure> => {
  const { outputDirectory, emitterOptions } = config;

  if (!config.quiet) {
    console.log(`Emitting C++ code for ${treeFile}...`);
  }

  const treeResult = loadSyntaxTree(treeFile);
  if (!treeResult.ok) {
    return {
      ok: false,
      error: { stage: "load", diagnostics: treeResult.error },
    };
  }

  const emitResult = emitUnit(treeResult.value, {
    ...emitterOptions,
    sourcePath: basename(treeFile),
  });
  if (!emitResult.ok) {
    return {
      ok: false,
      error: { stage: "emit", diagnostics: emitResult.error },
    };
  }

  const output = emitResult.value;
  const names = unitFileNames(emitterOptions);
  const contents: [string, string][] = [[names.source, output.source]];
  if (names.header !== undefined && output.header !== undefined) {
    contents.push([names.header, output.header]);
  }

  const written = writeFiles(outputDirectory, contents, config.verbose);
  if (!written.ok) {
    return { ok: false, error: { stage: "write", diagnostics: [written.error] } };
  }
  const files = written.value;

  if (!config.quiet) {
    console.log(`✓ Generated ${files.length} file(s) in ${outputDirectory}`);
  }
  if (config.verbose && output.requiredModules.length > 0) {
    console.log(`  Requires: ${output.requiredModules.join(", ")}`);
  }

  return {
    ok: true,
    value: {
      outputDir: outputDirectory,
      files,
      requiredModules: output.requiredModules,
      diagnostics: output.diagnostics,
    },
  };
};
