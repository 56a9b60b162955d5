/**
 * Main C++ Emitter - Public API
 * Orchestrates code generation from syntax trees
 */

import type { Diagnostic, Result, SyntaxNode } from "@luacxx/frontend";
import type { EmitterOptions } from "./types.js";
import { moduleNamespace } from "./types.js";
import { emitUnit } from "./core/module-emitter/orchestrator.js";

/**
 * Names of the files a unit is written to
 */
export type UnitFileNames = {
  readonly source: string;
  readonly header?: string;
};

export const unitFileNames = (
  options: Pick<EmitterOptions, "moduleName"> = {}
): UnitFileNames => {
  if (options.moduleName === undefined) {
    return { source: "main.cpp" };
  }
  const namespace = moduleNamespace(options.moduleName);
  return { source: `${namespace}.cpp`, header: `${namespace}.hpp` };
};

/**
 * Emit the files of one unit, keyed by file name
 */
export const emitUnitFiles = (
  tree: SyntaxNode,
  options: Partial<EmitterOptions> = {}
): Result<ReadonlyMap<string, string>, Diagnostic[]> => {
  const result = emitUnit(tree, options);
  if (!result.ok) {
    return result;
  }

  const names = unitFileNames(options);
  const files = new Map<string, string>([[names.source, result.value.source]]);
  if (names.header !== undefined && result.value.header !== undefined) {
    files.set(names.header, result.value.header);
  }
  return { ok: true, value: files };
};
