/**
 * Unit emission orchestrator
 */

import {
  error,
  ok,
  type Diagnostic,
  type Result,
  type SyntaxNode,
} from "@luacxx/frontend";
import type { EmitOutput, EmitterOptions } from "../../types.js";
import {
  createContext,
  createUnitState,
  moduleNamespace,
} from "../../types.js";
import { generateFileHeader } from "../../constants.js";
import { endsInReturn, emitStatements } from "../../statements/blocks.js";
import { renderPreamble } from "../caches.js";
import { EmitterError, malformed } from "../errors.js";
import { captureStatements } from "../hoisting.js";
import { defaultOptions } from "../options.js";
import { analyzeUnit } from "../unit-analysis.js";
import {
  assembleEntryUnit,
  assembleModuleUnit,
  type AssemblyParts,
} from "./assembly.js";
import { emitModuleHeader } from "./header.js";

/**
 * Translate one unit. Fatal problems abort the unit and come back as
 * diagnostics together with the warnings collected before them.
 */
export const emitUnit = (
  tree: SyntaxNode,
  options: Partial<EmitterOptions> = {}
): Result<EmitOutput, Diagnostic[]> => {
  const finalOptions: EmitterOptions = { ...defaultOptions, ...options };
  const analysis = analyzeUnit(tree);
  const unit = createUnitState(analysis.reassigned);
  const context = createContext(finalOptions, unit);

  try {
    if (tree.kind !== "chunk" && tree.kind !== "block") {
      throw malformed(tree, "cannot be the root of a unit", context);
    }

    const bodyContext = { ...context, indentLevel: 1 };
    const [body] = captureStatements(bodyContext, () =>
      emitStatements(tree.children, bodyContext)
    );

    const namespace =
      finalOptions.moduleName === undefined
        ? undefined
        : moduleNamespace(finalOptions.moduleName);
    const sourcePath =
      finalOptions.sourcePath ?? `${namespace ?? "main"}.lua`;

    const parts: AssemblyParts = {
      header: generateFileHeader(sourcePath, {
        includeTimestamp: finalOptions.includeTimestamp,
        timestamp: finalOptions.timestamp,
      }),
      requiredModules: [...unit.requiredModules]
        .filter((name) => name !== namespace)
        .sort(),
      preamble: renderPreamble(unit),
      body,
      returns: endsInReturn(tree),
    };

    return ok({
      source: namespace
        ? assembleModuleUnit(namespace, parts, finalOptions)
        : assembleEntryUnit(parts, finalOptions),
      header: namespace
        ? emitModuleHeader(namespace, finalOptions)
        : undefined,
      requiredModules: parts.requiredModules,
      diagnostics: [...unit.diagnostics],
    });
  } catch (err) {
    if (err instanceof EmitterError) {
      return error([...unit.diagnostics, err.diagnostic]);
    }
    throw err;
  }
};

/**
 * Translate a program entry point
 */
export const emitEntryUnit = (
  tree: SyntaxNode,
  options: Partial<Omit<EmitterOptions, "moduleName">> = {}
): Result<EmitOutput, Diagnostic[]> =>
  emitUnit(tree, { ...options, moduleName: undefined });

/**
 * Translate a module loaded with `require(moduleName)`
 */
export const emitModuleUnit = (
  tree: SyntaxNode,
  moduleName: string,
  options: Partial<Omit<EmitterOptions, "moduleName">> = {}
): Result<EmitOutput, Diagnostic[]> =>
  emitUnit(tree, { ...options, moduleName });
