import type { SyntaxNode } from "@luacxx/frontend";
import type { EmitterContext, LocalBinding } from "../types.js";
import { nextId, sanitizeIdentifier } from "../types.js";
import { emitLine } from "./hoisting.js";
import { needsCell } from "./unit-analysis.js";

/**
 * C++ expression reading a binding
 */
export const bindingRef = (binding: LocalBinding): string =>
  binding.kind === "boxed" ? `(*${binding.cellName})` : binding.cppName;

/**
 * Allocate a C++ identifier for a new script local.
 *
 * Reserved across every enclosing block, not only the visible scope: C++
 * rejects a second declaration of a name in one block, and `local x = x`
 * must not read the variable being declared.
 */
export const allocateLocalName = (
  originalName: string,
  context: EmitterContext
): string => {
  const base = sanitizeIdentifier(originalName);
  if (!context.declared.has(base)) {
    return base;
  }

  // Smallest free suffix keeps output independent of the identifier counter.
  let suffix = 1;
  while (context.declared.has(`${base}_${suffix}`)) {
    suffix++;
  }
  return `${base}_${suffix}`;
};

/**
 * Bring a script name into scope
 */
export const declareLocal = (
  context: EmitterContext,
  originalName: string,
  binding: LocalBinding
): EmitterContext => {
  const scope = new Map(context.scope);
  scope.set(originalName, binding);
  const declared = new Set(context.declared);
  declared.add(binding.cppName);
  if (binding.kind === "boxed") {
    declared.add(binding.cellName);
  }
  return { ...context, scope, declared };
};

/**
 * Declare a local holding `init`, boxed when a closure
 * in `scopeNodes` captures it and something assigns it.
 */
export const bindLocal = (
  name: string,
  init: string,
  scopeNodes: readonly SyntaxNode[],
  context: EmitterContext
): EmitterContext => {
  const cppName = allocateLocalName(name, context);
  if (needsCell(name, scopeNodes)) {
    const cellName = nextId(context, "cell");
    emitLine(context, `auto ${cellName} = std::make_shared<LuaValue>(${init});`);
    return declareLocal(context, name, { kind: "boxed", cppName, cellName });
  }
  emitLine(context, `LuaValue ${cppName} = ${init};`);
  return declareLocal(context, name, { kind: "plain", cppName });
};
