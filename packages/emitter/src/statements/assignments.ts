/**
 * Assignment statement emitter
 *
 * Target bases and keys are evaluated first, then the values. With several
 * targets every value is pinned in a temporary before the first store, so
 * `a, b = b, a` swaps.
 */

import type { SyntaxNode } from "@luacxx/frontend";
import type { CppFragment, EmitterContext } from "../types.js";
import { EMPTY_FRAGMENT, nextId } from "../types.js";
import { malformed, requireChild, requireName } from "../core/errors.js";
import { asValue } from "../core/boolean-context.js";
import { globalKey } from "../core/caches.js";
import { emitLine } from "../core/hoisting.js";
import { emitSequence } from "../core/sequence.js";
import { adjustValues } from "./value-lists.js";

/**
 * A target with the nodes that must be evaluated before the right-hand side
 */
type AssignmentTarget =
  | { readonly kind: "name"; readonly name: string }
  | { readonly kind: "member"; readonly base: SyntaxNode; readonly name: string }
  | { readonly kind: "index"; readonly base: SyntaxNode; readonly key: SyntaxNode };

const classifyTarget = (
  target: SyntaxNode,
  context: EmitterContext
): AssignmentTarget => {
  switch (target.kind) {
    case "identifier":
      return { kind: "name", name: requireName(target, context) };
    case "member":
      return {
        kind: "member",
        base: requireChild(target, 0, "base", context),
        name: requireName(target, context),
      };
    case "index":
      return {
        kind: "index",
        base: requireChild(target, 0, "base", context),
        key: requireChild(target, 1, "key", context),
      };
    default:
      throw malformed(target, "cannot be assigned to", context);
  }
};

const targetParts = (target: AssignmentTarget): SyntaxNode[] => {
  switch (target.kind) {
    case "name":
      return [];
    case "member":
      return [target.base];
    case "index":
      return [target.base, target.key];
  }
};

/**
 * The statement storing `value` into a target
 */
const store = (
  target: AssignmentTarget,
  parts: readonly CppFragment[],
  value: string,
  context: EmitterContext
): string => {
  const [base, key] = parts.map(asValue);
  switch (target.kind) {
    case "name": {
      const binding = context.scope.get(target.name);
      if (binding?.kind === "boxed") {
        return `*${binding.cellName} = ${value};`;
      }
      if (binding) {
        return `${binding.cppName} = ${value};`;
      }
      return `_G->set_item(${globalKey(context, target.name)}, ${value});`;
    }
    case "member":
      return `get_object(${base})->set("${target.name}", ${value});`;
    case "index":
      return `get_object(${base})->set_item(${key}, ${value});`;
  }
};

const copyValue = (
  fragment: CppFragment,
  context: EmitterContext
): CppFragment => {
  const temp = nextId(context, "tmp");
  emitLine(context, `LuaValue ${temp} = ${asValue(fragment)};`);
  return { text: temp, stable: true };
};

export const emitAssignment = (
  node: SyntaxNode,
  context: EmitterContext
): [CppFragment, EmitterContext] => {
  const targets = requireChild(node, 0, "variable list", context).children.map(
    (target) => classifyTarget(target, context)
  );
  const expressions = requireChild(node, 1, "expression list", context).children;

  const partNodes = targets.map(targetParts);
  const [parts, afterParts] = emitSequence(partNodes.flat(), context);
  const [evaluated, afterValues] = adjustValues(
    expressions,
    targets.length,
    afterParts,
    parts
  );

  // Names read on the right may be targets on the left
  const pinned =
    targets.length > 1
      ? evaluated.map((fragment) => copyValue(fragment, afterValues))
      : evaluated;
  const values = pinned.slice(parts.length);

  let offset = 0;
  targets.forEach((target, index) => {
    const count = partNodes[index]?.length ?? 0;
    const targetFragments = pinned.slice(offset, offset + count);
    offset += count;
    const value = values[index];
    emitLine(
      afterValues,
      store(target, targetFragments, value ? asValue(value) : "LuaValue()", afterValues)
    );
  });

  return [EMPTY_FRAGMENT, afterValues];
};
