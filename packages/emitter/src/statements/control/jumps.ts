/**
 * Break, label and goto emitters
 */

import type { SyntaxNode } from "@luacxx/frontend";
import type { CppFragment, EmitterContext } from "../../types.js";
import { EMPTY_FRAGMENT, sanitizeIdentifier } from "../../types.js";
import { requireName } from "../../core/errors.js";
import { emitLine } from "../../core/hoisting.js";

export const emitBreak = (
  _node: SyntaxNode,
  context: EmitterContext
): [CppFragment, EmitterContext] => {
  emitLine(context, "break;");
  return [EMPTY_FRAGMENT, context];
};

/**
 * C++ rejects a jump over an initialized declaration in the same scope;
 * those gotos fail to compile rather than translate.
 */
export const emitLabel = (
  node: SyntaxNode,
  context: EmitterContext
): [CppFragment, EmitterContext] => {
  emitLine(context, `${sanitizeIdentifier(requireName(node, context))}:;`);
  return [EMPTY_FRAGMENT, context];
};

export const emitGoto = (
  node: SyntaxNode,
  context: EmitterContext
): [CppFragment, EmitterContext] => {
  emitLine(context, `goto ${sanitizeIdentifier(requireName(node, context))};`);
  return [EMPTY_FRAGMENT, context];
};
