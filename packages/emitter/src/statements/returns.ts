/**
 * Return statement emitter
 *
 * Values go into `out_result`. What follows depends on the frame: a plain
 * `return;` in a function, the memoized result in a module's load function,
 * `return 0;` from `main` (whose values are evaluated and dropped).
 */

import type { SyntaxNode } from "@luacxx/frontend";
import type { CppFragment, EmitterContext } from "../types.js";
import { EMPTY_FRAGMENT } from "../types.js";
import { asValue } from "../core/boolean-context.js";
import { emitLine } from "../core/hoisting.js";
import { emitExpressionList } from "../core/sequence.js";

export const emitReturn = (
  node: SyntaxNode,
  context: EmitterContext
): [CppFragment, EmitterContext] => {
  const [values, next] = emitExpressionList(node.children, context);

  if (next.frame.kind === "entry") {
    for (const value of values) {
      if (!value.stable && !value.multi) {
        emitLine(next, `(void)(${value.text});`);
      }
    }
    emitLine(next, "return 0;");
    return [EMPTY_FRAGMENT, next];
  }

  emitLine(next, "out_result.clear();");
  for (const value of values) {
    emitLine(
      next,
      value.multi
        ? `out_result.insert(out_result.end(), ${value.text}.begin(), ${value.text}.end());`
        : `out_result.push_back(${asValue(value)});`
    );
  }
  emitLine(next, next.frame.kind === "module" ? "return out_result;" : "return;");
  return [EMPTY_FRAGMENT, next];
};
