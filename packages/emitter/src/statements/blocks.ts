/**
 * Block and expression statement emitters
 */

import type { SyntaxNode } from "@luacxx/frontend";
import type {
  CppFragment,
  EmitNodeOptions,
  EmitterContext,
} from "../types.js";
import { EMPTY_FRAGMENT, withScoped } from "../types.js";
import { requireChild } from "../core/errors.js";
import { emitLine } from "../core/hoisting.js";
import { emitNode } from "../node-emitter.js";

export const endsInReturn = (block: SyntaxNode): boolean =>
  block.children[block.children.length - 1]?.kind === "returnStatement";

/**
 * Emit statements in order. Each one sees the statements after it, which
 * decides whether its locals need shared cells.
 */
export const emitStatements = (
  statements: readonly SyntaxNode[],
  context: EmitterContext
): EmitterContext =>
  statements.reduce((current, statement, index) => {
    const [, next] = emitNode(statement, {
      ...current,
      following: statements.slice(index + 1),
    });
    return next;
  }, context);

/**
 * `do ... end`, or with `noBraces` the body of a loop or function.
 * Locals declared inside go out of scope at the end either way.
 */
export const emitBlock = (
  node: SyntaxNode,
  context: EmitterContext,
  options: EmitNodeOptions
): [CppFragment, EmitterContext] => {
  const braces = !options.noBraces;
  if (braces) {
    emitLine(context, "{");
  }

  const [, after] = withScoped(
    context,
    { indentLevel: braces ? context.indentLevel + 1 : context.indentLevel },
    (inner) => {
      const done = emitStatements(node.children, inner);
      if (options.lambda && !endsInReturn(node)) {
        emitLine(done, "out_result.clear();");
      }
      return [EMPTY_FRAGMENT, done];
    }
  );

  if (braces) {
    emitLine(after, "}");
  }
  return [EMPTY_FRAGMENT, after];
};

/**
 * A call whose results are discarded
 */
export const emitExpressionStatement = (
  node: SyntaxNode,
  context: EmitterContext
): [CppFragment, EmitterContext] => {
  const expression = requireChild(node, 0, "expression", context);
  const [fragment, next] = emitNode(expression, context, { discard: true });
  if (!fragment.multi && !fragment.stable) {
    emitLine(next, `(void)(${fragment.text});`);
  }
  return [EMPTY_FRAGMENT, next];
};
