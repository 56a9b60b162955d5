/**
 * While and repeat loop emitters
 */

import type { SyntaxNode } from "@luacxx/frontend";
import type { CppFragment, EmitterContext } from "../../types.js";
import { EMPTY_FRAGMENT, indent, withScoped } from "../../types.js";
import { malformed, requireChild } from "../../core/errors.js";
import { asCondition, negateCondition } from "../../core/boolean-context.js";
import { captureStatements, emitLine, emitLines } from "../../core/hoisting.js";
import { emitNode } from "../../node-emitter.js";
import { emitStatements } from "../blocks.js";

/**
 * `while c do ... end`. A condition that needs statements is re-evaluated
 * at the top of every iteration.
 */
export const emitWhile = (
  node: SyntaxNode,
  context: EmitterContext
): [CppFragment, EmitterContext] => {
  const condition = requireChild(node, 0, "condition", context);
  const body = requireChild(node, 1, "body", context);

  const inner = indent(context);
  const [lines, [test, afterTest]] = captureStatements(inner, () =>
    emitNode(condition, inner)
  );
  if (lines.length === 0) {
    emitLine(context, `while (${asCondition(test)}) {`);
  } else {
    emitLine(context, "while (true) {");
    emitLines(context, lines);
    emitLine(inner, `if (${negateCondition(test)}) break;`);
  }

  const [, afterBody] = emitNode(body, afterTest, { noBraces: true });
  emitLine(context, "}");
  return [EMPTY_FRAGMENT, { ...afterBody, indentLevel: context.indentLevel }];
};

/**
 * `repeat ... until c`. The condition is emitted in the body's scope since it
 * may read the body's locals.
 */
export const emitRepeat = (
  node: SyntaxNode,
  context: EmitterContext
): [CppFragment, EmitterContext] => {
  const body = requireChild(node, 0, "body", context);
  const condition = requireChild(node, 1, "condition", context);
  if (body.kind !== "block") {
    throw malformed(node, `has a '${body.kind}' body, expected 'block'`, context);
  }

  emitLine(context, "while (true) {");
  const [, after] = withScoped(
    context,
    { indentLevel: context.indentLevel + 1 },
    (inner) => {
      const afterBody = emitStatements(body.children, inner);
      const [test, afterTest] = emitNode(condition, afterBody);
      emitLine(afterTest, `if (${asCondition(test)}) break;`);
      return [EMPTY_FRAGMENT, afterTest];
    }
  );
  emitLine(context, "}");
  return [EMPTY_FRAGMENT, after];
};
