/**
 * Short-circuit `and` / `or`
 *
 * The left value is held in a temporary. The right operand is emitted into
 * its own hoisting frame and spliced inside the branch, so none of its
 * statements run when the left value decides the result.
 */

import type { SyntaxNode } from "@luacxx/frontend";
import type { CppFragment, EmitterContext } from "../types.js";
import { indent, nextId } from "../types.js";
import { emitNode } from "../node-emitter.js";
import { asValue } from "../core/boolean-context.js";
import { captureStatements, emitLine, emitLines } from "../core/hoisting.js";

export const emitLogical = (
  operator: "and" | "or",
  left: SyntaxNode,
  right: SyntaxNode,
  context: EmitterContext
): [CppFragment, EmitterContext] => {
  const [leftFragment, afterLeft] = emitNode(left, context);
  const temp = nextId(afterLeft, operator);
  emitLine(afterLeft, `LuaValue ${temp} = ${asValue(leftFragment)};`);
  emitLine(
    afterLeft,
    operator === "and"
      ? `if (is_lua_truthy(${temp})) {`
      : `if (!is_lua_truthy(${temp})) {`
  );

  const inner = indent(afterLeft);
  const [lines, [rightFragment, afterRight]] = captureStatements(inner, () =>
    emitNode(right, inner)
  );
  emitLines(afterLeft, lines);
  emitLine(inner, `${temp} = ${asValue(rightFragment)};`);
  emitLine(afterLeft, "}");

  return [
    { text: temp, stable: true },
    { ...afterRight, indentLevel: afterLeft.indentLevel },
  ];
};
