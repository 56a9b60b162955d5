/**
 * Generic for loop emitter
 *
 * `for k, v in explist do` keeps the iterator function, state and control
 * value in temporaries and calls the function into a loop-owned buffer until
 * its first result is nil.
 */

import type { SyntaxNode } from "@luacxx/frontend";
import type { CppFragment, EmitterContext } from "../../types.js";
import { EMPTY_FRAGMENT, nextId, withScoped } from "../../types.js";
import { requireChild } from "../../core/errors.js";
import { asValue } from "../../core/boolean-context.js";
import { emitLine } from "../../core/hoisting.js";
import { bindLocal } from "../../core/local-names.js";
import { emitNode } from "../../node-emitter.js";
import { identifierNames } from "../declarations/variables.js";
import { adjustValues, bufferValue } from "../value-lists.js";

export const emitGenericFor = (
  node: SyntaxNode,
  context: EmitterContext
): [CppFragment, EmitterContext] => {
  const names = identifierNames(
    requireChild(node, 0, "variable list", context),
    context
  );
  const expressions = requireChild(node, 1, "expression list", context).children;
  const body = requireChild(node, 2, "body", context);

  const [values, evaluated] = adjustValues(expressions, 3, context);
  const [fn, state, control] = values.map(asValue);

  const iter = nextId(evaluated, "iter");
  const buffer = `${iter}_buf`;
  emitLine(evaluated, `LuaValue ${iter}_fn = ${fn};`);
  emitLine(evaluated, `LuaValue ${iter}_state = ${state};`);
  emitLine(evaluated, `LuaValue ${iter}_ctl = ${control};`);
  emitLine(evaluated, `LuaValueVector ${buffer};`);
  emitLine(evaluated, "while (true) {");

  const [, after] = withScoped(
    evaluated,
    { indentLevel: evaluated.indentLevel + 1 },
    (inner) => {
      emitLine(
        inner,
        `call_lua_value(${iter}_fn, ${buffer}, ${iter}_state, ${iter}_ctl);`
      );
      emitLine(
        inner,
        `if (${buffer}.empty() || std::holds_alternative<std::monostate>(${buffer}[0])) break;`
      );
      emitLine(inner, `${iter}_ctl = ${buffer}[0];`);
      const bound = names.reduce(
        (current, name, index) =>
          bindLocal(
            name,
            index === 0 ? `${buffer}[0]` : bufferValue(buffer, index),
            body.children,
            current
          ),
        inner
      );
      return emitNode(body, bound, { noBraces: true });
    }
  );

  emitLine(after, "}");
  return [EMPTY_FRAGMENT, after];
};
