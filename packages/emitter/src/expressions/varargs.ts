/**
 * `...` in expression position
 *
 * Extra arguments start after the function's named parameters. Outside a
 * variadic function (including a unit's top level) the list is empty.
 */

import type { SyntaxNode } from "@luacxx/frontend";
import type { CppFragment, EmitNodeOptions, EmitterContext } from "../types.js";
import { emitLine } from "../core/hoisting.js";

export const emitVarargs = (
  _node: SyntaxNode,
  context: EmitterContext,
  options: EmitNodeOptions
): [CppFragment, EmitterContext] => {
  const { buffer, fixedParams, variadic } = context.frame;

  if (options.multiret) {
    emitLine(context, `${buffer}.clear();`);
    if (variadic) {
      emitLine(
        context,
        `if (n_args > ${fixedParams}) ${buffer}.assign(args + ${fixedParams}, args + n_args);`
      );
    }
    return [{ text: buffer, multi: true }, context];
  }

  if (!variadic) {
    return [{ text: "LuaValue()", stable: true }, context];
  }
  return [
    {
      text: `(n_args > ${fixedParams} ? args[${fixedParams}] : LuaValue())`,
      stable: true,
    },
    context,
  ];
};
