/**
 * Local variable declaration emitter
 */

import type { SyntaxNode } from "@luacxx/frontend";
import type { CppFragment, EmitterContext } from "../../types.js";
import { EMPTY_FRAGMENT } from "../../types.js";
import { malformed, requireChild } from "../../core/errors.js";
import { asValue } from "../../core/boolean-context.js";
import { bindLocal } from "../../core/local-names.js";
import { adjustValues } from "../value-lists.js";

/**
 * Names of a variable list made only of identifiers
 */
export const identifierNames = (
  list: SyntaxNode,
  context: EmitterContext
): string[] =>
  list.children.map((child) => {
    if (child.kind !== "identifier" || child.name === undefined) {
      throw malformed(list, `declares a '${child.kind}' instead of a name`, context);
    }
    return child.name;
  });

/**
 * `local a, b = ...`: every value is evaluated before any name comes into
 * scope, so `local x = x` reads the outer `x`.
 */
export const emitLocalDeclaration = (
  node: SyntaxNode,
  context: EmitterContext
): [CppFragment, EmitterContext] => {
  const names = identifierNames(
    requireChild(node, 0, "variable list", context),
    context
  );
  const expressions = node.children[1]?.children ?? [];

  const [values, evaluated] = adjustValues(expressions, names.length, context);
  const declared = names.reduce((current, name, index) => {
    const value = values[index];
    return bindLocal(
      name,
      value ? asValue(value) : "LuaValue()",
      context.following,
      current
    );
  }, evaluated);

  return [EMPTY_FRAGMENT, declared];
};
