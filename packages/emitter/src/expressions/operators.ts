/**
 * Operator expression emitters
 */

import {
  isBinaryOperator,
  isUnaryOperator,
  type BinaryOperator,
  type SyntaxNode,
} from "@luacxx/frontend";
import type { CppFragment, EmitterContext } from "../types.js";
import { requireChild, reportWarning } from "../core/errors.js";
import { asValue, negateCondition } from "../core/boolean-context.js";
import { emitLine } from "../core/hoisting.js";
import { emitPair } from "../core/sequence.js";
import { emitNode } from "../node-emitter.js";
import { negateNumeral, numeralFragment, parseNumeral } from "./literals.js";
import { emitLogical } from "./logical.js";

/** Comparison operators and the runtime predicate each maps to */
const COMPARISONS: Partial<Record<BinaryOperator, string>> = {
  "==": "lua_equals",
  "~=": "lua_not_equals",
  "<": "lua_less_than",
  "<=": "lua_less_equals",
  ">": "lua_greater_than",
  ">=": "lua_greater_equals",
};

const unsupportedOperator = (
  node: SyntaxNode,
  context: EmitterContext
): [CppFragment, EmitterContext] => {
  const operator = String(node.literal);
  reportWarning(
    context,
    "LCX2001",
    `Unsupported operator '${operator}' in '${node.kind}'`,
    node
  );
  emitLine(context, `/* unsupported: operator ${operator} */`);
  return [{ text: "LuaValue()", stable: true }, context];
};

/**
 * Combine two evaluated operands
 */
const combine = (
  operator: Exclude<BinaryOperator, "and" | "or">,
  left: string,
  right: string
): CppFragment => {
  const predicate = COMPARISONS[operator];
  if (predicate) {
    return { text: `${predicate}(${left}, ${right})`, nativeBool: true };
  }

  switch (operator) {
    case "..":
      return { text: `lua_concat(${left}, ${right})` };
    case "^":
      return {
        text: `LuaValue(std::pow(get_double(${left}), get_double(${right})))`,
      };
    case "//":
      return {
        text: `LuaValue(static_cast<long long>(std::floor(get_double(${left}) / get_double(${right}))))`,
      };
    case "~":
      return { text: `(${left} ^ ${right})` };
    default:
      return { text: `(${left} ${operator} ${right})` };
  }
};

export const emitBinary = (
  node: SyntaxNode,
  context: EmitterContext
): [CppFragment, EmitterContext] => {
  const operator = node.literal;
  if (!isBinaryOperator(operator)) {
    return unsupportedOperator(node, context);
  }
  const left = requireChild(node, 0, "left operand", context);
  const right = requireChild(node, 1, "right operand", context);

  if (operator === "and" || operator === "or") {
    return emitLogical(operator, left, right, context);
  }

  const [[leftFragment, rightFragment], next] = emitPair(left, right, context);
  return [
    combine(operator, asValue(leftFragment), asValue(rightFragment)),
    next,
  ];
};

export const emitUnary = (
  node: SyntaxNode,
  context: EmitterContext
): [CppFragment, EmitterContext] => {
  const operator = node.literal;
  if (!isUnaryOperator(operator)) {
    return unsupportedOperator(node, context);
  }
  const operand = requireChild(node, 0, "operand", context);

  // -<numeral> folds into the constant
  if (operator === "-" && operand.kind === "number") {
    return [
      numeralFragment(negateNumeral(parseNumeral(operand, context)), context),
      context,
    ];
  }

  const [fragment, next] = emitNode(operand, context);
  switch (operator) {
    case "-":
      return [{ text: `(-${asValue(fragment)})` }, next];
    case "not":
      return [{ text: negateCondition(fragment), nativeBool: true }, next];
    case "#":
      return [{ text: `lua_get_length(${asValue(fragment)})` }, next];
    case "~":
      return [{ text: `(~${asValue(fragment)})` }, next];
  }
};
