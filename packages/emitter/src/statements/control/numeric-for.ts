/**
 * Numeric for loop emitter
 *
 * Four lowerings, all visiting the same values:
 * 1. integer literal bounds, step 1: `for (...; v <= limit; v++)`
 * 2. integer literal bounds, step -1: `for (...; v >= limit; v--)`
 * 3. integer literal bounds and step: comparison fixed by the step's sign
 * 4. anything else: double counters, step and limit evaluated once, the
 *    direction decided at run time
 */

import type { SyntaxNode } from "@luacxx/frontend";
import type { CppFragment, EmitterContext } from "../../types.js";
import { EMPTY_FRAGMENT, nextId, withScoped } from "../../types.js";
import {
  malformed,
  reportWarning,
  requireChild,
  requireName,
} from "../../core/errors.js";
import { asValue } from "../../core/boolean-context.js";
import { smallInteger } from "../../core/caches.js";
import { emitLine } from "../../core/hoisting.js";
import { bindLocal } from "../../core/local-names.js";
import { emitSequence, materialize } from "../../core/sequence.js";
import { emitNode } from "../../node-emitter.js";
import {
  LLONG_MAX,
  LLONG_MIN,
  cppIntegerLiteral,
  integerConstant,
} from "../../expressions/literals.js";

type LoopParts = {
  readonly name: string;
  readonly start: SyntaxNode;
  readonly limit: SyntaxNode;
  readonly step: SyntaxNode | undefined;
  readonly body: SyntaxNode;
};

type IntegerRange = {
  readonly start: bigint;
  readonly limit: bigint;
  readonly step: bigint;
};

const readParts = (node: SyntaxNode, context: EmitterContext): LoopParts => {
  const count = node.children.length;
  if (count !== 3 && count !== 4) {
    throw malformed(node, `has ${count} children, expected 3 or 4`, context);
  }
  return {
    name: requireName(node, context),
    start: requireChild(node, 0, "start", context),
    limit: requireChild(node, 1, "limit", context),
    step: count === 4 ? requireChild(node, 2, "step", context) : undefined,
    body: requireChild(node, count - 1, "body", context),
  };
};

/**
 * Literal integer range whose counter can never overflow
 */
const integerRange = (parts: LoopParts): IntegerRange | undefined => {
  const start = integerConstant(parts.start);
  const limit = integerConstant(parts.limit);
  const step = parts.step ? integerConstant(parts.step) : 1n;
  if (start === undefined || limit === undefined || step === undefined || step === 0n) {
    return undefined;
  }
  const past = limit + step;
  return past > LLONG_MAX || past < LLONG_MIN ? undefined : { start, limit, step };
};

const emitBody = (
  parts: LoopParts,
  init: string,
  context: EmitterContext
): EmitterContext => {
  const [, after] = withScoped(
    context,
    { indentLevel: context.indentLevel + 1 },
    (inner) => {
      const bound = bindLocal(parts.name, init, parts.body.children, inner);
      return emitNode(parts.body, bound, { noBraces: true });
    }
  );
  emitLine(after, "}");
  return after;
};

const emitIntegerLoop = (
  parts: LoopParts,
  range: IntegerRange,
  context: EmitterContext
): EmitterContext => {
  const counter = nextId(context, "i");
  const start = cppIntegerLiteral(range.start);
  const limit = cppIntegerLiteral(range.limit);

  const header =
    range.step === 1n
      ? `${counter} <= ${limit}; ${counter}++`
      : range.step === -1n
        ? `${counter} >= ${limit}; ${counter}--`
        : `${counter} ${range.step > 0n ? "<=" : ">="} ${limit}; ${counter} += ${cppIntegerLiteral(range.step)}`;

  emitLine(context, `for (long long ${counter} = ${start}; ${header}) {`);
  return emitBody(parts, `LuaValue(${counter})`, context);
};

const emitGenericLoop = (
  parts: LoopParts,
  context: EmitterContext
): EmitterContext => {
  const [values, evaluated] = emitSequence(
    parts.step ? [parts.start, parts.limit, parts.step] : [parts.start, parts.limit],
    context
  );
  // Start and step are read twice
  const [start, limit, step] = values
    .map((value) => asValue(materialize(value, evaluated)))
    .concat(parts.step ? [] : [smallInteger(evaluated, 1)]);

  const loop = nextId(evaluated, "for");
  const counter = `${loop}_v`;
  emitLine(evaluated, `const double ${loop}_start = get_double(${start});`);
  emitLine(evaluated, `const double ${loop}_limit = get_double(${limit});`);
  emitLine(evaluated, `const double ${loop}_step = get_double(${step});`);
  emitLine(
    evaluated,
    `if (${loop}_step == 0.0) throw std::runtime_error("'for' step is zero");`
  );
  emitLine(
    evaluated,
    `const bool ${loop}_int = std::holds_alternative<long long>(${start}) && std::holds_alternative<long long>(${step});`
  );
  emitLine(
    evaluated,
    `for (double ${counter} = ${loop}_start; ${loop}_step > 0 ? ${counter} <= ${loop}_limit : ${counter} >= ${loop}_limit; ${counter} += ${loop}_step) {`
  );
  return emitBody(
    parts,
    `${loop}_int ? LuaValue(static_cast<long long>(${counter})) : LuaValue(${counter})`,
    evaluated
  );
};

export const emitNumericFor = (
  node: SyntaxNode,
  context: EmitterContext
): [CppFragment, EmitterContext] => {
  const parts = readParts(node, context);

  if (parts.step && integerConstant(parts.step) === 0n) {
    reportWarning(
      context,
      "LCX2003",
      "'for' step is zero; the loop raises an error when it runs",
      parts.step
    );
  }

  const range = integerRange(parts);
  const after = range
    ? emitIntegerLoop(parts, range, context)
    : emitGenericLoop(parts, context);
  return [EMPTY_FRAGMENT, after];
};
