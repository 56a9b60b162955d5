/**
 * Conditional chain emitter
 *
 * `if/elseif/else` maps onto `if / else if / else`. An `elseif` condition
 * that needs statements of its own cannot sit in an `else if`, so that
 * branch opens `else {`, runs the statements and nests a fresh `if`. Every
 * opened wrapper is closed once at the end of the chain.
 */

import type { SyntaxNode } from "@luacxx/frontend";
import type { CppFragment, EmitterContext } from "../../types.js";
import { EMPTY_FRAGMENT, dedent, indent } from "../../types.js";
import { malformed, requireChild } from "../../core/errors.js";
import { asCondition } from "../../core/boolean-context.js";
import { captureStatements, emitLine, emitLines } from "../../core/hoisting.js";
import { emitNode } from "../../node-emitter.js";

const emitBranchBody = (
  clause: SyntaxNode,
  index: number,
  context: EmitterContext
): EmitterContext => {
  const body = requireChild(clause, index, "body", context);
  const [, after] = emitNode(body, indent(context), { noBraces: true });
  return { ...after, indentLevel: context.indentLevel };
};

export const emitIfStatement = (
  node: SyntaxNode,
  context: EmitterContext
): [CppFragment, EmitterContext] => {
  const [first, ...rest] = node.children;
  if (first?.kind !== "ifClause") {
    throw malformed(node, "does not start with an 'ifClause'", context);
  }

  const [condition, afterCondition] = emitNode(
    requireChild(first, 0, "condition", context),
    context
  );
  emitLine(afterCondition, `if (${asCondition(condition)}) {`);
  let current = emitBranchBody(first, 1, afterCondition);
  let wrappers = 0;

  rest.forEach((clause, index) => {
    if (clause.kind === "elseClause") {
      if (index !== rest.length - 1) {
        throw malformed(node, "has an 'elseClause' before its last branch", context);
      }
      emitLine(current, "} else {");
      current = emitBranchBody(clause, 0, current);
      return;
    }
    if (clause.kind !== "elseifClause") {
      throw malformed(node, `has a '${clause.kind}' branch`, context);
    }

    const nested = indent(current);
    const [lines, [elseifCondition, afterElseif]] = captureStatements(
      nested,
      () => emitNode(requireChild(clause, 0, "condition", context), nested)
    );
    if (lines.length === 0) {
      emitLine(current, `} else if (${asCondition(elseifCondition)}) {`);
      current = emitBranchBody(clause, 1, {
        ...afterElseif,
        indentLevel: current.indentLevel,
      });
      return;
    }

    emitLine(current, "} else {");
    emitLines(current, lines);
    emitLine(nested, `if (${asCondition(elseifCondition)}) {`);
    wrappers += 1;
    current = emitBranchBody(clause, 1, afterElseif);
  });

  emitLine(current, "}");
  for (let i = 0; i < wrappers; i++) {
    current = dedent(current);
    emitLine(current, "}");
  }
  return [EMPTY_FRAGMENT, { ...current, indentLevel: context.indentLevel }];
};
