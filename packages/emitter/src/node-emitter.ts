/**
 * Node Emitter - syntax tree nodes to C++
 * Main dispatcher - delegates to specialized modules
 */

import { isSyntaxKind, type SyntaxNode } from "@luacxx/frontend";
import type {
  CppFragment,
  EmitNodeOptions,
  EmitterContext,
  NodeHandler,
} from "./types.js";
import { defaultOptions } from "./core/options.js";
import { fatal, malformed, reportWarning } from "./core/errors.js";
import { emitLine } from "./core/hoisting.js";

// Expressions
import {
  emitNil,
  emitBoolean,
  emitNumber,
  emitString,
} from "./expressions/literals.js";
import { emitIdentifier } from "./expressions/identifiers.js";
import { emitVarargs } from "./expressions/varargs.js";
import { emitBinary, emitUnary } from "./expressions/operators.js";
import { emitMember, emitIndex } from "./expressions/access.js";
import { emitTable } from "./expressions/collections.js";
import { emitCall, emitMethodCall } from "./expressions/calls.js";
import { emitFunctionExpression } from "./expressions/functions.js";

// Statements
import {
  emitBlock,
  emitExpressionStatement,
} from "./statements/blocks.js";
import { emitLocalDeclaration } from "./statements/declarations/variables.js";
import {
  emitFunctionDeclaration,
  emitLocalFunction,
  emitMethodDeclaration,
} from "./statements/declarations/functions.js";
import { emitAssignment } from "./statements/assignments.js";
import { emitIfStatement } from "./statements/control/conditionals.js";
import { emitWhile, emitRepeat } from "./statements/control/loops.js";
import { emitNumericFor } from "./statements/control/numeric-for.js";
import { emitGenericFor } from "./statements/control/generic-for.js";
import { emitBreak, emitLabel, emitGoto } from "./statements/control/jumps.js";
import { emitReturn } from "./statements/returns.js";

/**
 * Inert stand-in for a node kind the backend does not know. Translation of
 * the rest of the unit continues.
 */
const emitUnsupported: NodeHandler = (node, context) => {
  reportWarning(
    context,
    "LCX2001",
    `Unsupported construct '${node.kind}'`,
    node
  );
  emitLine(context, `/* unsupported: ${node.kind} */`);
  return [{ text: "LuaValue()", stable: true }, context];
};

const dispatch = (
  node: SyntaxNode,
  context: EmitterContext,
  options: EmitNodeOptions
): [CppFragment, EmitterContext] => {
  const kind = node.kind;
  if (!isSyntaxKind(kind)) {
    return emitUnsupported(node, context, options);
  }

  switch (kind) {
    case "nil":
      return emitNil(node, context);
    case "boolean":
      return emitBoolean(node, context);
    case "number":
      return emitNumber(node, context);
    case "string":
      return emitString(node, context);
    case "identifier":
      return emitIdentifier(node, context);
    case "varargs":
      return emitVarargs(node, context, options);
    case "unary":
      return emitUnary(node, context);
    case "binary":
      return emitBinary(node, context);
    case "member":
      return emitMember(node, context);
    case "index":
      return emitIndex(node, context);
    case "table":
      return emitTable(node, context);
    case "call":
      return emitCall(node, context, options);
    case "methodCall":
      return emitMethodCall(node, context, options);
    case "functionExpression":
      return emitFunctionExpression(node, context);

    case "chunk":
    case "block":
      return emitBlock(node, context, options);
    case "expressionStatement":
      return emitExpressionStatement(node, context);
    case "localDeclaration":
      return emitLocalDeclaration(node, context);
    case "assignment":
      return emitAssignment(node, context);
    case "ifStatement":
      return emitIfStatement(node, context);
    case "whileStatement":
      return emitWhile(node, context);
    case "repeatStatement":
      return emitRepeat(node, context);
    case "numericFor":
      return emitNumericFor(node, context);
    case "genericFor":
      return emitGenericFor(node, context);
    case "breakStatement":
      return emitBreak(node, context);
    case "labelStatement":
      return emitLabel(node, context);
    case "gotoStatement":
      return emitGoto(node, context);
    case "returnStatement":
      return emitReturn(node, context);
    case "functionDeclaration":
      return emitFunctionDeclaration(node, context);
    case "localFunction":
      return emitLocalFunction(node, context);
    case "methodDeclaration":
      return emitMethodDeclaration(node, context);

    // Only meaningful inside their parent, which reads them directly
    case "tableField":
    case "parameterList":
    case "variableList":
    case "expressionList":
    case "ifClause":
    case "elseifClause":
    case "elseClause":
      throw malformed(node, "cannot appear outside its parent", context);

    default: {
      const exhaustive: never = kind;
      return exhaustive;
    }
  }
};

/**
 * Emit a node, bounded by the recursion-depth guard.
 *
 * Expressions return their C++ text; statements append to the current
 * hoisting frame and return an empty fragment. With `multiret`, call-shaped
 * nodes return the name of the buffer holding all their results.
 */
export const emitNode = (
  node: SyntaxNode,
  context: EmitterContext,
  options: EmitNodeOptions = {}
): [CppFragment, EmitterContext] => {
  const maxDepth = context.options.maxDepth ?? defaultOptions.maxDepth ?? 50;
  if (context.depth >= maxDepth) {
    throw fatal(
      "LCX6002",
      `Recursion depth limit of ${maxDepth} exceeded at '${node.kind}'`,
      node,
      context
    );
  }

  const [fragment, after] = dispatch(
    node,
    { ...context, depth: context.depth + 1 },
    options
  );
  return [fragment, { ...after, depth: context.depth }];
};
