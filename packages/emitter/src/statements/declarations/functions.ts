/**
 * Function declaration emitters
 */

import type { SyntaxNode } from "@luacxx/frontend";
import type { CppFragment, EmitterContext } from "../../types.js";
import { EMPTY_FRAGMENT, nextId } from "../../types.js";
import {
  malformed,
  requireChild,
  requireName,
} from "../../core/errors.js";
import { asValue } from "../../core/boolean-context.js";
import { globalKey } from "../../core/caches.js";
import { emitLine } from "../../core/hoisting.js";
import { allocateLocalName, declareLocal } from "../../core/local-names.js";
import { needsCell, referencesName } from "../../core/unit-analysis.js";
import { emitClosure, type FunctionShape } from "../../expressions/functions.js";
import { emitNode } from "../../node-emitter.js";

/**
 * Build the closure in a temporary and store it with `store`
 */
const emitStoredClosure = (
  shape: FunctionShape,
  context: EmitterContext,
  store: (closure: string) => string
): EmitterContext => {
  const closure = nextId(context, "fn");
  const after = emitClosure(`LuaValue ${closure} = `, shape, context);
  emitLine(after, store(closure));
  return after;
};

/**
 * `local function f() ... end`
 *
 * A function that refers to itself is built in two phases: an empty shared
 * cell comes into scope first, the lambda captures the cell, and the cell
 * is filled afterwards.
 */
export const emitLocalFunction = (
  node: SyntaxNode,
  context: EmitterContext
): [CppFragment, EmitterContext] => {
  const name = requireName(node, context);
  const shape: FunctionShape = {
    parameters: requireChild(node, 0, "parameter list", context),
    body: requireChild(node, 1, "body", context),
  };
  const cppName = allocateLocalName(name, context);

  if (referencesName(shape.body, name) || needsCell(name, context.following)) {
    const cellName = nextId(context, "cell");
    emitLine(context, `auto ${cellName} = std::make_shared<LuaValue>();`);
    const bound = declareLocal(context, name, {
      kind: "boxed",
      cppName,
      cellName,
    });
    return [EMPTY_FRAGMENT, emitClosure(`*${cellName} = `, shape, bound)];
  }

  const after = emitClosure(`LuaValue ${cppName} = `, shape, context);
  return [
    EMPTY_FRAGMENT,
    declareLocal(after, name, { kind: "plain", cppName }),
  ];
};

/**
 * `function name() ... end` and `function a.b.c() ... end`
 */
export const emitFunctionDeclaration = (
  node: SyntaxNode,
  context: EmitterContext
): [CppFragment, EmitterContext] => {
  const target = requireChild(node, 0, "target", context);
  const shape: FunctionShape = {
    parameters: requireChild(node, 1, "parameter list", context),
    body: requireChild(node, 2, "body", context),
  };

  if (target.kind === "identifier") {
    const name = requireName(target, context);
    const binding = context.scope.get(name);
    if (binding?.kind === "boxed") {
      return [EMPTY_FRAGMENT, emitClosure(`*${binding.cellName} = `, shape, context)];
    }
    if (binding) {
      return [EMPTY_FRAGMENT, emitClosure(`${binding.cppName} = `, shape, context)];
    }
    return [
      EMPTY_FRAGMENT,
      emitStoredClosure(
        shape,
        context,
        (closure) => `_G->set_item(${globalKey(context, name)}, ${closure});`
      ),
    ];
  }

  if (target.kind === "member") {
    const member = requireName(target, context);
    const base = requireChild(target, 0, "base", context);
    const [baseFragment, afterBase] = emitNode(base, context);
    return [
      EMPTY_FRAGMENT,
      emitStoredClosure(
        shape,
        afterBase,
        (closure) =>
          `get_object(${asValue(baseFragment)})->set("${member}", ${closure});`
      ),
    ];
  }

  throw malformed(node, `cannot declare a function on a '${target.kind}'`, context);
};

/**
 * `function obj:method() ... end`
 */
export const emitMethodDeclaration = (
  node: SyntaxNode,
  context: EmitterContext
): [CppFragment, EmitterContext] => {
  const method = requireName(node, context);
  const receiver = requireChild(node, 0, "receiver", context);
  const shape: FunctionShape = {
    parameters: requireChild(node, 1, "parameter list", context),
    body: requireChild(node, 2, "body", context),
    method: true,
  };

  const [receiverFragment, afterReceiver] = emitNode(receiver, context);
  return [
    EMPTY_FRAGMENT,
    emitStoredClosure(
      shape,
      afterReceiver,
      (closure) =>
        `get_object(${asValue(receiverFragment)})->set("${method}", ${closure});`
    ),
  ];
};
