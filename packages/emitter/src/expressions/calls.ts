/**
 * Call and method call emitters
 */

import type { SyntaxNode } from "@luacxx/frontend";
import type {
  CppFragment,
  EmitNodeOptions,
  EmitterContext,
} from "../types.js";
import { nextId } from "../types.js";
import { requireChild, requireName } from "../core/errors.js";
import { asValue } from "../core/boolean-context.js";
import { emitLine } from "../core/hoisting.js";
import { emitExpressionList } from "../core/sequence.js";
import { emitNode } from "../node-emitter.js";
import { emitBuiltinCall } from "./calls/builtin-emitter.js";
import { specializedBuiltin } from "./calls/call-analysis.js";
import { invokeCallable } from "./calls/call-emitter.js";

export const emitCall = (
  node: SyntaxNode,
  context: EmitterContext,
  options: EmitNodeOptions
): [CppFragment, EmitterContext] => {
  const callee = requireChild(node, 0, "callee", context);
  const args = node.children.slice(1);

  const builtin = specializedBuiltin(callee, context);
  if (builtin) {
    const specialized = emitBuiltinCall(builtin, node, args, context, options);
    if (specialized) {
      return specialized;
    }
  }

  // Callee first; argument hoisting pins it in a temporary
  const [calleeFragment, afterCallee] = emitNode(callee, context);
  const [[target, ...values], next] = emitExpressionList(args, afterCallee, [
    calleeFragment,
  ]);
  return invokeCallable(target ?? calleeFragment, values, next, options);
};

/**
 * `receiver:method(args)`: the receiver is evaluated once and passed first
 */
export const emitMethodCall = (
  node: SyntaxNode,
  context: EmitterContext,
  options: EmitNodeOptions
): [CppFragment, EmitterContext] => {
  const receiver = requireChild(node, 0, "receiver", context);
  const method = requireName(node, context);
  const args = node.children.slice(1);

  const [receiverFragment, afterReceiver] = emitNode(receiver, context);
  const self = nextId(afterReceiver, "self");
  emitLine(afterReceiver, `LuaValue ${self} = ${asValue(receiverFragment)};`);
  const callable = nextId(afterReceiver, "method");
  emitLine(
    afterReceiver,
    `LuaValue ${callable} = lua_get_member(${self}, "${method}");`
  );

  const [values, next] = emitExpressionList(args, afterReceiver, [
    { text: self, stable: true },
  ]);
  return invokeCallable({ text: callable, stable: true }, values, next, options);
};
