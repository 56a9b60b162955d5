/**
 * Call invocation and result handling
 *
 * Every call writes its results into the enclosing function's buffer. A
 * single-value context copies out the first result; a multi-value context
 * hands the buffer on.
 */

import type {
  CppFragment,
  EmitNodeOptions,
  EmitterContext,
} from "../../types.js";
import { nextId } from "../../types.js";
import { asValue } from "../../core/boolean-context.js";
import { emitLine } from "../../core/hoisting.js";

/**
 * Result of a call whose values are in the buffer
 */
export const callResult = (
  context: EmitterContext,
  options: EmitNodeOptions
): CppFragment => {
  const buffer = context.frame.buffer;
  if (options.multiret || options.discard) {
    return { text: buffer, multi: true };
  }
  const result = nextId(context, "ret");
  emitLine(
    context,
    `LuaValue ${result} = ${buffer}.empty() ? LuaValue() : ${buffer}[0];`
  );
  return { text: result, stable: true };
};

/**
 * Result of a builtin that produces nothing
 */
export const noValues = (
  context: EmitterContext,
  options: EmitNodeOptions
): CppFragment => {
  if (options.multiret && !options.discard) {
    emitLine(context, `${context.frame.buffer}.clear();`);
    return { text: context.frame.buffer, multi: true };
  }
  return { text: "LuaValue()", stable: true };
};

/**
 * Result of a builtin that computes exactly one value
 */
export const singleValue = (
  value: string,
  context: EmitterContext,
  options: EmitNodeOptions
): CppFragment => {
  if (options.multiret && !options.discard) {
    emitLine(context, `${context.frame.buffer}.assign(1, ${value});`);
    return { text: context.frame.buffer, multi: true };
  }
  return { text: value };
};

/**
 * Collect arguments ending in an expanded list into a fresh vector
 */
export const argumentVector = (
  args: readonly CppFragment[],
  tail: CppFragment,
  context: EmitterContext
): string => {
  const vector = nextId(context, "args");
  emitLine(context, `LuaValueVector ${vector};`);
  emitLine(context, `${vector}.reserve(${args.length} + ${tail.text}.size());`);
  for (const arg of args) {
    emitLine(context, `${vector}.push_back(${asValue(arg)});`);
  }
  emitLine(
    context,
    `${vector}.insert(${vector}.end(), ${tail.text}.begin(), ${tail.text}.end());`
  );
  return vector;
};

/**
 * Emit the runtime call of `callee` with evaluated arguments
 */
export const invokeCallable = (
  callee: CppFragment,
  args: readonly CppFragment[],
  context: EmitterContext,
  options: EmitNodeOptions
): [CppFragment, EmitterContext] => {
  const buffer = context.frame.buffer;
  const target = asValue(callee);
  const tail = args[args.length - 1];

  if (tail?.multi) {
    const vector = argumentVector(args.slice(0, -1), tail, context);
    emitLine(
      context,
      `call_lua_value(${target}, ${vector}.data(), ${vector}.size(), ${buffer});`
    );
  } else if (args.length === 0) {
    emitLine(context, `call_lua_value(${target}, nullptr, 0, ${buffer});`);
  } else {
    const values = args.map(asValue).join(", ");
    emitLine(context, `call_lua_value(${target}, ${buffer}, ${values});`);
  }

  return [callResult(context, options), context];
};
