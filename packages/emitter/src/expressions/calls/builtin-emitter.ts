/**
 * Direct translations of runtime builtins
 *
 * Each translation bypasses the dynamic call. Shapes it does not cover
 * (wrong arity, an expanded last argument) return undefined and take the
 * generic path.
 */

import type { SyntaxNode } from "@luacxx/frontend";
import type {
  CppFragment,
  EmitNodeOptions,
  EmitterContext,
} from "../../types.js";
import { moduleNamespace } from "../../types.js";
import { reportWarning } from "../../core/errors.js";
import { asValue } from "../../core/boolean-context.js";
import { smallInteger } from "../../core/caches.js";
import { emitLine } from "../../core/hoisting.js";
import {
  emitExpressionList,
  emitSequence,
  endsInMultiValue,
  materialize,
} from "../../core/sequence.js";
import type { SpecializedBuiltin } from "./call-analysis.js";
import {
  argumentVector,
  callResult,
  noValues,
  singleValue,
} from "./call-emitter.js";

type BuiltinResult = [CppFragment, EmitterContext] | undefined;

const emitPrint = (
  args: readonly SyntaxNode[],
  context: EmitterContext,
  options: EmitNodeOptions
): BuiltinResult => {
  if (endsInMultiValue(args)) {
    const [values, next] = emitExpressionList(args, context);
    const tail = values[values.length - 1];
    if (!tail) {
      return undefined;
    }
    const vector = argumentVector(values.slice(0, -1), tail, next);
    emitLine(
      next,
      `lua_print(${vector}.data(), ${vector}.size(), ${next.frame.buffer});`
    );
    return [noValues(next, options), next];
  }

  const [values, next] = emitSequence(args, context);
  values.forEach((value, index) => {
    if (index > 0) {
      emitLine(next, `std::cout << "\\t";`);
    }
    emitLine(next, `print_value(${asValue(value)});`);
  });
  emitLine(next, "std::cout << std::endl;");
  return [noValues(next, options), next];
};

const emitRequire = (
  node: SyntaxNode,
  args: readonly SyntaxNode[],
  context: EmitterContext,
  options: EmitNodeOptions
): BuiltinResult => {
  const [name] = args;
  if (args.length !== 1 || name?.kind !== "string" || typeof name.literal !== "string") {
    reportWarning(
      context,
      "LCX2002",
      "require() without a string literal argument is resolved at run time",
      node,
      "Use require(\"module\") so the module is compiled and linked"
    );
    return undefined;
  }

  const namespace = moduleNamespace(name.literal);
  context.unit.requiredModules.add(namespace);
  emitLine(context, `${context.frame.buffer} = ${namespace}::load();`);
  return [callResult(context, options), context];
};

const emitSetmetatable = (
  args: readonly SyntaxNode[],
  context: EmitterContext,
  options: EmitNodeOptions
): BuiltinResult => {
  const [table, metatable] = args;
  if (args.length !== 2 || !table || !metatable || endsInMultiValue(args)) {
    return undefined;
  }

  const [[tableValue, metatableValue], next] = emitSequence(args, context);
  if (!tableValue || !metatableValue) {
    return undefined;
  }
  const pinned = materialize(tableValue, next);
  const target =
    metatable.kind === "nil" ? "nullptr" : `get_object(${asValue(metatableValue)})`;
  emitLine(next, `get_object(${asValue(pinned)})->set_metatable(${target});`);
  return [singleValue(asValue(pinned), next, options), next];
};

const emitSelectCount = (
  args: readonly SyntaxNode[],
  context: EmitterContext,
  options: EmitNodeOptions
): BuiltinResult => {
  const [selector, rest] = args;
  if (
    args.length !== 2 ||
    selector?.kind !== "string" ||
    selector.literal !== "#" ||
    rest?.kind !== "varargs"
  ) {
    return undefined;
  }
  const { fixedParams, variadic } = context.frame;
  const count = variadic
    ? `LuaValue(static_cast<long long>(n_args > ${fixedParams} ? n_args - ${fixedParams} : 0))`
    : smallInteger(context, 0);
  return [singleValue(count, context, options), context];
};

/**
 * Builtins computing one value from single-valued arguments
 */
const emitUnaryBuiltin = (
  args: readonly SyntaxNode[],
  arities: readonly number[],
  render: (values: readonly string[]) => string,
  context: EmitterContext,
  options: EmitNodeOptions
): BuiltinResult => {
  if (!arities.includes(args.length) || endsInMultiValue(args)) {
    return undefined;
  }
  const [values, next] = emitSequence(args, context);
  return [singleValue(render(values.map(asValue)), next, options), next];
};

const emitTableInsert = (
  args: readonly SyntaxNode[],
  context: EmitterContext,
  options: EmitNodeOptions
): BuiltinResult => {
  if ((args.length !== 2 && args.length !== 3) || endsInMultiValue(args)) {
    return undefined;
  }
  const [values, next] = emitSequence(args, context);
  const [table, second, third] = values.map(asValue);
  emitLine(
    next,
    third === undefined
      ? `lua_table_insert(${table}, ${second});`
      : `lua_table_insert(${table}, get_long_long(${second}), ${third});`
  );
  return [noValues(next, options), next];
};

export const emitBuiltinCall = (
  builtin: SpecializedBuiltin,
  node: SyntaxNode,
  args: readonly SyntaxNode[],
  context: EmitterContext,
  options: EmitNodeOptions
): BuiltinResult => {
  switch (builtin) {
    case "print":
      return emitPrint(args, context, options);
    case "require":
      return emitRequire(node, args, context, options);
    case "setmetatable":
      return emitSetmetatable(args, context, options);
    case "select":
      return emitSelectCount(args, context, options);
    case "type":
      return emitUnaryBuiltin(
        args,
        [1],
        ([value]) => `LuaValue(get_lua_type_name(${value}))`,
        context,
        options
      );
    case "string.len":
      return emitUnaryBuiltin(
        args,
        [1],
        ([value]) => `lua_get_length(${value})`,
        context,
        options
      );
    case "string.sub":
      return emitUnaryBuiltin(
        args,
        [2, 3],
        ([value, first, last]) =>
          `lua_string_sub(${value}, get_long_long(${first}), ${
            last === undefined ? "-1LL" : `get_long_long(${last})`
          })`,
        context,
        options
      );
    case "table.insert":
      return emitTableInsert(args, context, options);
  }
};
