/**
 * Function compiler
 *
 * Every script function becomes a `LuaFunctionWrapper` around a by-value
 * capturing lambda with the runtime's calling convention:
 * `(const LuaValue* args, size_t n_args, LuaValueVector& out_result)`.
 * Locals that a closure captures and someone later assigns live in shared
 * cells so every copy of the lambda sees one variable.
 */

import type { SyntaxNode } from "@luacxx/frontend";
import type {
  CppFragment,
  EmitterContext,
  FunctionFrame,
} from "../types.js";
import { nextId, withScoped } from "../types.js";
import { malformed, requireChild } from "../core/errors.js";
import { emitLine } from "../core/hoisting.js";
import { bindLocal } from "../core/local-names.js";
import { emitNode } from "../node-emitter.js";

export const LAMBDA_SIGNATURE =
  "[=](const LuaValue* args, size_t n_args, LuaValueVector& out_result) mutable";

export type FunctionShape = {
  readonly parameters: SyntaxNode;
  readonly body: SyntaxNode;
  /** `function t:m()` receives `self` first */
  readonly method?: boolean;
};

type ParameterList = {
  readonly names: readonly string[];
  readonly variadic: boolean;
};

const readParameters = (
  list: SyntaxNode,
  method: boolean,
  context: EmitterContext
): ParameterList => {
  if (list.kind !== "parameterList") {
    throw malformed(list, "is not a parameter list", context);
  }
  const names: string[] = method ? ["self"] : [];
  let variadic = false;
  list.children.forEach((child, index) => {
    if (child.kind === "varargs" && index === list.children.length - 1) {
      variadic = true;
    } else if (child.kind === "identifier" && child.name !== undefined) {
      names.push(child.name);
    } else {
      throw malformed(list, `has an invalid parameter '${child.kind}'`, context);
    }
  });
  return { names, variadic };
};

/**
 * Emit a closure as a statement starting with `lead`, e.g.
 * `LuaValue lx_fn_3 = ` or `*lx_cell_2 = `.
 */
export const emitClosure = (
  lead: string,
  shape: FunctionShape,
  context: EmitterContext
): EmitterContext => {
  const { names, variadic } = readParameters(
    shape.parameters,
    shape.method ?? false,
    context
  );
  const frame: FunctionFrame = {
    kind: "function",
    fixedParams: names.length,
    variadic,
    buffer: nextId(context, "buf"),
  };

  emitLine(
    context,
    `${lead}std::make_shared<LuaFunctionWrapper>(${LAMBDA_SIGNATURE} {`
  );

  const [, after] = withScoped(
    context,
    { indentLevel: context.indentLevel + 1, frame, following: [] },
    (inner) => {
      emitLine(inner, `LuaValueVector ${frame.buffer};`);
      const withParameters = names.reduce(
        (current, name, index) =>
          bindLocal(
            name,
            `n_args > ${index} ? args[${index}] : LuaValue()`,
            shape.body.children,
            current
          ),
        inner
      );
      return emitNode(shape.body, withParameters, {
        noBraces: true,
        lambda: true,
      });
    }
  );

  emitLine(after, "});");
  return after;
};

export const emitFunctionExpression = (
  node: SyntaxNode,
  context: EmitterContext
): [CppFragment, EmitterContext] => {
  const parameters = requireChild(node, 0, "parameter list", context);
  const body = requireChild(node, 1, "body", context);

  const name = nextId(context, "fn");
  const after = emitClosure(`LuaValue ${name} = `, { parameters, body }, context);
  return [{ text: name, stable: true }, after];
};
