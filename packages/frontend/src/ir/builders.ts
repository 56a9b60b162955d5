/**
 * Constructors for syntax trees
 *
 * Used by tests and by tools that build trees in memory instead of loading
 * them from JSON.
 */

import type { SyntaxNode, SyntaxLiteral } from "./types.js";

export const node = (
  kind: string,
  children: readonly SyntaxNode[] = [],
  payload: { readonly literal?: SyntaxLiteral; readonly name?: string } = {}
): SyntaxNode => ({ kind, ...payload, children });

// Expressions

export const nil = (): SyntaxNode => node("nil");

export const bool = (value: boolean): SyntaxNode =>
  node("boolean", [], { literal: value });

/**
 * Numeric literal; pass the source text to keep integer/float spelling.
 */
export const num = (value: number | string): SyntaxNode =>
  node("number", [], { literal: value });

export const str = (value: string): SyntaxNode =>
  node("string", [], { literal: value });

export const id = (name: string): SyntaxNode =>
  node("identifier", [], { name });

export const varargs = (): SyntaxNode => node("varargs");

export const unary = (operator: string, operand: SyntaxNode): SyntaxNode =>
  node("unary", [operand], { literal: operator });

export const binary = (
  operator: string,
  left: SyntaxNode,
  right: SyntaxNode
): SyntaxNode => node("binary", [left, right], { literal: operator });

export const member = (base: SyntaxNode, name: string): SyntaxNode =>
  node("member", [base], { name });

export const index = (base: SyntaxNode, key: SyntaxNode): SyntaxNode =>
  node("index", [base, key]);

export const positionalField = (value: SyntaxNode): SyntaxNode =>
  node("tableField", [value]);

export const namedField = (name: string, value: SyntaxNode): SyntaxNode =>
  node("tableField", [value], { name });

export const keyedField = (key: SyntaxNode, value: SyntaxNode): SyntaxNode =>
  node("tableField", [key, value]);

export const table = (...fields: SyntaxNode[]): SyntaxNode =>
  node("table", fields);

export const call = (callee: SyntaxNode, ...args: SyntaxNode[]): SyntaxNode =>
  node("call", [callee, ...args]);

export const methodCall = (
  receiver: SyntaxNode,
  method: string,
  ...args: SyntaxNode[]
): SyntaxNode => node("methodCall", [receiver, ...args], { name: method });

export const params = (names: readonly string[], variadic = false): SyntaxNode =>
  node("parameterList", [
    ...names.map(id),
    ...(variadic ? [varargs()] : []),
  ]);

export const fn = (
  parameters: SyntaxNode,
  ...body: SyntaxNode[]
): SyntaxNode => node("functionExpression", [parameters, block(...body)]);

// Statements

export const chunk = (...statements: SyntaxNode[]): SyntaxNode =>
  node("chunk", statements);

export const block = (...statements: SyntaxNode[]): SyntaxNode =>
  node("block", statements);

export const local = (
  names: readonly string[],
  values: readonly SyntaxNode[] = []
): SyntaxNode =>
  node(
    "localDeclaration",
    values.length > 0
      ? [node("variableList", names.map(id)), node("expressionList", values)]
      : [node("variableList", names.map(id))]
  );

export const assign = (
  targets: readonly SyntaxNode[],
  values: readonly SyntaxNode[]
): SyntaxNode =>
  node("assignment", [
    node("variableList", targets),
    node("expressionList", values),
  ]);

export const exprStmt = (expression: SyntaxNode): SyntaxNode =>
  node("expressionStatement", [expression]);

export const ifChain = (
  branches: readonly (readonly [SyntaxNode, SyntaxNode])[],
  otherwise?: SyntaxNode
): SyntaxNode =>
  node("ifStatement", [
    ...branches.map(([condition, body], i) =>
      node(i === 0 ? "ifClause" : "elseifClause", [condition, body])
    ),
    ...(otherwise ? [node("elseClause", [otherwise])] : []),
  ]);

export const whileLoop = (condition: SyntaxNode, body: SyntaxNode): SyntaxNode =>
  node("whileStatement", [condition, body]);

export const repeatLoop = (body: SyntaxNode, condition: SyntaxNode): SyntaxNode =>
  node("repeatStatement", [body, condition]);

export const numericFor = (
  name: string,
  start: SyntaxNode,
  limit: SyntaxNode,
  step: SyntaxNode | undefined,
  body: SyntaxNode
): SyntaxNode =>
  node("numericFor", step ? [start, limit, step, body] : [start, limit, body], {
    name,
  });

export const genericFor = (
  names: readonly string[],
  values: readonly SyntaxNode[],
  body: SyntaxNode
): SyntaxNode =>
  node("genericFor", [
    node("variableList", names.map(id)),
    node("expressionList", values),
    body,
  ]);

export const brk = (): SyntaxNode => node("breakStatement");

export const label = (name: string): SyntaxNode =>
  node("labelStatement", [], { name });

export const gotoLabel = (name: string): SyntaxNode =>
  node("gotoStatement", [], { name });

export const ret = (...values: SyntaxNode[]): SyntaxNode =>
  node("returnStatement", values);

export const functionDecl = (
  target: SyntaxNode,
  parameters: SyntaxNode,
  ...body: SyntaxNode[]
): SyntaxNode =>
  node("functionDeclaration", [target, parameters, block(...body)]);

export const localFunction = (
  name: string,
  parameters: SyntaxNode,
  ...body: SyntaxNode[]
): SyntaxNode => node("localFunction", [parameters, block(...body)], { name });

export const methodDecl = (
  receiver: SyntaxNode,
  method: string,
  parameters: SyntaxNode,
  ...body: SyntaxNode[]
): SyntaxNode =>
  node("methodDeclaration", [receiver, parameters, block(...body)], {
    name: method,
  });
