/**
 * Syntax tree model consumed by the C++ backend
 *
 * Trees are produced by an external parser. A node carries its kind, an
 * optional literal payload (operator symbol, numeral text, string value,
 * boolean), an optional name, and its ordered children. Nodes are never
 * mutated after construction.
 */

export type SyntaxLiteral = string | number | boolean;

export type SyntaxNode = {
  readonly kind: string;
  readonly literal?: SyntaxLiteral;
  readonly name?: string;
  readonly line?: number;
  readonly children: readonly SyntaxNode[];
};

/**
 * Every node kind the backend knows how to translate.
 */
export const SYNTAX_KINDS = [
  // Program structure
  "chunk",
  "block",
  // Literals and names
  "nil",
  "boolean",
  "number",
  "string",
  "identifier",
  "varargs",
  // Operators and access
  "unary",
  "binary",
  "member",
  "index",
  "table",
  "tableField",
  "call",
  "methodCall",
  "functionExpression",
  // Lists
  "parameterList",
  "variableList",
  "expressionList",
  // Statements
  "localDeclaration",
  "assignment",
  "expressionStatement",
  "ifStatement",
  "ifClause",
  "elseifClause",
  "elseClause",
  "whileStatement",
  "repeatStatement",
  "numericFor",
  "genericFor",
  "breakStatement",
  "labelStatement",
  "gotoStatement",
  "returnStatement",
  "functionDeclaration",
  "localFunction",
  "methodDeclaration",
] as const;

export type SyntaxKind = (typeof SYNTAX_KINDS)[number];

const KNOWN_KINDS: ReadonlySet<string> = new Set(SYNTAX_KINDS);

export const isSyntaxKind = (kind: string): kind is SyntaxKind =>
  KNOWN_KINDS.has(kind);

export const BINARY_OPERATORS = [
  "+",
  "-",
  "*",
  "/",
  "//",
  "%",
  "^",
  "..",
  "==",
  "~=",
  "<",
  "<=",
  ">",
  ">=",
  "and",
  "or",
  "&",
  "|",
  "~",
  "<<",
  ">>",
] as const;

export type BinaryOperator = (typeof BINARY_OPERATORS)[number];

export const UNARY_OPERATORS = ["-", "not", "#", "~"] as const;

export type UnaryOperator = (typeof UNARY_OPERATORS)[number];

const BINARY_SET: ReadonlySet<string> = new Set(BINARY_OPERATORS);
const UNARY_SET: ReadonlySet<string> = new Set(UNARY_OPERATORS);

export const isBinaryOperator = (value: unknown): value is BinaryOperator =>
  typeof value === "string" && BINARY_SET.has(value);

export const isUnaryOperator = (value: unknown): value is UnaryOperator =>
  typeof value === "string" && UNARY_SET.has(value);

/**
 * Kinds whose value may expand to several results when they end a list.
 */
export const isMultiValueKind = (kind: string): boolean =>
  kind === "call" || kind === "methodCall" || kind === "varargs";
