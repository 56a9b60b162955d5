export type {
  SyntaxNode,
  SyntaxKind,
  SyntaxLiteral,
  BinaryOperator,
  UnaryOperator,
} from "./types.js";
export {
  SYNTAX_KINDS,
  BINARY_OPERATORS,
  UNARY_OPERATORS,
  isSyntaxKind,
  isBinaryOperator,
  isUnaryOperator,
  isMultiValueKind,
} from "./types.js";
export { parseSyntaxTree, loadSyntaxTree } from "./loader.js";
export { printTree, countNodes } from "./printer.js";
export * as build from "./builders.js";
