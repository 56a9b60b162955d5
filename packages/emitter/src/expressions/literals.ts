/**
 * Literal expression emitters
 */

import type { SyntaxLiteral, SyntaxNode } from "@luacxx/frontend";
import type { CppFragment, EmitterContext } from "../types.js";
import { malformed } from "../core/errors.js";
import {
  SMALL_INTEGER_LIMIT,
  internString,
  smallInteger,
} from "../core/caches.js";

/**
 * A numeral after parsing: 64-bit integer (with wrap-around, as hex numerals
 * wrap) or a float kept in its source spelling.
 */
export type Numeral =
  | { readonly kind: "integer"; readonly value: bigint }
  | { readonly kind: "float"; readonly text: string };

export const LLONG_MAX = 2n ** 63n - 1n;
export const LLONG_MIN = -(2n ** 63n);

const DECIMAL_INTEGER = /^\d+$/;
const HEX_INTEGER = /^0[xX][0-9a-fA-F]+$/;
const DECIMAL_FLOAT = /^(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const HEX_FLOAT = /^0[xX](?:[0-9a-fA-F]+\.?[0-9a-fA-F]*|\.[0-9a-fA-F]+)(?:[pP][+-]?\d+)?$/;

const floatFromNumber = (value: number): string => {
  const text = String(value);
  return /^-?\d+$/.test(text) ? `${text}.0` : text;
};

/**
 * Parse a numeral payload. Undefined when it is not a numeral.
 */
export const readNumeral = (
  literal: SyntaxLiteral | undefined
): Numeral | undefined => {
  if (typeof literal === "number") {
    if (!Number.isFinite(literal)) {
      return undefined;
    }
    return Number.isSafeInteger(literal)
      ? { kind: "integer", value: BigInt(literal) }
      : { kind: "float", text: floatFromNumber(literal) };
  }
  if (typeof literal !== "string") {
    return undefined;
  }

  const text = literal.trim();
  if (DECIMAL_INTEGER.test(text)) {
    const value = BigInt(text);
    // Decimal integer numerals that overflow become floats
    return value > LLONG_MAX
      ? { kind: "float", text: `${text}.0` }
      : { kind: "integer", value };
  }
  if (HEX_INTEGER.test(text)) {
    return { kind: "integer", value: BigInt.asIntN(64, BigInt(text)) };
  }
  if (HEX_FLOAT.test(text)) {
    return { kind: "float", text: /[pP]/.test(text) ? text : `${text}p0` };
  }
  if (DECIMAL_FLOAT.test(text)) {
    return { kind: "float", text };
  }
  return undefined;
};

export const negateNumeral = (numeral: Numeral): Numeral =>
  numeral.kind === "integer"
    ? { kind: "integer", value: BigInt.asIntN(64, -numeral.value) }
    : {
        kind: "float",
        text: numeral.text.startsWith("-")
          ? numeral.text.slice(1)
          : `-${numeral.text}`,
      };

/**
 * Integer constant of a numeral node, or of a unary minus applied to one
 */
export const integerConstant = (node: SyntaxNode): bigint | undefined => {
  if (node.kind === "number") {
    const numeral = readNumeral(node.literal);
    return numeral?.kind === "integer" ? numeral.value : undefined;
  }
  const operand = node.children[0];
  if (node.kind === "unary" && node.literal === "-" && operand) {
    const inner = integerConstant(operand);
    return inner === undefined ? undefined : BigInt.asIntN(64, -inner);
  }
  return undefined;
};

/**
 * C++ spelling of a 64-bit integer. The minimum has no literal of its own.
 */
export const cppIntegerLiteral = (value: bigint): string =>
  value === LLONG_MIN ? "(-9223372036854775807LL - 1)" : `${value}LL`;

export const numeralFragment = (
  numeral: Numeral,
  context: EmitterContext
): CppFragment => {
  if (numeral.kind === "float") {
    return { text: `LuaValue(${numeral.text})`, stable: true };
  }
  const { value } = numeral;
  if (value >= 0n && value <= BigInt(SMALL_INTEGER_LIMIT)) {
    return { text: smallInteger(context, Number(value)), stable: true };
  }
  return { text: `LuaValue(${cppIntegerLiteral(value)})`, stable: true };
};

export const parseNumeral = (
  node: SyntaxNode,
  context: EmitterContext
): Numeral => {
  const numeral = readNumeral(node.literal);
  if (!numeral) {
    throw malformed(
      node,
      `has an invalid numeral '${String(node.literal)}'`,
      context
    );
  }
  return numeral;
};

export const emitNil = (
  _node: SyntaxNode,
  context: EmitterContext
): [CppFragment, EmitterContext] => [
  { text: "LuaValue()", stable: true },
  context,
];

/**
 * Booleans stay native so conditions like `while true` need no runtime test
 */
export const emitBoolean = (
  node: SyntaxNode,
  context: EmitterContext
): [CppFragment, EmitterContext] => {
  const value =
    node.literal === true || node.literal === "true"
      ? true
      : node.literal === false || node.literal === "false"
        ? false
        : undefined;
  if (value === undefined) {
    throw malformed(node, "has no boolean literal", context);
  }
  return [{ text: String(value), nativeBool: true, stable: true }, context];
};

export const emitNumber = (
  node: SyntaxNode,
  context: EmitterContext
): [CppFragment, EmitterContext] => [
  numeralFragment(parseNumeral(node, context), context),
  context,
];

export const emitString = (
  node: SyntaxNode,
  context: EmitterContext
): [CppFragment, EmitterContext] => {
  if (typeof node.literal !== "string") {
    throw malformed(node, "has no string literal", context);
  }
  return [{ text: internString(context, node.literal), stable: true }, context];
};
