/**
 * Formatting helper functions
 */

import type { EmitterContext } from "./core.js";

/**
 * Get indentation string for current level
 */
export const getIndent = (context: EmitterContext): string => {
  const spaces = context.options.indent ?? 4;
  return " ".repeat(spaces * context.indentLevel);
};

/**
 * Encode a string as a C++ narrow string literal, byte by byte (UTF-8).
 *
 * Printable ASCII is kept; everything else becomes a three-digit octal escape
 * so a following digit can never extend the escape.
 */
export const toCppStringLiteral = (
  value: string
): { readonly literal: string; readonly byteLength: number; readonly hasNul: boolean } => {
  const bytes = Buffer.from(value, "utf8");
  let body = "";
  let hasNul = false;
  for (const byte of bytes) {
    if (byte === 0) {
      hasNul = true;
    }
    if (byte === 0x22) {
      body += '\\"';
    } else if (byte === 0x5c) {
      body += "\\\\";
    } else if (byte === 0x0a) {
      body += "\\n";
    } else if (byte === 0x09) {
      body += "\\t";
    } else if (byte === 0x0d) {
      body += "\\r";
    } else if (byte >= 0x20 && byte < 0x7f) {
      body += String.fromCharCode(byte);
    } else {
      body += "\\" + byte.toString(8).padStart(3, "0");
    }
  }
  return { literal: `"${body}"`, byteLength: bytes.length, hasNul };
};
