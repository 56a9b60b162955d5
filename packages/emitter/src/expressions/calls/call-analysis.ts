/**
 * Call shape detection helpers
 */

import type { SyntaxNode } from "@luacxx/frontend";
import type { EmitterContext } from "../../types.js";
import { libraryMember } from "../access.js";
import { isPristineGlobal } from "../identifiers.js";

/**
 * Runtime functions with a direct C++ translation
 */
export type SpecializedBuiltin =
  | "print"
  | "require"
  | "setmetatable"
  | "type"
  | "select"
  | "table.insert"
  | "string.sub"
  | "string.len";

const SPECIALIZED: ReadonlySet<string> = new Set<SpecializedBuiltin>([
  "print",
  "require",
  "setmetatable",
  "type",
  "select",
  "table.insert",
  "string.sub",
  "string.len",
]);

const isSpecialized = (name: string): name is SpecializedBuiltin =>
  SPECIALIZED.has(name);

/**
 * The builtin a callee names, if the unit leaves it untouched
 */
export const specializedBuiltin = (
  callee: SyntaxNode,
  context: EmitterContext
): SpecializedBuiltin | undefined => {
  if (callee.kind === "identifier" && callee.name !== undefined) {
    const name = callee.name;
    return isSpecialized(name) && isPristineGlobal(name, context)
      ? name
      : undefined;
  }
  const library = libraryMember(callee, context);
  if (library) {
    const name = `${library.namespace}.${library.member}`;
    return isSpecialized(name) ? name : undefined;
  }
  return undefined;
};
