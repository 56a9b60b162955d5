/**
 * Name resolution
 *
 * A name is, in order: a local in scope, the global table
 * itself, an unshadowed library namespace or builtin (memoized accessors),
 * or a lookup in the global table.
 */

import type { SyntaxNode } from "@luacxx/frontend";
import type { CppFragment, EmitterContext } from "../types.js";
import { requireName } from "../core/errors.js";
import { bindingRef } from "../core/local-names.js";
import {
  builtinAccessor,
  globalKey,
  libraryAccessor,
} from "../core/caches.js";
import {
  BUILTIN_GLOBALS,
  GLOBAL_TABLE_NAME,
  LIBRARY_NAMESPACES,
} from "../core/library-names.js";

/**
 * True when `name` reaches the runtime's own value: not a local, not assigned
 * anywhere in the unit.
 */
export const isPristineGlobal = (
  name: string,
  context: EmitterContext
): boolean => !context.scope.has(name) && !context.unit.reassigned.has(name);

export const resolveName = (
  name: string,
  context: EmitterContext
): CppFragment => {
  const binding = context.scope.get(name);
  if (binding) {
    return { text: bindingRef(binding), stable: binding.kind === "plain" };
  }

  if (name === GLOBAL_TABLE_NAME) {
    return { text: "LuaValue(_G)", stable: true };
  }

  if (!context.unit.reassigned.has(name)) {
    if (LIBRARY_NAMESPACES.has(name)) {
      return { text: libraryAccessor(context, name), stable: true };
    }
    if (BUILTIN_GLOBALS.has(name)) {
      return { text: builtinAccessor(context, name), stable: true };
    }
  }

  return { text: `_G->get_item(${globalKey(context, name)})` };
};

export const emitIdentifier = (
  node: SyntaxNode,
  context: EmitterContext
): [CppFragment, EmitterContext] => [
  resolveName(requireName(node, context), context),
  context,
];
