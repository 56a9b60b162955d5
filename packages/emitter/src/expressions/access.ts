/**
 * Member and index access emitters
 */

import type { SyntaxNode } from "@luacxx/frontend";
import type { CppFragment, EmitterContext } from "../types.js";
import { requireChild, requireName } from "../core/errors.js";
import { asValue } from "../core/boolean-context.js";
import { libraryAccessor } from "../core/caches.js";
import { LIBRARY_NAMESPACES } from "../core/library-names.js";
import { emitPair } from "../core/sequence.js";
import { emitNode } from "../node-emitter.js";
import { isPristineGlobal } from "./identifiers.js";

export type LibraryMember = {
  readonly namespace: string;
  readonly member: string;
};

/**
 * `namespace.member` on a library namespace that nothing in the unit shadows
 * or reassigns
 */
export const libraryMember = (
  node: SyntaxNode,
  context: EmitterContext
): LibraryMember | undefined => {
  const base = node.children[0];
  if (
    node.kind !== "member" ||
    node.name === undefined ||
    base?.kind !== "identifier" ||
    base.name === undefined
  ) {
    return undefined;
  }
  const namespace = base.name;
  const member = node.name;
  return LIBRARY_NAMESPACES.has(namespace) &&
    isPristineGlobal(namespace, context) &&
    !context.unit.reassigned.has(`${namespace}.${member}`)
    ? { namespace, member }
    : undefined;
};

export const emitMember = (
  node: SyntaxNode,
  context: EmitterContext
): [CppFragment, EmitterContext] => {
  const name = requireName(node, context);
  const base = requireChild(node, 0, "base", context);

  const library = libraryMember(node, context);
  if (library) {
    return [
      {
        text: libraryAccessor(context, library.namespace, library.member),
        stable: true,
      },
      context,
    ];
  }

  const [baseFragment, next] = emitNode(base, context);
  return [
    { text: `lua_get_member(${asValue(baseFragment)}, "${name}")` },
    next,
  ];
};

export const emitIndex = (
  node: SyntaxNode,
  context: EmitterContext
): [CppFragment, EmitterContext] => {
  const base = requireChild(node, 0, "base", context);
  const key = requireChild(node, 1, "key", context);

  const [[baseFragment, keyFragment], next] = emitPair(base, key, context);
  return [
    {
      text: `lua_get_member(${asValue(baseFragment)}, ${asValue(keyFragment)})`,
    },
    next,
  ];
};
