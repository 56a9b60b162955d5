/**
 * Left-to-right evaluation of sibling expressions
 *
 * A fragment's text is only evaluated where it is finally spliced. When a
 * later sibling hoists statements, every earlier fragment that could observe
 * them is first copied into a temporary so it keeps its place in the order.
 */

import { isMultiValueKind, type SyntaxNode } from "@luacxx/frontend";
import type {
  CppFragment,
  EmitNodeOptions,
  EmitterContext,
} from "../types.js";
import { nextId } from "../types.js";
import { emitNode } from "../node-emitter.js";
import { asValue } from "./boolean-context.js";
import { captureStatements, emitLine, emitLines } from "./hoisting.js";

/**
 * Pin a fragment's current value in a temporary
 */
export const materialize = (
  fragment: CppFragment,
  context: EmitterContext
): CppFragment => {
  if (fragment.stable) {
    return fragment;
  }
  if (fragment.multi) {
    const copy = nextId(context, "vals");
    emitLine(context, `LuaValueVector ${copy} = ${fragment.text};`);
    return { text: copy, multi: true, stable: true };
  }
  const temp = nextId(context, "tmp");
  emitLine(context, `LuaValue ${temp} = ${asValue(fragment)};`);
  return { text: temp, stable: true };
};

/**
 * Emit `nodes` in order after the already-evaluated `prefix` fragments.
 * Returns prefix and new fragments together.
 */
export const emitSequence = (
  nodes: readonly SyntaxNode[],
  context: EmitterContext,
  optionsFor: (index: number) => EmitNodeOptions = () => ({}),
  prefix: readonly CppFragment[] = []
): [CppFragment[], EmitterContext] => {
  const fragments: CppFragment[] = [...prefix];
  let current = context;

  nodes.forEach((node, index) => {
    const [lines, [fragment, next]] = captureStatements(current, () =>
      emitNode(node, current, optionsFor(index))
    );
    if (lines.length > 0) {
      fragments.forEach((earlier, i) => {
        fragments[i] = materialize(earlier, next);
      });
      emitLines(next, lines);
    }
    fragments.push(fragment);
    current = next;
  });

  return [fragments, current];
};

/**
 * Two operands in order, e.g. binary operands or an index base and key
 */
export const emitPair = (
  first: SyntaxNode,
  second: SyntaxNode,
  context: EmitterContext
): [[CppFragment, CppFragment], EmitterContext] => {
  const [left, afterLeft] = emitNode(first, context);
  const [lines, [right, afterRight]] = captureStatements(afterLeft, () =>
    emitNode(second, afterLeft)
  );
  if (lines.length === 0) {
    return [[left, right], afterRight];
  }
  const pinned = materialize(left, afterRight);
  emitLines(afterRight, lines);
  return [[pinned, right], afterRight];
};

/**
 * True when the last expression of a list supplies all of its values
 */
export const endsInMultiValue = (nodes: readonly SyntaxNode[]): boolean => {
  const last = nodes[nodes.length - 1];
  return last !== undefined && isMultiValueKind(last.kind);
};

/**
 * Evaluate an argument or return list; a multi-valued last expression is
 * left in the result buffer.
 */
export const emitExpressionList = (
  nodes: readonly SyntaxNode[],
  context: EmitterContext,
  prefix: readonly CppFragment[] = []
): [CppFragment[], EmitterContext] =>
  emitSequence(
    nodes,
    context,
    (index) => ({
      multiret: index === nodes.length - 1 && endsInMultiValue(nodes),
    }),
    prefix
  );
