/**
 * Adjusting expression lists to a number of targets
 *
 * Extra expressions are evaluated and dropped. Missing values are nil,
 * unless the list ends in a call or `...`, which then supplies values for
 * every remaining target from its buffer.
 */

import type { SyntaxNode } from "@luacxx/frontend";
import type { CppFragment, EmitterContext } from "../types.js";
import { emitLine } from "../core/hoisting.js";
import {
  emitSequence,
  endsInMultiValue,
  materialize,
} from "../core/sequence.js";

const NIL: CppFragment = { text: "LuaValue()", stable: true };

/**
 * Read value `index` of a result buffer, nil past its end
 */
export const bufferValue = (buffer: string, index: number): string =>
  `(${buffer}.size() > ${index} ? ${buffer}[${index}] : LuaValue())`;

/**
 * Evaluate `expressions` after `prefix` and return the prefix followed by
 * exactly `count` values.
 */
export const adjustValues = (
  expressions: readonly SyntaxNode[],
  count: number,
  context: EmitterContext,
  prefix: readonly CppFragment[] = []
): [CppFragment[], EmitterContext] => {
  const last = expressions.length - 1;
  const expands = last < count && endsInMultiValue(expressions);

  const [fragments, next] = emitSequence(
    expressions,
    context,
    (index) => ({ multiret: expands && index === last }),
    prefix
  );

  let evaluatedPrefix = fragments.slice(0, prefix.length);
  let values = fragments.slice(prefix.length);

  const dropped = values.slice(count);
  if (dropped.some((fragment) => !fragment.stable)) {
    // Dropped expressions run after the kept ones have been read
    evaluatedPrefix = evaluatedPrefix.map((fragment) =>
      materialize(fragment, next)
    );
    values = values.map((fragment, index) =>
      index < count ? materialize(fragment, next) : fragment
    );
    values.slice(count).forEach((fragment) => {
      if (!fragment.stable) {
        emitLine(next, `(void)(${fragment.text});`);
      }
    });
  }

  const adjusted: CppFragment[] = [];
  for (let index = 0; index < count; index++) {
    const tail = values[last];
    if (expands && index >= last && tail) {
      adjusted.push({ text: bufferValue(tail.text, index - last) });
    } else {
      adjusted.push(values[index] ?? NIL);
    }
  }

  return [[...evaluatedPrefix, ...adjusted], next];
};
