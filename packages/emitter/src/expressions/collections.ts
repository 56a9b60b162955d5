/**
 * Table constructor emitter
 */

import { isMultiValueKind, type SyntaxNode } from "@luacxx/frontend";
import type { CppFragment, EmitterContext } from "../types.js";
import { nextId } from "../types.js";
import { malformed, requireChild } from "../core/errors.js";
import { asValue } from "../core/boolean-context.js";
import { internString } from "../core/caches.js";
import { emitLine } from "../core/hoisting.js";
import { emitPair, emitSequence } from "../core/sequence.js";
import { emitNode } from "../node-emitter.js";

/** Most name-keyed pairs the runtime's direct constructor accepts */
const DIRECT_CREATE_LIMIT = 4;

type TableField =
  | { readonly kind: "named"; readonly name: string; readonly value: SyntaxNode }
  | { readonly kind: "keyed"; readonly key: SyntaxNode; readonly value: SyntaxNode }
  | { readonly kind: "positional"; readonly value: SyntaxNode };

const classifyField = (
  table: SyntaxNode,
  field: SyntaxNode,
  context: EmitterContext
): TableField => {
  if (field.kind !== "tableField") {
    throw malformed(table, `has a '${field.kind}' child, expected 'tableField'`, context);
  }
  if (field.name !== undefined) {
    return {
      kind: "named",
      name: field.name,
      value: requireChild(field, 0, "value", context),
    };
  }
  if (field.children.length >= 2) {
    return {
      kind: "keyed",
      key: requireChild(field, 0, "key", context),
      value: requireChild(field, 1, "value", context),
    };
  }
  return { kind: "positional", value: requireChild(field, 0, "value", context) };
};

/**
 * `{a = 1, b = x}` with a few named fields builds the object in one call.
 */
const emitDirectTable = (
  fields: readonly { readonly name: string; readonly value: SyntaxNode }[],
  context: EmitterContext
): [CppFragment, EmitterContext] => {
  const [values, next] = emitSequence(
    fields.map((field) => field.value),
    context
  );
  const pairs = fields.map((field, i) => {
    const value = values[i];
    return `{${internString(next, field.name)}, ${value ? asValue(value) : "LuaValue()"}}`;
  });
  return [{ text: `LuaValue(LuaObject::create(${pairs.join(", ")}))` }, next];
};

export const emitTable = (
  node: SyntaxNode,
  context: EmitterContext
): [CppFragment, EmitterContext] => {
  const fields = node.children.map((child) =>
    classifyField(node, child, context)
  );

  const named = fields.flatMap((field) =>
    field.kind === "named" ? [field] : []
  );
  if (named.length === fields.length && fields.length <= DIRECT_CREATE_LIMIT) {
    return emitDirectTable(named, context);
  }

  const table = nextId(context, "table");
  emitLine(context, `auto ${table} = LuaObject::create();`);

  let current = context;
  // Static position until a field expands to a runtime-sized list
  let position = 1;
  let cursor: string | undefined;
  const nextPosition = (): string => (cursor ? `${cursor}++` : `${position++}LL`);

  fields.forEach((field, index) => {
    switch (field.kind) {
      case "named": {
        const [value, next] = emitNode(field.value, current);
        emitLine(next, `${table}->set("${field.name}", ${asValue(value)});`);
        current = next;
        return;
      }
      case "keyed": {
        const [[key, value], next] = emitPair(field.key, field.value, current);
        emitLine(next, `${table}->set_item(${asValue(key)}, ${asValue(value)});`);
        current = next;
        return;
      }
      case "positional": {
        const isLast = index === fields.length - 1;
        const expands =
          field.value.kind === "varargs" ||
          (isLast && isMultiValueKind(field.value.kind));
        if (!expands) {
          const [value, next] = emitNode(field.value, current);
          emitLine(next, `${table}->set_item(${nextPosition()}, ${asValue(value)});`);
          current = next;
          return;
        }

        const [values, next] = emitNode(field.value, current, { multiret: true });
        if (!cursor) {
          cursor = nextId(next, "pos");
          emitLine(next, `long long ${cursor} = ${position}LL;`);
        }
        const item = nextId(next, "item");
        emitLine(
          next,
          `for (const auto& ${item} : ${values.text}) { ${table}->set_item(${cursor}++, ${item}); }`
        );
        current = next;
        return;
      }
    }
  });

  return [{ text: `LuaValue(${table})`, stable: true }, current];
};
