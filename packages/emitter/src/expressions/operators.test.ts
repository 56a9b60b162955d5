/**
 * Tests for operator, name and access emission
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { build, type SyntaxNode } from "@luacxx/frontend";
import type { CppFragment, EmitterContext } from "../types.js";
import { createContext, createUnitState } from "../types.js";
import { emitNode } from "../node-emitter.js";
import { captureStatements } from "../core/hoisting.js";
import { declareLocal } from "../core/local-names.js";

const { num, str, id, call, binary, unary, member, index } = build;

const emit = (
  node: SyntaxNode,
  context: EmitterContext = createContext({ indent: 4 })
): { readonly lines: string[]; readonly fragment: CppFragment } => {
  const [lines, [fragment]] = captureStatements(context, () =>
    emitNode(node, context)
  );
  return { lines, fragment };
};

describe("Operator emission", () => {
  it("emits arithmetic on dynamic values", () => {
    const { lines, fragment } = emit(binary("+", id("a"), num(1)));
    expect(lines).to.deep.equal([]);
    expect(fragment.text).to.equal("(_G->get_item(lx_global_a) + lx_int_1)");
  });

  it("maps comparisons to native bool predicates", () => {
    const { fragment } = emit(binary("<", id("a"), num(2)));
    expect(fragment).to.deep.equal({
      text: "lua_less_than(_G->get_item(lx_global_a), lx_int_2)",
      nativeBool: true,
    });
  });

  it("negates native and dynamic conditions", () => {
    expect(emit(unary("not", id("a"))).fragment.text).to.equal(
      "!is_lua_truthy(_G->get_item(lx_global_a))"
    );
    expect(
      emit(unary("not", binary("==", id("a"), num(1)))).fragment.text
    ).to.equal("!(lua_equals(_G->get_item(lx_global_a), lx_int_1))");
  });

  it("emits concatenation, floor division and length", () => {
    expect(emit(binary("..", str("a"), str("b"))).fragment.text).to.equal(
      "lua_concat(lx_str_1, lx_str_2)"
    );
    expect(emit(binary("//", num(7), num(2))).fragment.text).to.equal(
      "LuaValue(static_cast<long long>(std::floor(get_double(lx_int_7) / get_double(lx_int_2))))"
    );
    expect(emit(unary("#", id("t"))).fragment.text).to.equal(
      "lua_get_length(_G->get_item(lx_global_t))"
    );
  });

  it("wraps a native bool operand back into a value", () => {
    expect(
      emit(binary("..", binary("<", num(1), num(2)), str("x"))).fragment.text
    ).to.equal("lua_concat(LuaValue(lua_less_than(lx_int_1, lx_int_2)), lx_str_1)");
  });

  it("pins the left operand when the right one hoists statements", () => {
    const { lines, fragment } = emit(binary("+", id("a"), call(id("f"))));
    expect(lines).to.deep.equal([
      "LuaValue lx_tmp_2 = _G->get_item(lx_global_a);",
      "call_lua_value(_G->get_item(lx_global_f), nullptr, 0, lx_buf_0);",
      "LuaValue lx_ret_1 = lx_buf_0.empty() ? LuaValue() : lx_buf_0[0];",
    ]);
    expect(fragment.text).to.equal("(lx_tmp_2 + lx_ret_1)");
  });

  it("evaluates the right side of 'and' only when the left is truthy", () => {
    const { lines, fragment } = emit(binary("and", id("a"), call(id("f"))));
    expect(lines).to.deep.equal([
      "LuaValue lx_and_1 = _G->get_item(lx_global_a);",
      "if (is_lua_truthy(lx_and_1)) {",
      "    call_lua_value(_G->get_item(lx_global_f), nullptr, 0, lx_buf_0);",
      "    LuaValue lx_ret_2 = lx_buf_0.empty() ? LuaValue() : lx_buf_0[0];",
      "    lx_and_1 = lx_ret_2;",
      "}",
    ]);
    expect(fragment).to.deep.equal({ text: "lx_and_1", stable: true });
  });

  it("tests for falsy before evaluating the right side of 'or'", () => {
    const { lines } = emit(binary("or", id("a"), num(1)));
    expect(lines).to.deep.equal([
      "LuaValue lx_or_1 = _G->get_item(lx_global_a);",
      "if (!is_lua_truthy(lx_or_1)) {",
      "    lx_or_1 = lx_int_1;",
      "}",
    ]);
  });

  it("leaves a placeholder for an unknown operator", () => {
    const context = createContext({ indent: 4 });
    const { lines, fragment } = emit(binary("!=", num(1), num(2)), context);
    expect(lines).to.deep.equal(["/* unsupported: operator != */"]);
    expect(fragment.text).to.equal("LuaValue()");
    expect(context.unit.diagnostics.map((d) => d.message)).to.deep.equal([
      "Unsupported operator '!=' in 'binary'",
    ]);
  });
});

describe("Name and access emission", () => {
  it("resolves the global table, libraries and builtins", () => {
    expect(emit(id("_G")).fragment.text).to.equal("LuaValue(_G)");
    expect(emit(id("pairs")).fragment.text).to.equal("lx_builtin_pairs()");
    expect(emit(member(id("math"), "floor")).fragment.text).to.equal(
      "lx_lib_math_floor()"
    );
  });

  it("reads reassigned builtins from the global table", () => {
    const unit = createUnitState(new Set(["print", "math.floor"]));
    const context = createContext({ indent: 4 }, unit);
    expect(emit(id("print"), context).fragment.text).to.equal(
      "_G->get_item(lx_global_print)"
    );
    expect(emit(member(id("math"), "floor"), context).fragment.text).to.equal(
      'lua_get_member(lx_lib_math(), "floor")'
    );
  });

  it("reads locals directly", () => {
    const context = declareLocal(createContext({ indent: 4 }), "x", {
      kind: "plain",
      cppName: "x",
    });
    expect(emit(id("x"), context).fragment).to.deep.equal({
      text: "x",
      stable: true,
    });
  });

  it("reads boxed locals through their cell", () => {
    const context = declareLocal(createContext({ indent: 4 }), "x", {
      kind: "boxed",
      cppName: "x",
      cellName: "lx_cell_4",
    });
    expect(emit(id("x"), context).fragment).to.deep.equal({
      text: "(*lx_cell_4)",
      stable: false,
    });
  });

  it("emits member and index lookups", () => {
    expect(emit(member(id("t"), "x")).fragment.text).to.equal(
      'lua_get_member(_G->get_item(lx_global_t), "x")'
    );
    expect(emit(index(id("t"), num(1))).fragment.text).to.equal(
      "lua_get_member(_G->get_item(lx_global_t), lx_int_1)"
    );
  });
});
