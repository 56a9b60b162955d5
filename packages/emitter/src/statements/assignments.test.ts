/**
 * Tests for local declarations and assignments
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { build, type SyntaxNode } from "@luacxx/frontend";
import type { EmitterContext } from "../types.js";
import { createContext } from "../types.js";
import { captureStatements } from "../core/hoisting.js";
import { emitStatements } from "./blocks.js";

const { num, id, call, member, index, local, assign, block } = build;

const emitLines = (
  statements: readonly SyntaxNode[],
  context: EmitterContext = createContext({ indent: 4 })
): string[] => {
  const [lines] = captureStatements(context, () =>
    emitStatements(statements, context)
  );
  return lines;
};

describe("Local declarations", () => {
  it("declares an uninitialized local as nil", () => {
    expect(emitLines([local(["x"])])).to.deep.equal(["LuaValue x = LuaValue();"]);
  });

  it("spreads a trailing call over the remaining names", () => {
    expect(emitLines([local(["a", "b"], [call(id("f"))])])).to.deep.equal([
      "call_lua_value(_G->get_item(lx_global_f), nullptr, 0, lx_buf_0);",
      "LuaValue a = (lx_buf_0.size() > 0 ? lx_buf_0[0] : LuaValue());",
      "LuaValue b = (lx_buf_0.size() > 1 ? lx_buf_0[1] : LuaValue());",
    ]);
  });

  it("evaluates and drops extra values", () => {
    expect(
      emitLines([local(["x"], [num(1), member(id("t"), "y")])])
    ).to.deep.equal([
      '(void)(lua_get_member(_G->get_item(lx_global_t), "y"));',
      "LuaValue x = lx_int_1;",
    ]);
  });

  it("runs an extra call for its side effects", () => {
    expect(emitLines([local(["x"], [num(1), call(id("g"))])])).to.deep.equal([
      "call_lua_value(_G->get_item(lx_global_g), nullptr, 0, lx_buf_0);",
      "LuaValue lx_ret_1 = lx_buf_0.empty() ? LuaValue() : lx_buf_0[0];",
      "LuaValue x = lx_int_1;",
    ]);
  });

  it("renames a shadowing local and reads the outer one in its value", () => {
    expect(
      emitLines([local(["x"], [num(1)]), block(local(["x"], [id("x")]))])
    ).to.deep.equal([
      "LuaValue x = lx_int_1;",
      "{",
      "    LuaValue x_1 = x;",
      "}",
    ]);
  });

  it("prefixes names that clash with C++", () => {
    expect(emitLines([local(["class"], [num(2)])])).to.deep.equal([
      "LuaValue lua_class = lx_int_2;",
    ]);
  });
});

describe("Assignments", () => {
  it("stores globals in the global table", () => {
    expect(emitLines([assign([id("y")], [num(2)])])).to.deep.equal([
      "_G->set_item(lx_global_y, lx_int_2);",
    ]);
  });

  it("stores members and indexed fields on the object", () => {
    expect(
      emitLines([
        assign([member(id("t"), "x")], [num(1)]),
        assign([index(id("t"), id("k"))], [id("v")]),
      ])
    ).to.deep.equal([
      'get_object(_G->get_item(lx_global_t))->set("x", lx_int_1);',
      "get_object(_G->get_item(lx_global_t))->set_item(_G->get_item(lx_global_k), _G->get_item(lx_global_v));",
    ]);
  });

  it("swaps two locals", () => {
    expect(
      emitLines([
        local(["a", "b"], [num(1), num(2)]),
        assign([id("a"), id("b")], [id("b"), id("a")]),
      ])
    ).to.deep.equal([
      "LuaValue a = lx_int_1;",
      "LuaValue b = lx_int_2;",
      "LuaValue lx_tmp_1 = b;",
      "LuaValue lx_tmp_2 = a;",
      "a = lx_tmp_1;",
      "b = lx_tmp_2;",
    ]);
  });

  it("assigns nil to targets without a value", () => {
    expect(
      emitLines([
        local(["a", "b"]),
        assign([id("a"), id("b")], [num(3)]),
      ])
    ).to.deep.equal([
      "LuaValue a = LuaValue();",
      "LuaValue b = LuaValue();",
      "LuaValue lx_tmp_1 = lx_int_3;",
      "LuaValue lx_tmp_2 = LuaValue();",
      "a = lx_tmp_1;",
      "b = lx_tmp_2;",
    ]);
  });
});
