/**
 * Tests for statement hoisting and evaluation order
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { build } from "@luacxx/frontend";
import { createContext } from "../types.js";
import { captureStatements, emitLine } from "./hoisting.js";
import { emitSequence, materialize } from "./sequence.js";

const { num, id, call } = build;

describe("captureStatements", () => {
  it("returns lines emitted inside the callback", () => {
    const context = createContext({ indent: 2 });
    const [lines, result] = captureStatements(context, () => {
      emitLine({ ...context, indentLevel: 1 }, "x();");
      return 7;
    });
    expect(lines).to.deep.equal(["  x();"]);
    expect(result).to.equal(7);
    expect(context.unit.hoist).to.deep.equal([[]]);
  });

  it("pops its frame when the callback throws", () => {
    const context = createContext({ indent: 4 });
    expect(() =>
      captureStatements(context, () => {
        throw new Error("boom");
      })
    ).to.throw("boom");
    expect(context.unit.hoist.length).to.equal(1);
  });
});

describe("materialize", () => {
  it("copies unstable values and leaves stable ones", () => {
    const context = createContext({ indent: 4 });
    const [lines, [pinned, kept]] = captureStatements(context, () => [
      materialize({ text: "f()" }, context),
      materialize({ text: "x", stable: true }, context),
    ]);
    expect(lines).to.deep.equal(["LuaValue lx_tmp_1 = f();"]);
    expect(pinned).to.deep.equal({ text: "lx_tmp_1", stable: true });
    expect(kept).to.deep.equal({ text: "x", stable: true });
  });

  it("copies a result buffer into a vector", () => {
    const context = createContext({ indent: 4 });
    const [lines] = captureStatements(context, () =>
      materialize({ text: "lx_buf_0", multi: true }, context)
    );
    expect(lines).to.deep.equal(["LuaValueVector lx_vals_1 = lx_buf_0;"]);
  });
});

describe("emitSequence", () => {
  it("pins earlier values before a later sibling's statements", () => {
    const context = createContext({ indent: 4 });
    const [lines, [[first, second, third]]] = captureStatements(context, () =>
      emitSequence([id("a"), num(1), call(id("f"))], context)
    );
    expect(lines).to.deep.equal([
      "LuaValue lx_tmp_2 = _G->get_item(lx_global_a);",
      "call_lua_value(_G->get_item(lx_global_f), nullptr, 0, lx_buf_0);",
      "LuaValue lx_ret_1 = lx_buf_0.empty() ? LuaValue() : lx_buf_0[0];",
    ]);
    expect(first?.text).to.equal("lx_tmp_2");
    expect(second?.text).to.equal("lx_int_1");
    expect(third?.text).to.equal("lx_ret_1");
  });

  it("leaves values in place when nothing hoists", () => {
    const context = createContext({ indent: 4 });
    const [lines, [fragments]] = captureStatements(context, () =>
      emitSequence([id("a"), num(2)], context)
    );
    expect(lines).to.deep.equal([]);
    expect(fragments.map((f) => f.text)).to.deep.equal([
      "_G->get_item(lx_global_a)",
      "lx_int_2",
    ]);
  });
});
