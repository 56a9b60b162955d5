/**
 * Tests for whole-unit emission
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  build,
  type Diagnostic,
  type Result,
  type SyntaxNode,
} from "@luacxx/frontend";
import type { EmitOutput } from "../../types.js";
import { emitEntryUnit, emitModuleUnit, emitUnit } from "./orchestrator.js";
import { emitModuleHeader } from "./header.js";

const {
  node,
  num,
  str,
  id,
  call,
  binary,
  unary,
  member,
  params,
  chunk,
  local,
  assign,
  exprStmt,
  ret,
  functionDecl,
} = build;

const STD_INCLUDES = [
  "#include <cmath>",
  "#include <iostream>",
  "#include <memory>",
  "#include <stdexcept>",
  "#include <string>",
  "#include <variant>",
  "#include <vector>",
];

const LAMBDA_OPEN =
  "std::make_shared<LuaFunctionWrapper>([=](const LuaValue* args, size_t n_args, LuaValueVector& out_result) mutable {";

const unwrap = (result: Result<EmitOutput, Diagnostic[]>): EmitOutput => {
  if (!result.ok) {
    throw new Error(result.error.map((d) => d.message).join("\n"));
  }
  return result.value;
};

const failure = (result: Result<EmitOutput, Diagnostic[]>): Diagnostic[] => {
  if (result.ok) {
    throw new Error("expected the unit to fail");
  }
  return result.error;
};

const sourceLines = (tree: SyntaxNode): string[] =>
  unwrap(emitEntryUnit(tree)).source.split("\n");

describe("Unit emission", () => {
  describe("entry units", () => {
    it("emits a complete program", () => {
      const output = unwrap(
        emitEntryUnit(
          chunk(
            local(["x"], [num(1)]),
            exprStmt(call(id("print"), id("x"), str("hi")))
          )
        )
      );

      expect(output.source).to.equal(
        [
          "// Generated from: main.lua",
          "// WARNING: Do not modify this file manually",
          "",
          ...STD_INCLUDES,
          '#include "lua_object.hpp"',
          '#include "init.hpp"',
          "",
          'static const LuaValue lx_str_1 = LuaValue(std::string("hi"));',
          "static const LuaValue lx_int_1 = LuaValue(1LL);",
          "",
          "int main(int argc, char* argv[]) {",
          "    init_G(argc, argv);",
          "    LuaValueVector lx_buf_0;",
          "    LuaValue x = lx_int_1;",
          "    print_value(x);",
          '    std::cout << "\\t";',
          "    print_value(lx_str_1);",
          "    std::cout << std::endl;",
          "    return 0;",
          "}",
          "",
        ].join("\n")
      );
      expect(output.header).to.equal(undefined);
      expect(output.diagnostics).to.deep.equal([]);
    });

    it("declares the cache preamble grouped and sorted", () => {
      const lines = sourceLines(
        chunk(
          local(["s"], [str("x")]),
          exprStmt(
            call(id("f"), id("g"), num(3), member(id("math"), "pi"))
          )
        )
      );
      const start = lines.indexOf(
        'static const LuaValue lx_str_1 = LuaValue(std::string("x"));'
      );
      expect(lines.slice(start, start + 7)).to.deep.equal([
        'static const LuaValue lx_str_1 = LuaValue(std::string("x"));',
        'static const LuaValue lx_global_f = LuaValue(std::string("f"));',
        'static const LuaValue lx_global_g = LuaValue(std::string("g"));',
        "static const LuaValue lx_int_3 = LuaValue(3LL);",
        'static const LuaValue& lx_lib_math() { static const LuaValue value = _G->get("math"); return value; }',
        'static const LuaValue& lx_lib_math_pi() { static const LuaValue value = lua_get_member(lx_lib_math(), "pi"); return value; }',
        "",
      ]);
    });

    it("stores top-level globals in the global table", () => {
      const lines = sourceLines(
        chunk(
          assign([id("count")], [num(0)]),
          exprStmt(call(id("print"), id("count")))
        )
      );
      expect(lines).to.include("    _G->set_item(lx_global_count, lx_int_0);");
      expect(lines).to.include("    print_value(_G->get_item(lx_global_count));");
      expect(lines.filter((line) => line.startsWith("static LuaValue"))).to.deep.equal([]);
    });

    it("does not clash with C library names at file scope", () => {
      const lines = sourceLines(
        chunk(
          assign([id("log")], [num(1)]),
          local(["y"], [binary("+", id("log"), num(2))]),
          local(["errno"], [num(3)])
        )
      );
      expect(lines).to.include("    _G->set_item(lx_global_log, lx_int_1);");
      expect(lines).to.include(
        "    LuaValue y = (_G->get_item(lx_global_log) + lx_int_2);"
      );
      expect(lines).to.include("    LuaValue lua_errno = lx_int_3;");
      expect(lines).not.to.include("static LuaValue log;");
    });

    it("does not add a second return after a top-level return", () => {
      const lines = sourceLines(chunk(ret()));
      expect(lines.slice(-3)).to.deep.equal(["    return 0;", "}", ""]);
      expect(lines.filter((line) => line.includes("return 0;"))).to.have.length(1);
    });

    it("includes the header of every required module", () => {
      const output = unwrap(
        emitEntryUnit(
          chunk(
            local(["b"], [call(id("require"), str("util.b"))]),
            local(["a"], [call(id("require"), str("a"))])
          )
        )
      );
      const lines = output.source.split("\n");
      const init = lines.indexOf('#include "init.hpp"');
      expect(lines.slice(init + 1, init + 3)).to.deep.equal([
        '#include "a.hpp"',
        '#include "util_b.hpp"',
      ]);
      expect(output.requiredModules).to.deep.equal(["a", "util_b"]);
    });

    it("produces identical output for identical input", () => {
      const tree = chunk(
        local(["t"], [call(id("f"), binary("..", str("a"), id("b")))])
      );
      expect(unwrap(emitEntryUnit(tree)).source).to.equal(
        unwrap(emitEntryUnit(tree)).source
      );
    });

    it("writes the timestamp only when asked", () => {
      const output = unwrap(
        emitEntryUnit(chunk(), {
          includeTimestamp: true,
          timestamp: "2024-01-01T00:00:00.000Z",
          sourcePath: "scripts/app.lua",
        })
      );
      expect(output.source.split("\n").slice(0, 3)).to.deep.equal([
        "// Generated from: scripts/app.lua",
        "// Generated at: 2024-01-01T00:00:00.000Z",
        "// WARNING: Do not modify this file manually",
      ]);
    });
  });

  describe("module units", () => {
    const tree = chunk(
      assign([id("count")], [num(0)]),
      functionDecl(
        id("bump"),
        params([]),
        assign([id("count")], [binary("+", id("count"), num(1))])
      ),
      ret(id("count"))
    );

    it("wraps the body in a load function that runs once", () => {
      const output = unwrap(emitModuleUnit(tree, "util.greet"));
      expect(output.source).to.equal(
        [
          "// Generated from: util_greet.lua",
          "// WARNING: Do not modify this file manually",
          "",
          '#include "util_greet.hpp"',
          ...STD_INCLUDES,
          '#include "lua_object.hpp"',
          "",
          "namespace util_greet {",
          "",
          'static const LuaValue lx_global_bump = LuaValue(std::string("bump"));',
          'static const LuaValue lx_global_count = LuaValue(std::string("count"));',
          "static const LuaValue lx_int_0 = LuaValue(0LL);",
          "static const LuaValue lx_int_1 = LuaValue(1LL);",
          "",
          "LuaValueVector load() {",
          "    static bool lx_loaded = false;",
          "    static LuaValueVector out_result;",
          "    if (lx_loaded) {",
          "        return out_result;",
          "    }",
          "    lx_loaded = true;",
          "    LuaValueVector lx_buf_0;",
          "    _G->set_item(lx_global_count, lx_int_0);",
          `    LuaValue lx_fn_1 = ${LAMBDA_OPEN}`,
          "        LuaValueVector lx_buf_2;",
          "        _G->set_item(lx_global_count, (_G->get_item(lx_global_count) + lx_int_1));",
          "        out_result.clear();",
          "    });",
          "    _G->set_item(lx_global_bump, lx_fn_1);",
          "    out_result.clear();",
          "    out_result.push_back(_G->get_item(lx_global_count));",
          "    return out_result;",
          "}",
          "",
          "} // namespace util_greet",
          "",
        ].join("\n")
      );
    });

    it("declares only the load function in its header", () => {
      const output = unwrap(emitModuleUnit(tree, "util.greet"));
      expect(output.header).to.equal(
        [
          "// Generated from: util_greet.lua",
          "// WARNING: Do not modify this file manually",
          "",
          "#pragma once",
          '#include "lua_object.hpp"',
          "",
          "namespace util_greet {",
          "",
          "LuaValueVector load();",
          "",
          "} // namespace util_greet",
          "",
        ].join("\n")
      );
    });

    it("shares globals with the units that require it", () => {
      const moduleLines = unwrap(
        emitModuleUnit(
          chunk(functionDecl(id("bump"), params([]), ret(num(1)))),
          "m"
        )
      ).source.split("\n");
      const entryLines = sourceLines(
        chunk(
          exprStmt(call(id("require"), str("m"))),
          exprStmt(call(id("bump")))
        )
      );

      expect(moduleLines).to.include("    _G->set_item(lx_global_bump, lx_fn_1);");
      expect(entryLines).to.include(
        "    call_lua_value(_G->get_item(lx_global_bump), nullptr, 0, lx_buf_0);"
      );
      expect(moduleLines).to.include(
        'static const LuaValue lx_global_bump = LuaValue(std::string("bump"));'
      );
      expect(entryLines).to.include(
        'static const LuaValue lx_global_bump = LuaValue(std::string("bump"));'
      );
    });

    it("returns true from a module without a return", () => {
      const lines = unwrap(emitModuleUnit(chunk(), "m")).source.split("\n");
      expect(lines.slice(-7)).to.deep.equal([
        "    LuaValueVector lx_buf_0;",
        "    out_result.assign(1, LuaValue(true));",
        "    return out_result;",
        "}",
        "",
        "} // namespace m",
        "",
      ]);
    });

    it("renders a header with a timestamp", () => {
      expect(
        emitModuleHeader("m", {
          includeTimestamp: true,
          timestamp: "2024-01-01T00:00:00.000Z",
        })
      ).to.equal(
        [
          "// Generated from: m.lua",
          "// Generated at: 2024-01-01T00:00:00.000Z",
          "// WARNING: Do not modify this file manually",
          "",
          "#pragma once",
          '#include "lua_object.hpp"',
          "",
          "namespace m {",
          "",
          "LuaValueVector load();",
          "",
          "} // namespace m",
          "",
        ].join("\n")
      );
    });
  });

  describe("diagnostics", () => {
    it("emits a placeholder for an unknown construct and continues", () => {
      const output = unwrap(
        emitEntryUnit(chunk(node("mystery"), local(["x"], [num(2)])))
      );
      const lines = output.source.split("\n");
      expect(lines).to.include("    /* unsupported: mystery */");
      expect(lines).to.include("    LuaValue x = lx_int_2;");
      expect(output.diagnostics.map((d) => [d.code, d.severity])).to.deep.equal([
        ["LCX2001", "warning"],
      ]);
    });

    it("fails the unit on a malformed tree, keeping earlier warnings", () => {
      const errors = failure(
        emitEntryUnit(chunk(node("mystery"), node("expressionStatement")))
      );
      expect(errors.map((d) => d.code)).to.deep.equal(["LCX2001", "LCX6001"]);
      expect(errors[1]?.message).to.equal(
        "Malformed tree: 'expressionStatement' is missing its expression"
      );
    });

    it("rejects a root that is not a chunk", () => {
      const errors = failure(emitUnit(num(1)));
      expect(errors[0]?.message).to.equal(
        "Malformed tree: 'number' cannot be the root of a unit"
      );
    });

    it("stops at the recursion limit", () => {
      let nested: SyntaxNode = id("x");
      for (let i = 0; i < 7; i++) {
        nested = unary("not", nested);
      }
      const errors = failure(
        emitEntryUnit(chunk(exprStmt(call(id("f"), nested))), { maxDepth: 5 })
      );
      expect(errors.map((d) => d.code)).to.deep.equal(["LCX6002"]);
      expect(errors[0]?.message).to.equal(
        "Recursion depth limit of 5 exceeded at 'unary'"
      );
    });

    it("reports the source line of a malformed node", () => {
      const errors = failure(
        emitEntryUnit(
          chunk({ kind: "localDeclaration", line: 3, children: [] }),
          { sourcePath: "app.lua" }
        )
      );
      expect(errors[0]?.location).to.deep.equal({ file: "app.lua", line: 3 });
    });
  });
});
