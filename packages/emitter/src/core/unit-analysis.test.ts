/**
 * Tests for whole-unit analysis
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { build } from "@luacxx/frontend";
import { analyzeUnit, needsCell, referencesName } from "./unit-analysis.js";

const { num, id, member, chunk, block, local, assign, params, fn, localFunction } =
  build;

describe("analyzeUnit", () => {
  it("records every reassigned name and library member", () => {
    const tree = chunk(
      localFunction("f", params([]), assign([id("print")], [num(1)])),
      assign([member(id("math"), "floor")], [num(2)])
    );
    const { reassigned } = analyzeUnit(tree);
    expect([...reassigned].sort()).to.deep.equal(["math.floor", "print"]);
  });
});

describe("needsCell", () => {
  const capture = local(["g"], [fn(params([]), assign([id("x")], [num(1)]))]);

  it("is true when a closure captures the name and code assigns it", () => {
    expect(needsCell("x", [capture])).to.equal(true);
  });

  it("is false for a name that is only read", () => {
    const reader = local(["g"], [fn(params([]), local(["y"], [id("x")]))]);
    expect(needsCell("x", [reader])).to.equal(false);
  });

  it("is false for a name that no closure sees", () => {
    expect(needsCell("x", [assign([id("x")], [num(2)])])).to.equal(false);
  });
});

describe("referencesName", () => {
  it("looks through the whole subtree", () => {
    expect(referencesName(block(local(["a"], [id("b")])), "b")).to.equal(true);
    expect(referencesName(block(local(["a"], [id("b")])), "c")).to.equal(false);
  });
});
