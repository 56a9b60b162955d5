/**
 * Tests for Result type
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { ok, error, map, flatMap, unwrapOr, collect } from "./result.js";

describe("Result", () => {
  it("should map an ok value and pass errors through", () => {
    expect(map(ok<number, string>(5), (n) => n * 2)).to.deep.equal({
      ok: true,
      value: 10,
    });
    expect(map(error<number, string>("bad"), (n) => n * 2)).to.deep.equal({
      ok: false,
      error: "bad",
    });
  });

  it("should chain with flatMap", () => {
    const half = (n: number) =>
      n % 2 === 0 ? ok<number, string>(n / 2) : error<number, string>("odd");

    expect(flatMap(ok<number, string>(8), half)).to.deep.equal({
      ok: true,
      value: 4,
    });
    expect(flatMap(ok<number, string>(3), half)).to.deep.equal({
      ok: false,
      error: "odd",
    });
  });

  it("should fall back with unwrapOr", () => {
    expect(unwrapOr(error<number, string>("x"), 7)).to.equal(7);
    expect(unwrapOr(ok<number, string>(1), 7)).to.equal(1);
  });

  describe("collect", () => {
    it("should gather all values when every result succeeds", () => {
      const result = collect([ok<number, string[]>(1), ok<number, string[]>(2)]);
      expect(result).to.deep.equal({ ok: true, value: [1, 2] });
    });

    it("should gather every error in order", () => {
      const result = collect([
        error<number, string[]>(["a"]),
        ok<number, string[]>(2),
        error<number, string[]>(["b", "c"]),
      ]);
      expect(result).to.deep.equal({ ok: false, error: ["a", "b", "c"] });
    });
  });
});
