/**
 * Tests for syntax kind guards
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  isSyntaxKind,
  isBinaryOperator,
  isUnaryOperator,
  isMultiValueKind,
} from "./types.js";

describe("Syntax kinds", () => {
  it("should recognise known kinds only", () => {
    expect(isSyntaxKind("numericFor")).to.equal(true);
    expect(isSyntaxKind("attribute")).to.equal(false);
  });

  it("should recognise operators", () => {
    expect(isBinaryOperator("//")).to.equal(true);
    expect(isBinaryOperator("!=")).to.equal(false);
    expect(isUnaryOperator("not")).to.equal(true);
    expect(isUnaryOperator(3)).to.equal(false);
  });

  it("should flag multi-value kinds", () => {
    expect(isMultiValueKind("call")).to.equal(true);
    expect(isMultiValueKind("methodCall")).to.equal(true);
    expect(isMultiValueKind("varargs")).to.equal(true);
    expect(isMultiValueKind("identifier")).to.equal(false);
  });
});
