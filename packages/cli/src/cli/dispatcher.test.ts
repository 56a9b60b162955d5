/**
 * Tests for command dispatch and exit codes
 */

import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it } from "mocha";
import { expect } from "chai";
import { build } from "@luacxx/frontend";
import { runCli } from "./dispatcher.js";

const { num, chunk, local } = build;

describe("runCli", () => {
  let dir = "";
  let configPath = "";

  const writeFile = (name: string, text: string): string => {
    const path = join(dir, name);
    writeFileSync(path, text);
    return path;
  };

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "luacxx-cli-"));
    configPath = writeFile("luacxx.json", JSON.stringify({ indent: 2 }));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("emits with settings from the config file", () => {
    const treeFile = writeFile(
      "main.json",
      JSON.stringify(chunk(local(["x"], [num(1)])))
    );
    const outDir = join(dir, "out");

    const code = runCli(["emit", treeFile, "-o", outDir, "-c", configPath, "-q"]);

    expect(code).to.equal(0);
    const lines = readFileSync(join(outDir, "main.cpp"), "utf-8").split("\n");
    expect(lines).to.include("  LuaValue x = lx_int_1;");
  });

  it("exits with 1 on an invalid config file", () => {
    const badConfig = writeFile("bad.json", JSON.stringify({ indent: -1 }));
    const treeFile = writeFile("main.json", JSON.stringify(chunk()));
    expect(runCli(["emit", treeFile, "-c", badConfig, "-q"])).to.equal(1);
  });

  it("exits with 1 when the tree file is not given", () => {
    expect(runCli(["emit", "-c", configPath, "-q"])).to.equal(1);
  });

  it("exits with 2 on an unknown command", () => {
    expect(runCli(["compile", "main.json"])).to.equal(2);
  });

  it("exits with 4 when the tree cannot be loaded", () => {
    const missing = join(dir, "missing.json");
    expect(runCli(["emit", missing, "-c", configPath, "-q"])).to.equal(4);
    expect(runCli(["tree", missing])).to.equal(4);
  });

  it("exits with 5 when translation fails", () => {
    const treeFile = writeFile(
      "num.json",
      JSON.stringify({ kind: "number", literal: 1 })
    );
    const outDir = join(dir, "out");
    expect(
      runCli(["emit", treeFile, "-o", outDir, "-c", configPath, "-q"])
    ).to.equal(5);
  });

  it("exits with 6 when the output cannot be written", () => {
    const treeFile = writeFile("main.json", JSON.stringify(chunk()));
    const outDir = writeFile("out", "not a directory");
    expect(
      runCli(["emit", treeFile, "-o", outDir, "-c", configPath, "-q"])
    ).to.equal(6);
  });
});
