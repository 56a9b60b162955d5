/**
 * Tests for configuration loading and resolution
 */

import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it } from "mocha";
import { expect } from "chai";
import { findConfig, loadConfig, parseConfig, resolveConfig } from "./config.js";

describe("Config", () => {
  describe("parseConfig", () => {
    it("should accept every known option", () => {
      const result = parseConfig({
        outputDirectory: "cpp",
        indent: 2,
        maxDepth: 80,
        includeTimestamp: true,
        runtimeHeader: "runtime/lua.hpp",
      });
      expect(result).to.deep.equal({
        ok: true,
        value: {
          $schema: undefined,
          outputDirectory: "cpp",
          indent: 2,
          maxDepth: 80,
          includeTimestamp: true,
          runtimeHeader: "runtime/lua.hpp",
        },
      });
    });

    it("should reject a value of the wrong type", () => {
      expect(parseConfig({ indent: "4" })).to.deep.equal({
        ok: false,
        error: "luacxx.json: 'indent' must be a non-negative integer",
      });
    });

    it("should reject a zero recursion limit", () => {
      expect(parseConfig({ maxDepth: 0 })).to.deep.equal({
        ok: false,
        error: "luacxx.json: 'maxDepth' must be a positive integer",
      });
    });

    it("should reject unknown options", () => {
      expect(parseConfig({ outDir: "x" })).to.deep.equal({
        ok: false,
        error: "luacxx.json: unknown option 'outDir'",
      });
    });

    it("should reject a value that is not an object", () => {
      expect(parseConfig([1, 2])).to.deep.equal({
        ok: false,
        error: "luacxx.json: expected an object",
      });
    });
  });

  describe("resolveConfig", () => {
    it("should fall back to the emitter defaults", () => {
      const result = resolveConfig({}, {}, "/work");
      expect(result).to.deep.equal({
        treeFile: undefined,
        outputDirectory: "/work/generated",
        emitterOptions: {
          moduleName: undefined,
          indent: 4,
          maxDepth: 50,
          includeTimestamp: false,
          runtimeHeader: "lua_object.hpp",
        },
        verbose: false,
        quiet: false,
      });
    });

    it("should resolve the output directory against the project root", () => {
      const result = resolveConfig({ outputDirectory: "build/cpp" }, {}, "/work");
      expect(result.outputDirectory).to.equal("/work/build/cpp");
    });

    it("should override config with CLI options", () => {
      const result = resolveConfig(
        { outputDirectory: "cpp", indent: 2 },
        { out: "elsewhere", module: "game.util", quiet: true },
        "/work",
        "util.json"
      );
      expect(result.outputDirectory).to.equal("elsewhere");
      expect(result.emitterOptions.moduleName).to.equal("game.util");
      expect(result.emitterOptions.indent).to.equal(2);
      expect(result.treeFile).to.equal("util.json");
      expect(result.quiet).to.equal(true);
    });

    it("should prefer the positional tree file over --entry", () => {
      expect(
        resolveConfig({}, { entry: "b.json" }, "/work", "a.json").treeFile
      ).to.equal("a.json");
      expect(resolveConfig({}, { entry: "b.json" }, "/work").treeFile).to.equal(
        "b.json"
      );
    });
  });

  describe("files", () => {
    let dir = "";

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), "luacxx-config-"));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it("should find luacxx.json in a parent directory", () => {
      writeFileSync(join(dir, "luacxx.json"), "{}");
      const nested = join(dir, "src", "game");
      mkdirSync(nested, { recursive: true });
      expect(findConfig(nested)).to.equal(join(dir, "luacxx.json"));
    });

    it("should load and validate a config file", () => {
      const path = join(dir, "luacxx.json");
      writeFileSync(path, JSON.stringify({ indent: 2 }));
      const result = loadConfig(path);
      expect(result.ok).to.equal(true);
      if (result.ok) {
        expect(result.value.indent).to.equal(2);
      }
    });

    it("should report a missing file", () => {
      const path = join(dir, "missing.json");
      expect(loadConfig(path)).to.deep.equal({
        ok: false,
        error: `Config file not found: ${path}`,
      });
    });

    it("should report invalid JSON", () => {
      const path = join(dir, "luacxx.json");
      writeFileSync(path, "{ indent: ");
      const result = loadConfig(path);
      expect(result.ok).to.equal(false);
      if (!result.ok) {
        expect(result.error).to.match(/^Failed to parse luacxx\.json: /);
      }
    });
  });
});
