/**
 * Configuration loading and validation
 */

import { readFileSync, existsSync } from "node:fs";
import { join, resolve, dirname } from "node:path";
import { defaultOptions } from "@luacxx/emitter";
import type {
  LuacxxConfig,
  CliOptions,
  ResolvedConfig,
  Result,
} from "./types.js";

export const CONFIG_FILE_NAME = "luacxx.json";

const DEFAULT_OUTPUT_DIRECTORY = "generated";

const KNOWN_FIELDS: ReadonlySet<string> = new Set([
  "$schema",
  "outputDirectory",
  "indent",
  "maxDepth",
  "includeTimestamp",
  "runtimeHeader",
]);

const isString = (value: unknown): value is string => typeof value === "string";

const isBoolean = (value: unknown): value is boolean =>
  typeof value === "boolean";

const isNonNegativeInteger = (value: unknown): value is number =>
  typeof value === "number" && Number.isInteger(value) && value >= 0;

const isPositiveInteger = (value: unknown): value is number =>
  isNonNegativeInteger(value) && value > 0;

const readField = <T>(
  fields: ReadonlyMap<string, unknown>,
  key: keyof LuacxxConfig,
  check: (value: unknown) => value is T,
  expected: string
): Result<T | undefined, string> => {
  const value = fields.get(key);
  if (value === undefined) {
    return { ok: true, value: undefined };
  }
  if (!check(value)) {
    return {
      ok: false,
      error: `${CONFIG_FILE_NAME}: '${key}' must be ${expected}`,
    };
  }
  return { ok: true, value };
};

/**
 * Validate parsed luacxx.json contents
 */
export const parseConfig = (data: unknown): Result<LuacxxConfig, string> => {
  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    return { ok: false, error: `${CONFIG_FILE_NAME}: expected an object` };
  }

  const fields = new Map<string, unknown>(Object.entries(data));
  const unknown = [...fields.keys()].find((key) => !KNOWN_FIELDS.has(key));
  if (unknown !== undefined) {
    return {
      ok: false,
      error: `${CONFIG_FILE_NAME}: unknown option '${unknown}'`,
    };
  }

  const schema = readField(fields, "$schema", isString, "a string");
  if (!schema.ok) return schema;
  const outputDirectory = readField(
    fields,
    "outputDirectory",
    isString,
    "a string"
  );
  if (!outputDirectory.ok) return outputDirectory;
  const indent = readField(
    fields,
    "indent",
    isNonNegativeInteger,
    "a non-negative integer"
  );
  if (!indent.ok) return indent;
  const maxDepth = readField(
    fields,
    "maxDepth",
    isPositiveInteger,
    "a positive integer"
  );
  if (!maxDepth.ok) return maxDepth;
  const includeTimestamp = readField(
    fields,
    "includeTimestamp",
    isBoolean,
    "true or false"
  );
  if (!includeTimestamp.ok) return includeTimestamp;
  const runtimeHeader = readField(
    fields,
    "runtimeHeader",
    isString,
    "a string"
  );
  if (!runtimeHeader.ok) return runtimeHeader;

  return {
    ok: true,
    value: {
      $schema: schema.value,
      outputDirectory: outputDirectory.value,
      indent: indent.value,
      maxDepth: maxDepth.value,
      includeTimestamp: includeTimestamp.value,
      runtimeHeader: runtimeHeader.value,
    },
  };
};

/**
 * Load luacxx.json
 */
export const loadConfig = (
  configPath: string
): Result<LuacxxConfig, string> => {
  if (!existsSync(configPath)) {
    return {
      ok: false,
      error: `Config file not found: ${configPath}`,
    };
  }

  let data: unknown;
  try {
    data = JSON.parse(readFileSync(configPath, "utf-8"));
  } catch (error) {
    return {
      ok: false,
      error: `Failed to parse ${CONFIG_FILE_NAME}: ${error instanceof Error ? error.message : String(error)}`,
    };
  }

  return parseConfig(data);
};

/**
 * Find luacxx.json by walking up the directory tree
 */
export const findConfig = (startDir: string): string | null => {
  let currentDir = resolve(startDir);

  while (true) {
    const configPath = join(currentDir, CONFIG_FILE_NAME);
    if (existsSync(configPath)) {
      return configPath;
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
};

/**
 * Resolve final configuration from file + CLI args
 * @param projectRoot - Directory containing luacxx.json; the file's
 *   outputDirectory is relative to it
 */
export const resolveConfig = (
  config: LuacxxConfig,
  cliOptions: CliOptions,
  projectRoot: string,
  treeFile?: string
): ResolvedConfig => ({
  treeFile: treeFile ?? cliOptions.entry,
  outputDirectory:
    cliOptions.out ??
    join(projectRoot, config.outputDirectory ?? DEFAULT_OUTPUT_DIRECTORY),
  emitterOptions: {
    moduleName: cliOptions.module,
    indent: config.indent ?? defaultOptions.indent,
    maxDepth: config.maxDepth ?? defaultOptions.maxDepth,
    includeTimestamp:
      config.includeTimestamp ?? defaultOptions.includeTimestamp,
    runtimeHeader: config.runtimeHeader ?? defaultOptions.runtimeHeader,
  },
  verbose: cliOptions.verbose ?? false,
  quiet: cliOptions.quiet ?? false,
});
