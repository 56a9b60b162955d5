/**
 * Final output assembly
 */

import type { EmitterOptions } from "../../types.js";
import { INIT_HEADER, STANDARD_INCLUDES } from "../../constants.js";

export type AssemblyParts = {
  readonly header: readonly string[];
  readonly requiredModules: readonly string[];
  readonly preamble: readonly string[];
  /** Unit body, already indented one level */
  readonly body: readonly string[];
  /** Body ends in a top-level `return` */
  readonly returns: boolean;
};

const includes = (
  local: readonly string[],
  parts: AssemblyParts
): string[] => [
  ...STANDARD_INCLUDES.map((name) => `#include <${name}>`),
  ...local.map((name) => `#include "${name}"`),
  ...parts.requiredModules.map((name) => `#include "${name}.hpp"`),
];

/**
 * A blank line after a non-empty section
 */
const section = (lines: readonly string[]): string[] =>
  lines.length > 0 ? [...lines, ""] : [];

const step = (options: EmitterOptions): string => " ".repeat(options.indent ?? 4);

/**
 * Program entry point: everything runs in `main`
 */
export const assembleEntryUnit = (
  parts: AssemblyParts,
  options: EmitterOptions
): string => {
  const pad = step(options);
  return [
    ...parts.header,
    ...includes([options.runtimeHeader ?? "lua_object.hpp", INIT_HEADER], parts),
    "",
    ...section(parts.preamble),
    "int main(int argc, char* argv[]) {",
    `${pad}init_G(argc, argv);`,
    `${pad}LuaValueVector lx_buf_0;`,
    ...parts.body,
    ...(parts.returns ? [] : [`${pad}return 0;`]),
    "}",
    "",
  ].join("\n");
};

/**
 * Loadable module: the body runs once, on the first `load()`, and later
 * calls return the same results
 */
export const assembleModuleUnit = (
  namespace: string,
  parts: AssemblyParts,
  options: EmitterOptions
): string => {
  const pad = step(options);
  return [
    ...parts.header,
    `#include "${namespace}.hpp"`,
    ...includes([options.runtimeHeader ?? "lua_object.hpp"], parts),
    "",
    `namespace ${namespace} {`,
    "",
    ...section(parts.preamble),
    "LuaValueVector load() {",
    `${pad}static bool lx_loaded = false;`,
    `${pad}static LuaValueVector out_result;`,
    `${pad}if (lx_loaded) {`,
    `${pad}${pad}return out_result;`,
    `${pad}}`,
    `${pad}lx_loaded = true;`,
    `${pad}LuaValueVector lx_buf_0;`,
    ...parts.body,
    ...(parts.returns
      ? []
      : [`${pad}out_result.assign(1, LuaValue(true));`, `${pad}return out_result;`]),
    "}",
    "",
    `} // namespace ${namespace}`,
    "",
  ].join("\n");
};
