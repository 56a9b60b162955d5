/**
 * Module header generation
 *
 * Other units include `<namespace>.hpp` to call the module's load function.
 * Globals the module defines are reached through the global table.
 */

import type { EmitterOptions } from "../../types.js";
import { generateFileHeader } from "../../constants.js";
import { defaultOptions } from "../options.js";

export const emitModuleHeader = (
  namespace: string,
  options: EmitterOptions = {}
): string => {
  const finalOptions: EmitterOptions = { ...defaultOptions, ...options };
  return [
    ...generateFileHeader(finalOptions.sourcePath ?? `${namespace}.lua`, {
      includeTimestamp: finalOptions.includeTimestamp,
      timestamp: finalOptions.timestamp,
    }),
    "#pragma once",
    `#include "${finalOptions.runtimeHeader ?? "lua_object.hpp"}"`,
    "",
    `namespace ${namespace} {`,
    "",
    "LuaValueVector load();",
    "",
    `} // namespace ${namespace}`,
    "",
  ].join("\n");
};
