/**
 * Emitter options and defaults
 */

import type { EmitterOptions } from "../types.js";

/**
 * Default emitter options
 */
export const defaultOptions: EmitterOptions = {
  indent: 4,
  includeTimestamp: false,
  maxDepth: 50,
  runtimeHeader: "lua_object.hpp",
};
