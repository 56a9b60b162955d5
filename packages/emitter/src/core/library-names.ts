/**
 * Names the runtime installs in the global table at startup
 */

/**
 * Standard library namespaces; reads go through memoized accessors
 */
export const LIBRARY_NAMESPACES: ReadonlySet<string> = new Set([
  "coroutine",
  "debug",
  "io",
  "math",
  "os",
  "package",
  "string",
  "table",
  "utf8",
]);

/**
 * Global functions and values with memoized accessors
 */
export const BUILTIN_GLOBALS: ReadonlySet<string> = new Set([
  "_VERSION",
  "arg",
  "assert",
  "collectgarbage",
  "dofile",
  "error",
  "getmetatable",
  "ipairs",
  "load",
  "loadfile",
  "next",
  "pairs",
  "pcall",
  "print",
  "rawequal",
  "rawget",
  "rawlen",
  "rawset",
  "require",
  "select",
  "setmetatable",
  "tonumber",
  "tostring",
  "type",
  "unpack",
  "warn",
  "xpcall",
]);

export const GLOBAL_TABLE_NAME = "_G";
