/**
 * C++ identifier sanitizing
 *
 * Script identifiers are valid C++ identifiers lexically, but may collide with
 * C++ keywords, with C library macros, with names the runtime library
 * declares, or with the `lx_` and `lua_` prefixes of generated and runtime
 * names. Such names get a `lua_` prefix.
 */

/**
 * C++20 keywords and alternative operator spellings, plus the contextual
 * keywords that are unsafe as plain names
 */
const CPP_KEYWORDS: ReadonlySet<string> = new Set([
  "alignas",
  "alignof",
  "and",
  "and_eq",
  "asm",
  "auto",
  "bitand",
  "bitor",
  "bool",
  "break",
  "case",
  "catch",
  "char",
  "char8_t",
  "char16_t",
  "char32_t",
  "class",
  "compl",
  "concept",
  "const",
  "consteval",
  "constexpr",
  "constinit",
  "const_cast",
  "continue",
  "co_await",
  "co_return",
  "co_yield",
  "decltype",
  "default",
  "delete",
  "do",
  "double",
  "dynamic_cast",
  "else",
  "enum",
  "explicit",
  "export",
  "extern",
  "false",
  "float",
  "for",
  "friend",
  "goto",
  "if",
  "inline",
  "int",
  "long",
  "mutable",
  "namespace",
  "new",
  "noexcept",
  "not",
  "not_eq",
  "nullptr",
  "operator",
  "or",
  "or_eq",
  "private",
  "protected",
  "public",
  "register",
  "reinterpret_cast",
  "requires",
  "return",
  "short",
  "signed",
  "sizeof",
  "static",
  "static_assert",
  "static_cast",
  "struct",
  "switch",
  "template",
  "this",
  "thread_local",
  "throw",
  "true",
  "try",
  "typedef",
  "typeid",
  "typename",
  "union",
  "unsigned",
  "using",
  "virtual",
  "void",
  "volatile",
  "wchar_t",
  "while",
  "xor",
  "xor_eq",
  "final",
  "override",
  "import",
  "module",
]);

/**
 * Macros from the C headers the generated code includes; a local of the
 * same name would be rewritten by the preprocessor
 */
const C_MACROS: ReadonlySet<string> = new Set([
  "assert",
  "errno",
  "offsetof",
  "EOF",
  "NULL",
  "BUFSIZ",
  "FILENAME_MAX",
  "EXIT_SUCCESS",
  "EXIT_FAILURE",
  "RAND_MAX",
  "INFINITY",
  "NAN",
  "HUGE_VAL",
  "M_PI",
  "M_E",
  "CHAR_BIT",
  "INT_MAX",
  "INT_MIN",
  "LLONG_MAX",
  "LLONG_MIN",
  "SIZE_MAX",
]);

const RUNTIME_NAMES: ReadonlySet<string> = new Set([
  "args",
  "n_args",
  "out_result",
  "main",
  "std",
  "_G",
  "init_G",
  "LuaValue",
  "LuaValueVector",
  "LuaObject",
  "LuaFunctionWrapper",
  "LuaCoroutine",
  "get_object",
  "call_lua_value",
  "is_lua_truthy",
  "print_value",
  "get_double",
  "get_long_long",
  "get_lua_type_name",
]);

/**
 * Prefix shared by every identifier the emitter invents.
 */
export const GENERATED_PREFIX = "lx_";

const RUNTIME_PREFIX = "lua_";

export const isCppKeyword = (name: string): boolean => CPP_KEYWORDS.has(name);

const needsPrefix = (name: string): boolean =>
  CPP_KEYWORDS.has(name) ||
  C_MACROS.has(name) ||
  RUNTIME_NAMES.has(name) ||
  name.startsWith(GENERATED_PREFIX) ||
  // lua_* belongs to the runtime; prefixing it again keeps the mapping one-to-one
  name.startsWith(RUNTIME_PREFIX) ||
  // reserved for the implementation in C++
  /^_[A-Z]/.test(name) ||
  name.includes("__");

export const sanitizeIdentifier = (name: string): string =>
  needsPrefix(name) ? `${RUNTIME_PREFIX}${name}` : name;

/**
 * C++ namespace (and file name) of a loadable module:
 * `util.strings` -> `util_strings`
 */
export const moduleNamespace = (moduleName: string): string =>
  sanitizeIdentifier(
    moduleName.replace(/[^A-Za-z0-9_]/g, "_").replace(/^(\d)/, "_$1")
  );
