/**
 * Per-unit literal and lookup caches
 *
 * Each table maps a key to one generated identifier for the whole unit. The
 * preamble declares every entry once, sorted by key, so output does not depend
 * on the order in which the unit used them.
 */

import type { EmitterContext, UnitState } from "../types.js";
import { nextId, toCppStringLiteral } from "../types.js";

/** Integers in this range resolve through the global table */
export const SMALL_INTEGER_LIMIT = 255;

const stringConstructor = (value: string): string => {
  const { literal, byteLength, hasNul } = toCppStringLiteral(value);
  return hasNul
    ? `LuaValue(std::string(${literal}, ${byteLength}))`
    : `LuaValue(std::string(${literal}))`;
};

/**
 * Identifier of the interned string constant for `value`
 */
export const internString = (context: EmitterContext, value: string): string => {
  const cached = context.unit.strings.get(value);
  if (cached) {
    return cached;
  }
  const name = nextId(context, "str");
  context.unit.strings.set(value, name);
  return name;
};

/**
 * Key handle used to read or write a global by name
 */
export const globalKey = (context: EmitterContext, name: string): string => {
  const cached = context.unit.globals.get(name);
  if (cached) {
    return cached;
  }
  const key = `lx_global_${name}`;
  context.unit.globals.set(name, key);
  return key;
};

export const smallInteger = (context: EmitterContext, value: number): string => {
  const cached = context.unit.integers.get(value);
  if (cached) {
    return cached;
  }
  const name = `lx_int_${value}`;
  context.unit.integers.set(value, name);
  return name;
};

/**
 * Call expression of the memoized accessor for a library namespace or one of
 * its members, e.g. `lx_lib_math_floor()`
 */
export const libraryAccessor = (
  context: EmitterContext,
  namespace: string,
  member?: string
): string => {
  const { libraries } = context.unit;
  if (!libraries.has(namespace)) {
    libraries.set(namespace, `lx_lib_${namespace}`);
  }
  if (member === undefined) {
    return `lx_lib_${namespace}()`;
  }
  const key = `${namespace}.${member}`;
  if (!libraries.has(key)) {
    libraries.set(key, `lx_lib_${namespace}_${member}`);
  }
  return `lx_lib_${namespace}_${member}()`;
};

export const builtinAccessor = (context: EmitterContext, name: string): string => {
  if (!context.unit.libraries.has(name)) {
    context.unit.libraries.set(name, `lx_builtin_${name}`);
  }
  return `lx_builtin_${name}()`;
};

const byKey = <K extends string | number>(
  entries: Iterable<[K, string]>
): [K, string][] => [...entries].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));

const accessor = (name: string, init: string): string =>
  `static const LuaValue& ${name}() { static const LuaValue value = ${init}; return value; }`;

/**
 * Declarations for every cache entry: strings, then global keys and small
 * integers, then library accessors.
 */
export const renderPreamble = (unit: UnitState): string[] => {
  const lines: string[] = [];

  for (const [value, name] of byKey(unit.strings)) {
    lines.push(`static const LuaValue ${name} = ${stringConstructor(value)};`);
  }

  for (const [globalName, key] of byKey(unit.globals)) {
    lines.push(
      `static const LuaValue ${key} = LuaValue(std::string("${globalName}"));`
    );
  }

  for (const [value, name] of byKey(unit.integers)) {
    lines.push(`static const LuaValue ${name} = LuaValue(${value}LL);`);
  }

  // Members sort after their namespace ("math" < "math.floor"), so every
  // accessor is declared before use.
  for (const [key, name] of byKey(unit.libraries)) {
    const dot = key.indexOf(".");
    if (dot >= 0) {
      const namespace = key.slice(0, dot);
      const member = key.slice(dot + 1);
      lines.push(
        accessor(name, `lua_get_member(lx_lib_${namespace}(), "${member}")`)
      );
    } else {
      lines.push(accessor(name, `_G->get("${key}")`));
    }
  }

  return lines;
};
